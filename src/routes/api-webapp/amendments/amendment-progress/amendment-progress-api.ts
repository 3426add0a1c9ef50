import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { validate } from "../../../../middleware/validation.middleware";
import { resolveActor } from "../../../../utils/helper";
import { createdResponse, sendError, successResponse } from "../../../../utils/responseHandler";
import {
  v_create_progress,
  v_update_progress,
  type CreateProgressInput,
  type UpdateProgressInput,
} from "../../../../validations/amendment-validation";
import { parseIdParam } from "../../../../validations/zod-params";
import { addProgress, deleteProgress, getProgressForAmendment, updateProgress } from "./amendment-progress-handler";

const router = express.Router();

router.post(
  "/:id/progress",
  validate({ body: v_create_progress }),
  asyncHandler(async (req, res) => {
    const payload: CreateProgressInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const progress = await addProgress(
        parseIdParam(req.params.id),
        { ...payload, createdBy: resolveActor(req, "created_by", payload.createdBy) },
        t
      );
      await t.commit();
      createdResponse(res, "Progress entry added successfully.", progress);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong while adding the progress entry.");
    }
  })
);

router.get(
  "/:id/progress",
  asyncHandler(async (req, res) => {
    try {
      const entries = await getProgressForAmendment(parseIdParam(req.params.id));
      successResponse(res, "Progress entries retrieved successfully.", entries);
    } catch (error) {
      sendError(res, error, "Something went wrong during progress retrieval.");
    }
  })
);

router.put(
  "/progress/:progressId",
  validate({ body: v_update_progress }),
  asyncHandler(async (req, res) => {
    const payload: UpdateProgressInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const progress = await updateProgress(
        parseIdParam(req.params.progressId, "progressId"),
        { ...payload, modifiedBy: resolveActor(req, "modified_by", payload.modifiedBy) },
        t
      );
      await t.commit();
      successResponse(res, "Progress entry updated successfully.", progress);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during progress update.");
    }
  })
);

router.delete(
  "/progress/:progressId",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteProgress(parseIdParam(req.params.progressId, "progressId"), t);
      await t.commit();
      successResponse(res, "Progress entry deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during progress deletion.");
    }
  })
);

export default router;
