import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { validate } from "../../../../middleware/validation.middleware";
import { createdResponse, sendError, successResponse } from "../../../../utils/responseHandler";
import {
  v_create_amendment_application,
  v_update_amendment_application,
  type CreateAmendmentApplicationInput,
  type UpdateAmendmentApplicationInput,
} from "../../../../validations/amendment-validation";
import { parseIdParam } from "../../../../validations/zod-params";
import {
  addAmendmentApplication,
  deleteAmendmentApplication,
  getAmendmentApplications,
  updateAmendmentApplication,
} from "./amendment-application-handler";

const router = express.Router();

router.post(
  "/:id/applications",
  validate({ body: v_create_amendment_application }),
  asyncHandler(async (req, res) => {
    const payload: CreateAmendmentApplicationInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const link = await addAmendmentApplication(parseIdParam(req.params.id), payload, t);
      await t.commit();
      createdResponse(res, "Application linked successfully.", link);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong while linking the application.");
    }
  })
);

router.get(
  "/:id/applications",
  asyncHandler(async (req, res) => {
    try {
      const links = await getAmendmentApplications(parseIdParam(req.params.id));
      successResponse(res, "Application links retrieved successfully.", links);
    } catch (error) {
      sendError(res, error, "Something went wrong during application link retrieval.");
    }
  })
);

router.put(
  "/applications/:applicationLinkId",
  validate({ body: v_update_amendment_application }),
  asyncHandler(async (req, res) => {
    const payload: UpdateAmendmentApplicationInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const link = await updateAmendmentApplication(
        parseIdParam(req.params.applicationLinkId, "applicationLinkId"),
        payload,
        t
      );
      await t.commit();
      successResponse(res, "Application link updated successfully.", link);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application link update.");
    }
  })
);

router.delete(
  "/applications/:applicationLinkId",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteAmendmentApplication(parseIdParam(req.params.applicationLinkId, "applicationLinkId"), t);
      await t.commit();
      successResponse(res, "Application link deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application link deletion.");
    }
  })
);

export default router;
