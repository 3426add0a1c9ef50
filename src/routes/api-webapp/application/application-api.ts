import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../db/core/control-db";
import { validate } from "../../../middleware/validation.middleware";
import { createdResponse, sendError, successResponse } from "../../../utils/responseHandler";
import {
  v_create_application,
  v_create_application_version,
  v_update_application,
  type CreateApplicationInput,
  type CreateApplicationVersionInput,
  type UpdateApplicationInput,
} from "../../../validations/catalog-validation";
import { parseIdParam } from "../../../validations/zod-params";
import {
  addApplication,
  addApplicationVersion,
  deleteApplication,
  deleteApplicationVersion,
  findApplicationOrThrow,
  getApplications,
  getApplicationVersions,
  updateApplication,
} from "./application-handler";

const router = express.Router();

router.post(
  "/",
  validate({ body: v_create_application }),
  asyncHandler(async (req, res) => {
    const payload: CreateApplicationInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const application = await addApplication(payload, t);
      await t.commit();
      createdResponse(res, "Application added successfully.", application);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application creation.");
    }
  })
);

router.get(
  "/",
  asyncHandler(async (req, res) => {
    try {
      const applications = await getApplications();
      successResponse(res, "Applications retrieved successfully.", applications);
    } catch (error) {
      sendError(res, error, "Something went wrong during application retrieval.");
    }
  })
);

router.delete(
  "/versions/:versionId",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteApplicationVersion(parseIdParam(req.params.versionId, "versionId"), t);
      await t.commit();
      successResponse(res, "Application version deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application version deletion.");
    }
  })
);

router.get(
  "/:id",
  asyncHandler(async (req, res) => {
    try {
      const application = await findApplicationOrThrow(parseIdParam(req.params.id));
      successResponse(res, "Application retrieved successfully.", application);
    } catch (error) {
      sendError(res, error, "Something went wrong during application retrieval.");
    }
  })
);

router.put(
  "/:id",
  validate({ body: v_update_application }),
  asyncHandler(async (req, res) => {
    const payload: UpdateApplicationInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const application = await updateApplication(parseIdParam(req.params.id), payload, t);
      await t.commit();
      successResponse(res, "Application updated successfully.", application);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application update.");
    }
  })
);

router.delete(
  "/:id",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteApplication(parseIdParam(req.params.id), t);
      await t.commit();
      successResponse(res, "Application deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during application deletion.");
    }
  })
);

router.post(
  "/:id/versions",
  validate({ body: v_create_application_version }),
  asyncHandler(async (req, res) => {
    const payload: CreateApplicationVersionInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const version = await addApplicationVersion(parseIdParam(req.params.id), payload, t);
      await t.commit();
      createdResponse(res, "Application version added successfully.", version);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong while adding the application version.");
    }
  })
);

router.get(
  "/:id/versions",
  asyncHandler(async (req, res) => {
    try {
      const versions = await getApplicationVersions(parseIdParam(req.params.id));
      successResponse(res, "Application versions retrieved successfully.", versions);
    } catch (error) {
      sendError(res, error, "Something went wrong during application version retrieval.");
    }
  })
);

export default router;
