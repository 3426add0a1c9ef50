import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { validate } from "../../../../middleware/validation.middleware";
import { createdResponse, sendError, successResponse } from "../../../../utils/responseHandler";
import { v_create_link, type CreateLinkInput } from "../../../../validations/amendment-validation";
import { parseIdParam } from "../../../../validations/zod-params";
import { deleteLink, getLinksForAmendment, linkAmendments } from "./amendment-link-handler";

const router = express.Router();

router.post(
  "/:id/links",
  validate({ body: v_create_link }),
  asyncHandler(async (req, res) => {
    const payload: CreateLinkInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const link = await linkAmendments(parseIdParam(req.params.id), payload, t);
      await t.commit();
      createdResponse(res, "Amendments linked successfully.", link);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong while linking amendments.");
    }
  })
);

router.get(
  "/:id/links",
  asyncHandler(async (req, res) => {
    try {
      const links = await getLinksForAmendment(parseIdParam(req.params.id));
      successResponse(res, "Amendment links retrieved successfully.", links);
    } catch (error) {
      sendError(res, error, "Something went wrong during link retrieval.");
    }
  })
);

router.delete(
  "/links/:linkId",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteLink(parseIdParam(req.params.linkId, "linkId"), t);
      await t.commit();
      successResponse(res, "Amendment link deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during link deletion.");
    }
  })
);

export default router;
