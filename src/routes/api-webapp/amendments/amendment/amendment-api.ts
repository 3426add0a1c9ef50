import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { validate } from "../../../../middleware/validation.middleware";
import { fileStorage } from "../../../../services/file-storage.service";
import { warningLog } from "../../../../services/logging-service";
import { fromZodError } from "../../../../utils/app-errors";
import { resolveActor } from "../../../../utils/helper";
import { createdResponse, sendError, successResponse } from "../../../../utils/responseHandler";
import {
  v_amendment_query,
  v_bulk_update_amendments,
  v_create_amendment,
  v_update_amendment,
  v_update_amendment_qa,
  type BulkUpdateAmendmentsInput,
  type CreateAmendmentInput,
  type UpdateAmendmentInput,
  type UpdateAmendmentQaInput,
} from "../../../../validations/amendment-validation";
import { parseIdParam } from "../../../../validations/zod-params";
import {
  bulkUpdateAmendments,
  createAmendment,
  deleteAmendment,
  getAmendmentById,
  getAmendmentByReference,
  getAmendments,
  updateAmendment,
  updateAmendmentQa,
} from "./amendment-handler";

const router = express.Router();

// list amendments (filters, sort, paging from the query string)
router.get(
  "/",
  asyncHandler(async (req, res) => {
    const parsed = v_amendment_query.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, fromZodError(parsed.error, "Invalid amendment query"), "Invalid amendment query");
      return;
    }

    const t = await dbInstance.transaction();
    try {
      const page = await getAmendments(parsed.data, t);
      await t.commit();
      successResponse(res, "Amendments retrieved successfully.", {
        ...page,
        skip: parsed.data.skip,
        limit: parsed.data.limit,
      });
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during amendment retrieval.");
    }
  })
);

// create amendment
router.post(
  "/",
  validate({ body: v_create_amendment }),
  asyncHandler(async (req, res) => {
    const payload: CreateAmendmentInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const amendment = await createAmendment(
        { ...payload, createdBy: resolveActor(req, "created_by", payload.createdBy) },
        t
      );
      await t.commit();
      createdResponse(res, "Amendment created successfully.", amendment);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during amendment creation.");
    }
  })
);

// bulk update; each id succeeds or fails on its own
router.post(
  "/bulk-update",
  validate({ body: v_bulk_update_amendments }),
  asyncHandler(async (req, res) => {
    const { amendmentIds, updates }: BulkUpdateAmendmentsInput = req.body;
    try {
      const result = await bulkUpdateAmendments(amendmentIds, {
        ...updates,
        modifiedBy: resolveActor(req, "modified_by", updates.modifiedBy),
      });
      successResponse(res, `Updated ${result.updatedCount} of ${amendmentIds.length} amendments.`, result);
    } catch (error) {
      sendError(res, error, "Something went wrong during bulk amendment update.");
    }
  })
);

// get amendment by reference
router.get(
  "/reference/:reference",
  asyncHandler(async (req, res) => {
    try {
      const amendment = await getAmendmentByReference(req.params.reference);
      successResponse(res, "Amendment retrieved successfully.", amendment);
    } catch (error) {
      sendError(res, error, "Something went wrong during amendment retrieval.");
    }
  })
);

// get amendment by id
router.get(
  "/:id",
  asyncHandler(async (req, res) => {
    try {
      const amendment = await getAmendmentById(parseIdParam(req.params.id));
      successResponse(res, "Amendment retrieved successfully.", amendment);
    } catch (error) {
      sendError(res, error, "Something went wrong during amendment retrieval.");
    }
  })
);

// partial update
router.put(
  "/:id",
  validate({ body: v_update_amendment }),
  asyncHandler(async (req, res) => {
    const payload: UpdateAmendmentInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const amendment = await updateAmendment(
        parseIdParam(req.params.id),
        { ...payload, modifiedBy: resolveActor(req, "modified_by", payload.modifiedBy) },
        t
      );
      await t.commit();
      successResponse(res, "Amendment updated successfully.", amendment);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during amendment update.");
    }
  })
);

// QA fields only
router.patch(
  "/:id/qa",
  validate({ body: v_update_amendment_qa }),
  asyncHandler(async (req, res) => {
    const payload: UpdateAmendmentQaInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const amendment = await updateAmendmentQa(
        parseIdParam(req.params.id),
        { ...payload, modifiedBy: resolveActor(req, "modified_by", payload.modifiedBy) },
        t
      );
      await t.commit();
      successResponse(res, "Amendment QA updated successfully.", amendment);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during amendment QA update.");
    }
  })
);

// delete amendment, then its stored files
router.delete(
  "/:id",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    let filePaths: string[];
    try {
      filePaths = await deleteAmendment(parseIdParam(req.params.id), t);
      await t.commit();
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during amendment deletion.");
      return;
    }

    const results = await Promise.allSettled(filePaths.map((filePath) => fileStorage.remove(filePath)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        warningLog(`Could not remove document file ${filePaths[index]}: ${String(result.reason)}`);
      }
    });

    successResponse(res, "Amendment deleted successfully.", { deletedFiles: filePaths.length });
  })
);

export default router;
