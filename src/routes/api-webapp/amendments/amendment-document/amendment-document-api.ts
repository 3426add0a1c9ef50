import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { documentUpload } from "../../../../services/multer";
import { fileStorage } from "../../../../services/file-storage.service";
import { warningLog } from "../../../../services/logging-service";
import { fromZodError, NotFoundError, ValidationFailureError } from "../../../../utils/app-errors";
import { resolveActor } from "../../../../utils/helper";
import { createdResponse, sendError, successResponse } from "../../../../utils/responseHandler";
import { v_document_fields } from "../../../../validations/amendment-validation";
import { parseIdParam } from "../../../../validations/zod-params";
import { addDocument, deleteDocument, findDocumentOrThrow, getDocumentsForAmendment } from "./amendment-document-handler";

const router = express.Router();

const removeStoredFile = async (filePath: string) => {
  try {
    await fileStorage.remove(filePath);
  } catch (err) {
    warningLog(`Could not remove document file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
};

// Validate the id before multer writes anything under it
const requireAmendmentId: express.RequestHandler = (req, res, next) => {
  try {
    parseIdParam(req.params.id);
    next();
  } catch (error) {
    sendError(res, error, "Invalid amendment id");
  }
};

router.post(
  "/:id/documents",
  requireAmendmentId,
  documentUpload.single("file"),
  asyncHandler(async (req, res) => {
    const file = req.file;
    if (!file) {
      sendError(res, new ValidationFailureError("A file is required in the 'file' field"), "No file uploaded");
      return;
    }

    const t = await dbInstance.transaction();
    try {
      const parsed = v_document_fields.safeParse(req.body ?? {});
      if (!parsed.success) throw fromZodError(parsed.error, "Invalid document fields");

      const document = await addDocument(
        parseIdParam(req.params.id),
        file,
        { ...parsed.data, uploadedBy: resolveActor(req, "uploaded_by", parsed.data.uploadedBy) },
        t
      );
      await t.commit();
      createdResponse(res, "Document uploaded successfully.", document);
    } catch (error) {
      await t.rollback();
      await removeStoredFile(file.path);
      sendError(res, error, "Something went wrong during document upload.");
    }
  })
);

router.get(
  "/:id/documents",
  asyncHandler(async (req, res) => {
    try {
      const documents = await getDocumentsForAmendment(parseIdParam(req.params.id));
      successResponse(res, "Documents retrieved successfully.", documents);
    } catch (error) {
      sendError(res, error, "Something went wrong during document retrieval.");
    }
  })
);

router.get(
  "/documents/:documentId/download",
  asyncHandler(async (req, res) => {
    try {
      const document = await findDocumentOrThrow(parseIdParam(req.params.documentId, "documentId"));
      if (!(await fileStorage.exists(document.filePath))) {
        throw new NotFoundError(`File for document ${document.id} is missing from storage`);
      }
      if (document.mimeType) res.type(document.mimeType);
      res.download(fileStorage.resolve(document.filePath), document.originalFilename);
    } catch (error) {
      sendError(res, error, "Something went wrong during document download.");
    }
  })
);

// row first, then the file
router.delete(
  "/documents/:documentId",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    let filePath: string;
    try {
      filePath = await deleteDocument(parseIdParam(req.params.documentId, "documentId"), t);
      await t.commit();
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during document deletion.");
      return;
    }
    await removeStoredFile(filePath);
    successResponse(res, "Document deleted successfully.");
  })
);

export default router;
