import express from "express";
import asyncHandler from "express-async-handler";
import { generateAmendmentReference } from "./amendment-reference-handler";
import { sendError, successResponse } from "../../../../utils/responseHandler";
import {
  AMENDMENT_STATUSES,
  AMENDMENT_TYPES,
  DEVELOPMENT_STATUSES,
  DOCUMENT_TYPES,
  FORCES,
  LINK_TYPES,
  PRIORITIES,
} from "../../../../utils/constants";

const router = express.Router();

// Preview only; nothing is reserved
router.get(
  "/next",
  asyncHandler(async (req, res) => {
    try {
      const nextReference = await generateAmendmentReference();
      successResponse(res, "Next amendment reference retrieved successfully.", { nextReference });
    } catch (error) {
      sendError(res, error, "Something went wrong while computing the next reference.");
    }
  })
);

const referenceLists: Record<string, readonly string[]> = {
  statuses: AMENDMENT_STATUSES,
  "dev-statuses": DEVELOPMENT_STATUSES,
  priorities: PRIORITIES,
  types: AMENDMENT_TYPES,
  forces: FORCES,
  "link-types": LINK_TYPES,
  "document-types": DOCUMENT_TYPES,
};

for (const [path, values] of Object.entries(referenceLists)) {
  router.get(`/${path}`, (req, res) => {
    successResponse(res, `Reference list '${path}' retrieved successfully.`, values);
  });
}

export default router;
