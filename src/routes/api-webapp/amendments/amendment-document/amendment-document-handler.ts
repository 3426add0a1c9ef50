import type { Transaction } from "sequelize";
import { AmendmentDocument } from "./amendment-document-model";
import { findAmendmentOrThrow } from "../amendment/amendment-handler";
import { GLOBAL_CONSTANTS } from "../../../../utils/constants";
import { NotFoundError, toAppError } from "../../../../utils/app-errors";
import type { DocumentFieldsInput } from "../../../../validations/amendment-validation";

export interface StoredFile {
  path: string;
  size: number;
  originalname: string;
  mimetype: string;
}

export const findDocumentOrThrow = async (documentId: number, t?: Transaction | null) => {
  const document = await AmendmentDocument.findByPk(documentId, { transaction: t });
  if (!document) throw new NotFoundError(`Document ${documentId} not found`);
  return document;
};

/** Records metadata for a file already written to storage. */
export const addDocument = async (
  amendmentId: number,
  file: StoredFile,
  fields: DocumentFieldsInput,
  t: Transaction
) => {
  await findAmendmentOrThrow(amendmentId, t);
  try {
    return await AmendmentDocument.create(
      {
        amendmentId,
        documentName: fields.documentName?.trim() || file.originalname,
        originalFilename: file.originalname,
        filePath: file.path,
        fileSize: file.size,
        mimeType: file.mimetype || null,
        documentType: fields.documentType ?? GLOBAL_CONSTANTS.defaults.documentType,
        description: fields.description ?? null,
        uploadedBy: fields.uploadedBy ?? null,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

export const getDocumentsForAmendment = async (amendmentId: number, t?: Transaction | null) => {
  await findAmendmentOrThrow(amendmentId, t);
  return AmendmentDocument.findAll({
    where: { amendmentId },
    order: [
      ["uploadedOn", "DESC"],
      ["id", "DESC"],
    ],
    transaction: t,
  });
};

/** Deletes the row and returns the stored path for the caller to remove. */
export const deleteDocument = async (documentId: number, t: Transaction): Promise<string> => {
  const document = await findDocumentOrThrow(documentId, t);
  await document.destroy({ transaction: t });
  return document.filePath;
};
