import type { Transaction } from "sequelize";
import { AmendmentProgress } from "./amendment-progress-model";
import { findAmendmentOrThrow } from "../amendment/amendment-handler";
import { NotFoundError, toAppError } from "../../../../utils/app-errors";
import type { CreateProgressInput, UpdateProgressInput } from "../../../../validations/amendment-validation";

const findProgressOrThrow = async (progressId: number, t?: Transaction | null) => {
  const progress = await AmendmentProgress.findByPk(progressId, { transaction: t });
  if (!progress) throw new NotFoundError(`Progress entry ${progressId} not found`);
  return progress;
};

export const addProgress = async (amendmentId: number, input: CreateProgressInput, t: Transaction) => {
  await findAmendmentOrThrow(amendmentId, t);
  try {
    return await AmendmentProgress.create(
      {
        amendmentId,
        startDate: input.startDate ?? new Date(),
        description: input.description,
        notes: input.notes ?? null,
        createdBy: input.createdBy ?? null,
        modifiedBy: null,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

// Newest first
export const getProgressForAmendment = async (amendmentId: number, t?: Transaction | null) => {
  await findAmendmentOrThrow(amendmentId, t);
  return AmendmentProgress.findAll({
    where: { amendmentId },
    order: [
      ["startDate", "DESC"],
      ["id", "DESC"],
    ],
    transaction: t,
  });
};

export const updateProgress = async (progressId: number, input: UpdateProgressInput, t: Transaction) => {
  const progress = await findProgressOrThrow(progressId, t);
  const { modifiedBy, ...fields } = input;
  progress.set(fields);
  if (modifiedBy !== undefined) progress.modifiedBy = modifiedBy;
  progress.changed("modifiedOn", true);
  try {
    return await progress.save({ transaction: t });
  } catch (err) {
    throw toAppError(err);
  }
};

export const deleteProgress = async (progressId: number, t: Transaction) => {
  const progress = await findProgressOrThrow(progressId, t);
  await progress.destroy({ transaction: t });
};
