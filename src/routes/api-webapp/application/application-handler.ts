import type { Transaction } from "sequelize";
import { Application } from "./application-model";
import { ApplicationVersion } from "./application-version-model";
import { ConflictError, NotFoundError, toAppError } from "../../../utils/app-errors";
import type {
  CreateApplicationInput,
  CreateApplicationVersionInput,
  UpdateApplicationInput,
} from "../../../validations/catalog-validation";

const versionsInclude = { model: ApplicationVersion, as: "versions" };

export const findApplicationOrThrow = async (id: number, t?: Transaction | null) => {
  const application = await Application.findByPk(id, { include: [versionsInclude], transaction: t });
  if (!application) throw new NotFoundError(`Application ${id} not found`);
  return application;
};

const assertNameAvailable = async (applicationName: string, t: Transaction, exceptId?: number) => {
  const existing = await Application.findOne({ where: { applicationName }, transaction: t });
  if (existing && existing.id !== exceptId) {
    throw new ConflictError(`Application "${applicationName}" already exists`);
  }
};

export const addApplication = async (input: CreateApplicationInput, t: Transaction) => {
  await assertNameAvailable(input.applicationName, t);
  try {
    return await Application.create(
      {
        applicationName: input.applicationName,
        description: input.description ?? null,
        isActive: input.isActive ?? true,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

export const getApplications = async () =>
  Application.findAll({
    include: [versionsInclude],
    order: [
      ["applicationName", "ASC"],
      [versionsInclude, "id", "ASC"],
    ],
  });

export const updateApplication = async (id: number, input: UpdateApplicationInput, t: Transaction) => {
  const application = await findApplicationOrThrow(id, t);
  if (input.applicationName !== undefined) await assertNameAvailable(input.applicationName, t, id);
  application.set(input);
  try {
    return await application.save({ transaction: t });
  } catch (err) {
    throw toAppError(err);
  }
};

export const deleteApplication = async (id: number, t: Transaction) => {
  const application = await findApplicationOrThrow(id, t);
  await ApplicationVersion.destroy({ where: { applicationId: id }, transaction: t });
  await application.destroy({ transaction: t });
};

export const addApplicationVersion = async (
  applicationId: number,
  input: CreateApplicationVersionInput,
  t: Transaction
) => {
  await findApplicationOrThrow(applicationId, t);
  try {
    return await ApplicationVersion.create(
      {
        applicationId,
        version: input.version,
        releasedDate: input.releasedDate ?? null,
        notes: input.notes ?? null,
        isActive: input.isActive ?? true,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

export const getApplicationVersions = async (applicationId: number) => {
  await findApplicationOrThrow(applicationId);
  return ApplicationVersion.findAll({ where: { applicationId }, order: [["id", "ASC"]] });
};

export const deleteApplicationVersion = async (versionId: number, t: Transaction) => {
  const version = await ApplicationVersion.findByPk(versionId, { transaction: t });
  if (!version) throw new NotFoundError(`Application version ${versionId} not found`);
  await version.destroy({ transaction: t });
};
