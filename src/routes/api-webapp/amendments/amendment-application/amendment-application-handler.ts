import type { Transaction } from "sequelize";
import { AmendmentApplication } from "./amendment-application-model";
import { Application } from "../../application/application-model";
import { findAmendmentOrThrow } from "../amendment/amendment-handler";
import { NotFoundError, throwValidation, toAppError } from "../../../../utils/app-errors";
import type {
  CreateAmendmentApplicationInput,
  UpdateAmendmentApplicationInput,
} from "../../../../validations/amendment-validation";

const findCatalogApplication = async (applicationId: number, t: Transaction) => {
  const application = await Application.findByPk(applicationId, { transaction: t });
  if (!application) throw new NotFoundError(`Application ${applicationId} not found`);
  return application;
};

const findAmendmentApplicationOrThrow = async (id: number, t?: Transaction | null) => {
  const link = await AmendmentApplication.findByPk(id, { transaction: t });
  if (!link) throw new NotFoundError(`Application link ${id} not found`);
  return link;
};

/** A catalogued application must exist; its name fills in a missing applicationName. */
export const addAmendmentApplication = async (
  amendmentId: number,
  input: CreateAmendmentApplicationInput,
  t: Transaction
) => {
  await findAmendmentOrThrow(amendmentId, t);

  let applicationName = input.applicationName?.trim() || null;
  if (input.applicationId) {
    const application = await findCatalogApplication(input.applicationId, t);
    applicationName = applicationName ?? application.applicationName;
  }
  if (!applicationName) {
    throwValidation("applicationName or applicationId is required");
  }

  try {
    return await AmendmentApplication.create(
      {
        amendmentId,
        applicationId: input.applicationId ?? null,
        applicationName,
        reportedVersion: input.reportedVersion ?? null,
        appliedVersion: input.appliedVersion ?? null,
        developmentStatus: input.developmentStatus ?? null,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

export const getAmendmentApplications = async (amendmentId: number, t?: Transaction | null) => {
  await findAmendmentOrThrow(amendmentId, t);
  return AmendmentApplication.findAll({
    where: { amendmentId },
    order: [["id", "ASC"]],
    transaction: t,
  });
};

export const updateAmendmentApplication = async (
  id: number,
  input: UpdateAmendmentApplicationInput,
  t: Transaction
) => {
  const link = await findAmendmentApplicationOrThrow(id, t);
  if (input.applicationId) {
    const application = await findCatalogApplication(input.applicationId, t);
    if (input.applicationName === undefined) link.applicationName = application.applicationName;
  }
  const { applicationName, ...fields } = input;
  link.set(fields);
  if (applicationName !== undefined) {
    const name = applicationName?.trim();
    if (!name) throwValidation("applicationName cannot be empty");
    link.applicationName = name;
  }
  try {
    return await link.save({ transaction: t });
  } catch (err) {
    throw toAppError(err);
  }
};

export const deleteAmendmentApplication = async (id: number, t: Transaction) => {
  const link = await findAmendmentApplicationOrThrow(id, t);
  await link.destroy({ transaction: t });
};
