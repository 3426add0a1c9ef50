import { UniqueConstraintError, type Includeable, type Transaction } from "sequelize";
import dbInstance from "../../../../db/core/control-db";
import { config } from "../../../../config/config";
import { warningLog } from "../../../../services/logging-service";
import { GLOBAL_CONSTANTS } from "../../../../utils/constants";
import { ConflictError, NotFoundError, toAppError } from "../../../../utils/app-errors";
import type {
  CreateAmendmentInput,
  UpdateAmendmentInput,
  UpdateAmendmentQaInput,
} from "../../../../validations/amendment-validation";
import { Amendment } from "./amendment-model";
import { buildAmendmentOrder, buildAmendmentWhere, type AmendmentQuery } from "./amendment-filter";
import { AmendmentProgress } from "../amendment-progress/amendment-progress-model";
import { AmendmentApplication } from "../amendment-application/amendment-application-model";
import { AmendmentLink } from "../amendment-link/amendment-link-model";
import { AmendmentDocument } from "../amendment-document/amendment-document-model";
import {
  generateAmendmentReference,
  systemClock,
  type Clock,
  type ReferenceAllocator,
} from "../amendment-reference/amendment-reference-handler";

// Columns returned by the listing; detail reads return everything
const AMENDMENT_SUMMARY_ATTRIBUTES = [
  "id",
  "amendmentReference",
  "amendmentType",
  "description",
  "amendmentStatus",
  "developmentStatus",
  "priority",
  "force",
  "application",
  "reportedBy",
  "assignedTo",
  "dateReported",
  "databaseChanges",
  "dbUpgradeChanges",
  "qaAssignedId",
  "qaCompleted",
  "createdOn",
  "modifiedOn",
] as const;

const amendmentDetailInclude: Includeable[] = [
  { model: AmendmentProgress, as: "progressEntries" },
  { model: AmendmentApplication, as: "applications" },
  {
    model: AmendmentLink,
    as: "links",
    include: [
      {
        model: Amendment,
        as: "linkedAmendment",
        attributes: ["id", "amendmentReference", "description", "amendmentStatus"],
      },
    ],
  },
  { model: AmendmentDocument, as: "documents" },
];

/* ------------------------------------------------------------------
   LOOKUPS
------------------------------------------------------------------- */
export const findAmendmentOrThrow = async (id: number, t?: Transaction | null): Promise<Amendment> => {
  const amendment = await Amendment.findByPk(id, { transaction: t });
  if (!amendment) throw new NotFoundError(`Amendment ${id} not found`);
  return amendment;
};

const findAmendmentDetail = async (where: { id: number } | { amendmentReference: string }, t?: Transaction | null) =>
  Amendment.findOne({
    where,
    include: amendmentDetailInclude,
    order: [
      [{ model: AmendmentProgress, as: "progressEntries" }, "startDate", "DESC"],
      [{ model: AmendmentProgress, as: "progressEntries" }, "id", "DESC"],
    ],
    transaction: t,
  });

export const getAmendmentById = async (id: number, t?: Transaction | null): Promise<Amendment> => {
  const amendment = await findAmendmentDetail({ id }, t);
  if (!amendment) throw new NotFoundError(`Amendment ${id} not found`);
  return amendment;
};

export const getAmendmentByReference = async (reference: string, t?: Transaction | null): Promise<Amendment> => {
  const amendment = await findAmendmentDetail({ amendmentReference: reference }, t);
  if (!amendment) throw new NotFoundError(`Amendment ${reference} not found`);
  return amendment;
};

/* ------------------------------------------------------------------
   LISTING
------------------------------------------------------------------- */
export interface AmendmentPage {
  items: Amendment[];
  total: number;
}

/** Count and page read through the same transaction. */
export const getAmendments = async (query: AmendmentQuery, t: Transaction): Promise<AmendmentPage> => {
  const where = buildAmendmentWhere(query.filter);
  const total = await Amendment.count({ where, transaction: t });
  const items = await Amendment.findAll({
    attributes: [...AMENDMENT_SUMMARY_ATTRIBUTES],
    where,
    order: buildAmendmentOrder(query.sortBy, query.sortOrder),
    offset: query.skip ?? 0,
    limit: query.limit ?? GLOBAL_CONSTANTS.pagination.defaultLimit,
    transaction: t,
  });
  return { items, total };
};

/* ------------------------------------------------------------------
   CREATE
------------------------------------------------------------------- */
export interface CreateAmendmentOptions {
  clock?: Clock;
  allocateReference?: ReferenceAllocator;
  maxAttempts?: number;
}

const isReferenceCollision = (err: unknown): err is UniqueConstraintError =>
  err instanceof UniqueConstraintError && err.errors.some((item) => item.path === "amendmentReference");

/**
 * Allocates a reference and inserts inside a savepoint. A collision on the reference
 * index rolls the savepoint back and allocates again, up to `maxAttempts` times.
 */
export const createAmendment = async (
  input: CreateAmendmentInput,
  t: Transaction,
  options: CreateAmendmentOptions = {}
): Promise<Amendment> => {
  const clock = options.clock ?? systemClock;
  const allocate = options.allocateReference ?? generateAmendmentReference;
  const maxAttempts = Math.max(1, options.maxAttempts ?? config.referenceRetryAttempts);
  const { defaults } = GLOBAL_CONSTANTS;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    // eslint-disable-next-line no-await-in-loop
    const amendmentReference = await allocate({ clock, transaction: t });
    try {
      // eslint-disable-next-line no-await-in-loop
      return await dbInstance.transaction({ transaction: t }, (savepoint) =>
        Amendment.create(
          {
            amendmentReference,
            amendmentType: input.amendmentType,
            description: input.description,
            amendmentStatus: input.amendmentStatus ?? defaults.amendmentStatus,
            developmentStatus: input.developmentStatus ?? defaults.developmentStatus,
            priority: input.priority ?? defaults.priority,
            force: input.force ?? null,
            application: input.application ?? null,
            notes: input.notes ?? null,
            reportedBy: input.reportedBy ?? null,
            assignedTo: input.assignedTo ?? null,
            dateReported: input.dateReported ?? clock.now(),
            databaseChanges: input.databaseChanges ?? false,
            dbUpgradeChanges: input.dbUpgradeChanges ?? false,
            releaseNotes: input.releaseNotes ?? null,
            qaAssignedId: input.qaAssignedId ?? null,
            qaAssignedDate: input.qaAssignedDate ?? null,
            qaTestPlanCheck: input.qaTestPlanCheck ?? false,
            qaTestReleaseNotesCheck: input.qaTestReleaseNotesCheck ?? false,
            qaCompleted: input.qaCompleted ?? false,
            qaSignature: input.qaSignature ?? null,
            qaCompletedDate: input.qaCompletedDate ?? null,
            qaNotes: input.qaNotes ?? null,
            qaTestPlanLink: input.qaTestPlanLink ?? null,
            createdBy: input.createdBy ?? null,
            modifiedBy: null,
          },
          { transaction: savepoint }
        )
      );
    } catch (err) {
      if (!isReferenceCollision(err)) throw toAppError(err);
      warningLog(`Amendment reference ${amendmentReference} already taken (attempt ${attempt}/${maxAttempts})`);
    }
  }

  throw new ConflictError(`Could not allocate a unique amendment reference after ${maxAttempts} attempts`);
};

/* ------------------------------------------------------------------
   UPDATE
------------------------------------------------------------------- */

// Writes only the keys present; modifiedOn moves even when nothing else changed
const applyPartialUpdate = async (
  amendment: Amendment,
  fields: Partial<Omit<UpdateAmendmentInput, "modifiedBy">>,
  modifiedBy: string | null | undefined,
  t: Transaction
): Promise<Amendment> => {
  amendment.set(fields);
  if (modifiedBy !== undefined) amendment.modifiedBy = modifiedBy;
  amendment.changed("modifiedOn", true);
  try {
    return await amendment.save({ transaction: t });
  } catch (err) {
    throw toAppError(err);
  }
};

export const updateAmendment = async (
  id: number,
  input: UpdateAmendmentInput,
  t: Transaction
): Promise<Amendment> => {
  const amendment = await findAmendmentOrThrow(id, t);
  const { modifiedBy, ...fields } = input;
  return applyPartialUpdate(amendment, fields, modifiedBy, t);
};

export const updateAmendmentQa = async (
  id: number,
  input: UpdateAmendmentQaInput,
  t: Transaction
): Promise<Amendment> => {
  const amendment = await findAmendmentOrThrow(id, t);
  const { modifiedBy, ...qaFields } = input;
  return applyPartialUpdate(amendment, qaFields, modifiedBy, t);
};

export interface BulkUpdateResult {
  updatedCount: number;
  failedIds: number[];
  errors: Record<string, string>;
}

/** Each id commits or rolls back on its own. */
export const bulkUpdateAmendments = async (
  amendmentIds: number[],
  updates: UpdateAmendmentInput
): Promise<BulkUpdateResult> => {
  const result: BulkUpdateResult = { updatedCount: 0, failedIds: [], errors: {} };

  for (const id of new Set(amendmentIds)) {
    try {
      // eslint-disable-next-line no-await-in-loop
      await dbInstance.transaction((t) => updateAmendment(id, updates, t));
      result.updatedCount += 1;
    } catch (err) {
      result.failedIds.push(id);
      result.errors[String(id)] = toAppError(err).message;
    }
  }

  return result;
};

/* ------------------------------------------------------------------
   DELETE
------------------------------------------------------------------- */

/**
 * Removes the amendment with its progress, application links, outgoing links and
 * document rows. Returns the stored file paths; removing the files is the caller's job.
 */
export const deleteAmendment = async (id: number, t: Transaction): Promise<string[]> => {
  const amendment = await findAmendmentOrThrow(id, t);

  const documents = await AmendmentDocument.findAll({
    attributes: ["id", "filePath"],
    where: { amendmentId: id },
    transaction: t,
  });

  await AmendmentProgress.destroy({ where: { amendmentId: id }, transaction: t });
  await AmendmentApplication.destroy({ where: { amendmentId: id }, transaction: t });
  await AmendmentLink.destroy({ where: { amendmentId: id }, transaction: t });
  await AmendmentDocument.destroy({ where: { amendmentId: id }, transaction: t });
  await amendment.destroy({ transaction: t });

  return documents.map((document) => document.filePath);
};
