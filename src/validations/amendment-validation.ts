import { z } from "zod";
import {
  AMENDMENT_STATUSES,
  AMENDMENT_TYPES,
  DEVELOPMENT_STATUSES,
  DOCUMENT_TYPES,
  GLOBAL_CONSTANTS,
  LINK_TYPES,
  PRIORITIES,
} from "../utils/constants";

const text = (max?: number) => (max ? z.string().max(max) : z.string());
const optionalText = (max?: number) => text(max).nullish();
const optionalDate = z.coerce.date().nullish();

/* ------------------------------------------------------------------
   AMENDMENT BODIES
------------------------------------------------------------------- */
const qaFields = {
  qaAssignedId: z.number().int().positive().nullish(),
  qaAssignedDate: optionalDate,
  qaTestPlanCheck: z.boolean().optional(),
  qaTestReleaseNotesCheck: z.boolean().optional(),
  qaCompleted: z.boolean().optional(),
  qaSignature: optionalText(100),
  qaCompletedDate: optionalDate,
  qaNotes: optionalText(),
  qaTestPlanLink: optionalText(500),
};

const amendmentFields = {
  amendmentType: z.enum(AMENDMENT_TYPES),
  description: z.string().trim().min(1, "Description is required"),
  amendmentStatus: z.enum(AMENDMENT_STATUSES).optional(),
  developmentStatus: z.enum(DEVELOPMENT_STATUSES).optional(),
  priority: z.enum(PRIORITIES).optional(),
  force: optionalText(50),
  application: optionalText(100),
  notes: optionalText(),
  reportedBy: optionalText(100),
  assignedTo: optionalText(100),
  dateReported: optionalDate,
  databaseChanges: z.boolean().optional(),
  dbUpgradeChanges: z.boolean().optional(),
  releaseNotes: optionalText(),
  ...qaFields,
};

// amendmentReference is never accepted from a caller; unknown keys are stripped
export const v_create_amendment = z.object({
  ...amendmentFields,
  createdBy: optionalText(100),
});

export const v_update_amendment = z
  .object(amendmentFields)
  .partial()
  .extend({ modifiedBy: optionalText(100) });

export const v_update_amendment_qa = z.object(qaFields).extend({ modifiedBy: optionalText(100) });

export const v_bulk_update_amendments = z.object({
  amendmentIds: z.array(z.number().int().positive()).min(1, "At least one amendment id is required"),
  updates: v_update_amendment,
});

export type CreateAmendmentInput = z.infer<typeof v_create_amendment>;
export type UpdateAmendmentInput = z.infer<typeof v_update_amendment>;
export type UpdateAmendmentQaInput = z.infer<typeof v_update_amendment_qa>;
export type BulkUpdateAmendmentsInput = z.infer<typeof v_bulk_update_amendments>;

/* ------------------------------------------------------------------
   CHILD RECORDS
------------------------------------------------------------------- */
export const v_create_progress = z.object({
  startDate: optionalDate,
  description: z.string().trim().min(1, "Description is required"),
  notes: optionalText(),
  createdBy: optionalText(100),
});

export const v_update_progress = v_create_progress
  .omit({ createdBy: true })
  .partial()
  .extend({ modifiedBy: optionalText(100) });

export const v_create_amendment_application = z.object({
  applicationId: z.number().int().positive().nullish(),
  applicationName: optionalText(100),
  reportedVersion: optionalText(50),
  appliedVersion: optionalText(50),
  developmentStatus: z.enum(DEVELOPMENT_STATUSES).nullish(),
});

export const v_update_amendment_application = v_create_amendment_application.partial();

export const v_create_link = z.object({
  linkedAmendmentId: z.number().int().positive(),
  linkType: z.enum(LINK_TYPES).optional(),
});

export const v_document_fields = z.object({
  documentName: optionalText(255),
  documentType: z.enum(DOCUMENT_TYPES).optional(),
  description: optionalText(),
  uploadedBy: optionalText(100),
});

export type CreateProgressInput = z.infer<typeof v_create_progress>;
export type UpdateProgressInput = z.infer<typeof v_update_progress>;
export type CreateAmendmentApplicationInput = z.infer<typeof v_create_amendment_application>;
export type UpdateAmendmentApplicationInput = z.infer<typeof v_update_amendment_application>;
export type CreateLinkInput = z.infer<typeof v_create_link>;
export type DocumentFieldsInput = z.infer<typeof v_document_fields>;

/* ------------------------------------------------------------------
   LISTING QUERY (flat snake_case query string)
------------------------------------------------------------------- */

// "a,b" and ?x=a&x=b both become ["a", "b"]; blanks are dropped
const csv = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) return undefined;
    const raw = Array.isArray(value) ? value : [value];
    return raw
      .flatMap((entry) => String(entry).split(","))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }, z.array(item).optional());

// ?x= carries no filter
const blankAsMissing = (value: unknown) =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const queryText = z.preprocess(blankAsMissing, z.string().trim().optional());

const flag = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (["true", "1", "yes"].includes(lowered)) return true;
  if (["false", "0", "no"].includes(lowered)) return false;
  return value;
}, z.boolean().optional());

const queryDate = z.preprocess(blankAsMissing, z.coerce.date().optional());

export const v_amendment_query = z
  .object({
    amendment_reference: queryText,
    amendment_ids: csv(z.coerce.number().int().positive()),
    amendment_status: csv(z.enum(AMENDMENT_STATUSES)),
    development_status: csv(z.enum(DEVELOPMENT_STATUSES)),
    priority: csv(z.enum(PRIORITIES)),
    amendment_type: csv(z.enum(AMENDMENT_TYPES)),
    force: csv(z.string()),
    application: csv(z.string()),
    assigned_to: csv(z.string()),
    reported_by: csv(z.string()),
    date_reported_from: queryDate,
    date_reported_to: queryDate,
    created_on_from: queryDate,
    created_on_to: queryDate,
    modified_on_from: queryDate,
    modified_on_to: queryDate,
    search_text: queryText,
    qa_completed: flag,
    qa_assigned: flag,
    database_changes: flag,
    db_upgrade_changes: flag,
    sort_by: z.string().optional(),
    sort_order: z.enum(["asc", "desc"]).default("desc"),
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce
      .number()
      .int()
      .min(1)
      .max(GLOBAL_CONSTANTS.pagination.maxLimit)
      .default(GLOBAL_CONSTANTS.pagination.defaultLimit),
  })
  .transform((q) => ({
    filter: {
      amendmentReference: q.amendment_reference,
      amendmentIds: q.amendment_ids,
      amendmentStatus: q.amendment_status,
      developmentStatus: q.development_status,
      priority: q.priority,
      amendmentType: q.amendment_type,
      force: q.force,
      application: q.application,
      assignedTo: q.assigned_to,
      reportedBy: q.reported_by,
      dateReportedFrom: q.date_reported_from,
      dateReportedTo: q.date_reported_to,
      createdOnFrom: q.created_on_from,
      createdOnTo: q.created_on_to,
      modifiedOnFrom: q.modified_on_from,
      modifiedOnTo: q.modified_on_to,
      searchText: q.search_text,
      qaCompleted: q.qa_completed,
      qaAssigned: q.qa_assigned,
      databaseChanges: q.database_changes,
      dbUpgradeChanges: q.db_upgrade_changes,
    },
    sortBy: q.sort_by,
    sortOrder: q.sort_order,
    skip: q.skip,
    limit: q.limit,
  }));

