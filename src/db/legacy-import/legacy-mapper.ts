import type { CreationAttributes } from "sequelize";
import type { Amendment } from "../../routes/api-webapp/amendments/amendment/amendment-model";
import {
  PRIORITIES,
  type AmendmentStatus,
  type AmendmentType,
  type DevelopmentStatus,
  type Priority,
} from "../../utils/constants";
import type { LegacyRow, LegacyValue } from "./legacy-sql-parser";

export type LegacyAmendmentRecord = CreationAttributes<Amendment>;

export interface LegacyApplicationLink {
  applicationName: string;
  reportedVersion: string;
  appliedVersion: string | null;
}

export interface LegacyMapping {
  amendment: LegacyAmendmentRecord;
  application: LegacyApplicationLink | null;
  // Leading digits of the old reference, e.g. 1000 for "1000E(a)"
  referenceNumber: number | null;
}

const STATUS_MAP: Record<string, AmendmentStatus> = {
  "Applied To Master": "Completed",
  "Released to Customers": "Deployed",
  Completed: "Completed",
  "In Progress": "In Progress",
  Testing: "Testing",
  Open: "Open",
};

const TYPE_MAP: Record<string, AmendmentType> = {
  Enhancement: "Enhancement",
  Fault: "Fault",
  Suggestion: "Suggestion",
  Bug: "Fault",
  Feature: "Enhancement",
};

const APPLICATION_NAME_FIXES: Record<string, string> = {
  "Centurion ENglish": "Centurion English",
};

const NO_DESCRIPTION = "(No description provided)";

/* ------------------------------------------------------------------
   VALUE COERCION
------------------------------------------------------------------- */
const asText = (value: LegacyValue | undefined): string | null => {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

const asFlag = (value: LegacyValue | undefined): boolean => {
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return ["1", "true", "yes"].includes(value.trim().toLowerCase());
  return false;
};

const asInteger = (value: LegacyValue | undefined): number | null => {
  if (typeof value === "number") return Number.isInteger(value) ? value : Math.trunc(value);
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number.parseInt(value, 10);
  return null;
};

const asDate = (value: LegacyValue | undefined): Date | null => {
  if (value instanceof Date) return value;
  if (typeof value === "string") {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
};

/* ------------------------------------------------------------------
   REMAPPING RULES
------------------------------------------------------------------- */
export const mapLegacyStatus = (status: string | null): AmendmentStatus =>
  (status && STATUS_MAP[status]) || "Open";

export const mapLegacyType = (type: string | null): AmendmentType => (type && TYPE_MAP[type]) || "Bug";

export const deriveDevelopmentStatus = (status: AmendmentStatus): DevelopmentStatus => {
  switch (status) {
    case "Deployed":
    case "Completed":
    case "Testing":
      return "Ready for QA";
    case "In Progress":
      return "In Development";
    default:
      return "Not Started";
  }
};

export const mapLegacyPriority = (priority: string | null): Priority => {
  const wanted = priority?.trim().toLowerCase();
  return PRIORITIES.find((candidate) => candidate.toLowerCase() === wanted) ?? "Medium";
};

/** "Centurion English (4.2.1)" -> name and version; anything else -> null. */
export const parseApplicationText = (text: string | null): { applicationName: string; version: string } | null => {
  if (!text) return null;
  const match = /^(.+?)\s*\(([^)]+)\)$/.exec(text.trim());
  if (!match) return null;
  const name = match[1].trim();
  return { applicationName: APPLICATION_NAME_FIXES[name] ?? name, version: match[2].trim() };
};

export const parseReferenceNumber = (reference: string | null): number | null => {
  const match = reference ? /^(\d+)/.exec(reference) : null;
  return match ? Number.parseInt(match[1], 10) : null;
};

/**
 * Old "Amendment" row -> new amendment fields plus the optional application link.
 * No database access; `now` fills timestamps the old row lacks.
 */
export const mapLegacyRecord = (row: LegacyRow, now: Date): LegacyMapping => {
  const amendmentStatus = mapLegacyStatus(asText(row["Amendment Status"]));
  const amendmentType = mapLegacyType(asText(row["Amendment Type"]));
  const amendmentReference = asText(row["Amendment Reference"]) ?? "";
  const dateReported = asDate(row["Date Reported"]);
  const createdOn = asDate(row["Created On"]) ?? dateReported ?? now;
  const modifiedOn = asDate(row["Modified On"]) ?? asDate(row["Created On"]) ?? now;
  const legacyId = asInteger(row["Amendment Id"]);

  const amendment: LegacyAmendmentRecord = {
    ...(legacyId !== null ? { id: legacyId } : {}),
    amendmentReference,
    amendmentType,
    description: asText(row.Description)?.trim() || NO_DESCRIPTION,
    amendmentStatus,
    developmentStatus: deriveDevelopmentStatus(amendmentStatus),
    priority: mapLegacyPriority(asText(row.Priority)),
    force: asText(row.Force),
    // application moves to the link table
    application: null,
    notes: asText(row.Notes),
    reportedBy: asText(row["Reported By"]),
    assignedTo: asText(row["Assigned To"]),
    dateReported,
    databaseChanges: asFlag(row["Database Changes"]),
    dbUpgradeChanges: asFlag(row["DB Upgrade Changes"]),
    releaseNotes: asText(row["Release Notes"]),
    qaAssignedId: asInteger(row["QA Assigned Id"]),
    qaAssignedDate: asDate(row["QA Assigned Date"]),
    qaTestPlanCheck: asFlag(row["QA Test Plan Check"]),
    qaTestReleaseNotesCheck: asFlag(row["QA Test Release Notes Check"]),
    qaCompleted: asFlag(row["QA Completed"]),
    qaSignature: asText(row["QA Signature"]),
    qaCompletedDate: asDate(row["QA Completed Date"]),
    qaNotes: asText(row["QA Notes"]),
    qaTestPlanLink: asText(row["QA Test Plan Link"]),
    createdBy: asText(row["Created By"]),
    createdOn,
    modifiedBy: asText(row["Modified By"]),
    modifiedOn,
  };

  const parsedApplication = parseApplicationText(asText(row.Application));
  const application: LegacyApplicationLink | null = parsedApplication
    ? {
        applicationName: parsedApplication.applicationName,
        reportedVersion: parsedApplication.version,
        appliedVersion: asText(row["Applied Version"]),
      }
    : null;

  return { amendment, application, referenceNumber: parseReferenceNumber(amendmentReference) };
};

/* ------------------------------------------------------------------
   REFERENCE HIGH-WATER MARKS
------------------------------------------------------------------- */
export type ReferenceCounters = Record<AmendmentType, number>;

export const emptyReferenceCounters = (): ReferenceCounters => ({
  Bug: 0,
  Fault: 0,
  Enhancement: 0,
  Feature: 0,
  Suggestion: 0,
  Maintenance: 0,
  Documentation: 0,
});

export const trackReference = (counters: ReferenceCounters, mapping: LegacyMapping): void => {
  const { amendmentType } = mapping.amendment;
  if (mapping.referenceNumber !== null && mapping.referenceNumber > counters[amendmentType]) {
    counters[amendmentType] = mapping.referenceNumber;
  }
};
