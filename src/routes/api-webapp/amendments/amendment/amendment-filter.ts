import { Op, type InferAttributes, type Order, type WhereOptions } from "sequelize";
import type { Amendment } from "./amendment-model";
import type {
  AmendmentStatus,
  AmendmentType,
  DevelopmentStatus,
  Priority,
} from "../../../../utils/constants";

type AmendmentAttributes = InferAttributes<Amendment>;
type AmendmentWhere = WhereOptions<AmendmentAttributes>;

export interface AmendmentFilter {
  amendmentReference?: string;
  amendmentIds?: number[];
  amendmentStatus?: AmendmentStatus[];
  developmentStatus?: DevelopmentStatus[];
  priority?: Priority[];
  amendmentType?: AmendmentType[];
  force?: string[];
  application?: string[];
  assignedTo?: string[];
  reportedBy?: string[];
  dateReportedFrom?: Date;
  dateReportedTo?: Date;
  createdOnFrom?: Date;
  createdOnTo?: Date;
  modifiedOnFrom?: Date;
  modifiedOnTo?: Date;
  searchText?: string;
  qaCompleted?: boolean;
  qaAssigned?: boolean;
  databaseChanges?: boolean;
  dbUpgradeChanges?: boolean;
}

export type SortOrder = "asc" | "desc";

export interface AmendmentQuery {
  filter: AmendmentFilter;
  sortBy?: string;
  sortOrder?: SortOrder;
  skip?: number;
  limit?: number;
}

const hasValues = <T>(values: T[] | undefined): values is T[] => Array.isArray(values) && values.length > 0;

/**
 * Every provided filter is ANDed; list filters match any of their values.
 * Empty lists and undefined values are ignored.
 */
export const buildAmendmentWhere = (filter: AmendmentFilter): AmendmentWhere => {
  const conditions: AmendmentWhere[] = [];

  if (filter.amendmentReference) {
    conditions.push({ amendmentReference: { [Op.substring]: filter.amendmentReference } });
  }
  if (hasValues(filter.amendmentIds)) conditions.push({ id: { [Op.in]: filter.amendmentIds } });
  if (hasValues(filter.amendmentStatus)) {
    conditions.push({ amendmentStatus: { [Op.in]: filter.amendmentStatus } });
  }
  if (hasValues(filter.developmentStatus)) {
    conditions.push({ developmentStatus: { [Op.in]: filter.developmentStatus } });
  }
  if (hasValues(filter.priority)) conditions.push({ priority: { [Op.in]: filter.priority } });
  if (hasValues(filter.amendmentType)) {
    conditions.push({ amendmentType: { [Op.in]: filter.amendmentType } });
  }
  if (hasValues(filter.force)) conditions.push({ force: { [Op.in]: filter.force } });
  if (hasValues(filter.application)) conditions.push({ application: { [Op.in]: filter.application } });
  if (hasValues(filter.assignedTo)) conditions.push({ assignedTo: { [Op.in]: filter.assignedTo } });
  if (hasValues(filter.reportedBy)) conditions.push({ reportedBy: { [Op.in]: filter.reportedBy } });

  // Inclusive bounds, either side optional
  if (filter.dateReportedFrom) conditions.push({ dateReported: { [Op.gte]: filter.dateReportedFrom } });
  if (filter.dateReportedTo) conditions.push({ dateReported: { [Op.lte]: filter.dateReportedTo } });
  if (filter.createdOnFrom) conditions.push({ createdOn: { [Op.gte]: filter.createdOnFrom } });
  if (filter.createdOnTo) conditions.push({ createdOn: { [Op.lte]: filter.createdOnTo } });
  if (filter.modifiedOnFrom) conditions.push({ modifiedOn: { [Op.gte]: filter.modifiedOnFrom } });
  if (filter.modifiedOnTo) conditions.push({ modifiedOn: { [Op.lte]: filter.modifiedOnTo } });

  if (filter.searchText) {
    const term = filter.searchText;
    conditions.push({
      [Op.or]: [
        { description: { [Op.substring]: term } },
        { notes: { [Op.substring]: term } },
        { releaseNotes: { [Op.substring]: term } },
      ],
    });
  }

  if (filter.qaCompleted !== undefined) conditions.push({ qaCompleted: filter.qaCompleted });
  if (filter.qaAssigned !== undefined) {
    conditions.push({ qaAssignedId: filter.qaAssigned ? { [Op.ne]: null } : null });
  }
  if (filter.databaseChanges !== undefined) conditions.push({ databaseChanges: filter.databaseChanges });
  if (filter.dbUpgradeChanges !== undefined) {
    conditions.push({ dbUpgradeChanges: filter.dbUpgradeChanges });
  }

  return conditions.length > 0 ? { [Op.and]: conditions } : {};
};

/* ------------------------------------------------------------------
   SORTING
------------------------------------------------------------------- */
const SORT_KEYS = {
  id: "id",
  amendment_reference: "amendmentReference",
  amendment_type: "amendmentType",
  amendment_status: "amendmentStatus",
  development_status: "developmentStatus",
  priority: "priority",
  force: "force",
  application: "application",
  assigned_to: "assignedTo",
  reported_by: "reportedBy",
  date_reported: "dateReported",
  created_on: "createdOn",
  modified_on: "modifiedOn",
  qa_completed: "qaCompleted",
} as const satisfies Record<string, keyof AmendmentAttributes>;

export type SortColumn = (typeof SORT_KEYS)[keyof typeof SORT_KEYS];

const sortColumns = new Map<string, SortColumn>();
for (const [key, column] of Object.entries(SORT_KEYS)) {
  sortColumns.set(key, column);
  sortColumns.set(column, column);
}

/** Unknown or missing keys fall back to the primary key. */
export const resolveSortColumn = (sortBy: string | undefined): SortColumn =>
  (sortBy && sortColumns.get(sortBy.trim())) || "id";

export const buildAmendmentOrder = (sortBy: string | undefined, sortOrder: SortOrder = "desc"): Order => {
  const column = resolveSortColumn(sortBy);
  const direction = sortOrder === "asc" ? "ASC" : "DESC";
  return column === "id" ? [["id", direction]] : [[column, direction], ["id", direction]];
};
