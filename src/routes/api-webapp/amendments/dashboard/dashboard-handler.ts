import { Op, type Transaction } from "sequelize";
import { Amendment } from "../amendment/amendment-model";
import {
  AMENDMENT_STATUSES,
  AMENDMENT_TYPES,
  DEVELOPMENT_STATUSES,
  PRIORITIES,
} from "../../../../utils/constants";

type GroupColumn = "amendmentStatus" | "priority" | "amendmentType" | "developmentStatus";

export interface AmendmentStats {
  total: number;
  byStatus: Record<string, number>;
  byPriority: Record<string, number>;
  byType: Record<string, number>;
  byDevelopmentStatus: Record<string, number>;
  qaPending: number;
  databaseChangesCount: number;
}

// Every known value is present, zero when no row has it
const countBy = async (
  column: GroupColumn,
  values: readonly string[],
  t?: Transaction | null
): Promise<Record<string, number>> => {
  const counts: Record<string, number> = Object.fromEntries(values.map((value) => [value, 0]));
  const rows = await Amendment.count({ group: [column], transaction: t });
  for (const row of rows) {
    const key = String(row[column]);
    counts[key] = (counts[key] ?? 0) + Number(row.count);
  }
  return counts;
};

export const getAmendmentStats = async (t?: Transaction | null): Promise<AmendmentStats> => {
  const [total, byStatus, byPriority, byType, byDevelopmentStatus, qaPending, databaseChangesCount] =
    await Promise.all([
      Amendment.count({ transaction: t }),
      countBy("amendmentStatus", AMENDMENT_STATUSES, t),
      countBy("priority", PRIORITIES, t),
      countBy("amendmentType", AMENDMENT_TYPES, t),
      countBy("developmentStatus", DEVELOPMENT_STATUSES, t),
      Amendment.count({
        where: { qaAssignedId: { [Op.ne]: null }, qaCompleted: false },
        transaction: t,
      }),
      Amendment.count({ where: { databaseChanges: true }, transaction: t }),
    ]);

  return { total, byStatus, byPriority, byType, byDevelopmentStatus, qaPending, databaseChangesCount };
};
