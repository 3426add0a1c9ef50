import dbInstance from "../core/control-db";
import { Amendment } from "../../routes/api-webapp/amendments/amendment/amendment-model";
import { AmendmentApplication } from "../../routes/api-webapp/amendments/amendment-application/amendment-application-model";
import { AmendmentReferences } from "../../routes/api-webapp/amendments/amendment-reference/amendment-reference-model";
import { Application } from "../../routes/api-webapp/application/application-model";
import { infoLog, warningLog } from "../../services/logging-service";
import {
  emptyReferenceCounters,
  mapLegacyRecord,
  trackReference,
  type ReferenceCounters,
} from "./legacy-mapper";
import { extractAmendmentInserts, parseInsertColumns, parseInsertRow } from "./legacy-sql-parser";

export interface LegacyImportOptions {
  now?: Date;
}

export interface LegacyImportReport {
  found: number;
  migrated: number;
  skipped: number;
  applicationLinks: number;
  referenceCounters: ReferenceCounters;
  referencesInitialised: boolean;
}

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Loads every `INSERT [dbo].[Amendment]` line. Each record commits on its own, so a
 * bad row is counted as skipped without undoing the rest. Old ids and timestamps are kept.
 */
export const importLegacyDump = async (
  content: string,
  options: LegacyImportOptions = {}
): Promise<LegacyImportReport> => {
  const now = options.now ?? new Date();
  const statements = extractAmendmentInserts(content);
  const report: LegacyImportReport = {
    found: statements.length,
    migrated: 0,
    skipped: 0,
    applicationLinks: 0,
    referenceCounters: emptyReferenceCounters(),
    referencesInitialised: false,
  };

  if (statements.length === 0) return report;

  const columns = parseInsertColumns(statements[0]);
  if (!columns) {
    warningLog("Could not read the column list of the first INSERT; nothing imported");
    report.skipped = statements.length;
    return report;
  }

  for (const [index, statement] of statements.entries()) {
    const row = parseInsertRow(statement, columns);
    if (!row) {
      warningLog(`Skipping record ${index + 1}: VALUES clause unreadable or column count mismatch`);
      report.skipped++;
      continue;
    }

    const mapping = mapLegacyRecord(row, now);
    if (!mapping.amendment.amendmentReference) {
      warningLog(`Skipping record ${index + 1}: no amendment reference`);
      report.skipped++;
      continue;
    }
    trackReference(report.referenceCounters, mapping);

    try {
      // eslint-disable-next-line no-await-in-loop
      const linked = await dbInstance.transaction(async (t) => {
        const amendment = await Amendment.create(mapping.amendment, { transaction: t, silent: true });
        if (!mapping.application) return false;

        const application = await Application.findOne({
          where: { applicationName: mapping.application.applicationName },
          transaction: t,
        });
        if (!application) return false;

        await AmendmentApplication.create(
          {
            amendmentId: amendment.id,
            applicationId: application.id,
            applicationName: mapping.application.applicationName,
            reportedVersion: mapping.application.reportedVersion,
            appliedVersion: mapping.application.appliedVersion,
            developmentStatus: amendment.developmentStatus,
          },
          { transaction: t }
        );
        return true;
      });
      report.migrated++;
      if (linked) report.applicationLinks++;
      if (report.migrated % 100 === 0) infoLog(`Imported ${report.migrated}/${statements.length} amendments`);
    } catch (err) {
      warningLog(`Skipping record ${index + 1} (id ${String(row["Amendment Id"])}): ${describeError(err)}`);
      report.skipped++;
    }
  }

  // Only the first import seeds the counters row
  if ((await AmendmentReferences.count()) === 0) {
    const counters = report.referenceCounters;
    await AmendmentReferences.create({
      bugReference: counters.Bug,
      faultReference: counters.Fault,
      enhancementReference: counters.Enhancement,
      featureReference: counters.Feature,
      suggestionReference: counters.Suggestion,
      maintenanceReference: counters.Maintenance,
      documentationReference: counters.Documentation,
    });
    report.referencesInitialised = true;
  }

  return report;
};
