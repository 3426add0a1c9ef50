import type { Sequelize, Transaction } from "sequelize";
import { Amendment } from "../../routes/api-webapp/amendments/amendment/amendment-model";
import { AmendmentProgress } from "../../routes/api-webapp/amendments/amendment-progress/amendment-progress-model";
import { AmendmentApplication } from "../../routes/api-webapp/amendments/amendment-application/amendment-application-model";
import { AmendmentLink } from "../../routes/api-webapp/amendments/amendment-link/amendment-link-model";
import { AmendmentDocument } from "../../routes/api-webapp/amendments/amendment-document/amendment-document-model";
import { Employee } from "../../routes/api-webapp/employee/employee-model";
import { Application } from "../../routes/api-webapp/application/application-model";
import { ApplicationVersion } from "../../routes/api-webapp/application/application-version-model";
import { formatReference } from "../../routes/api-webapp/amendments/amendment-reference/amendment-reference-handler";
import {
  AMENDMENT_TYPES,
  FORCES,
  LINK_TYPES,
  PRIORITIES,
  type AmendmentStatus,
  type DevelopmentStatus,
} from "../../utils/constants";
import seedData from "./seed-data.json";

/** Returns a float in [0, 1). Math.random by default; tests pass a seeded one. */
export type RandomSource = () => number;

export interface SeedOptions {
  count?: number;
  random?: RandomSource;
  now?: Date;
  clear?: boolean;
}

export interface SeedReport {
  employees: number;
  applications: number;
  amendments: number;
  progressEntries: number;
  applicationLinks: number;
  links: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const addDays = (date: Date, days: number) => new Date(date.getTime() + days * DAY_MS);

export const randomInt = (random: RandomSource, min: number, max: number) =>
  min + Math.floor(random() * (max - min + 1));

export const pick = <T>(random: RandomSource, items: readonly T[]): T => items[Math.floor(random() * items.length)];

const sample = <T>(random: RandomSource, items: readonly T[], size: number): T[] => {
  const pool = [...items];
  const chosen: T[] = [];
  while (chosen.length < size && pool.length > 0) {
    chosen.push(pool.splice(Math.floor(random() * pool.length), 1)[0]);
  }
  return chosen;
};

// Recent amendments lean open, older ones lean finished
export const statusPoolFor = (daysAgo: number): AmendmentStatus[] => {
  if (daysAgo < 10) return ["Open", "In Progress", "Open", "In Progress", "Open", "In Progress", "Testing", "Completed"];
  if (daysAgo < 30) return ["In Progress", "Testing", "In Progress", "Testing", "Completed", "Deployed"];
  return ["Completed", "Deployed", "Completed", "Deployed", "Completed", "Deployed", "Testing"];
};

const DEVELOPMENT_FOR_STATUS: Record<AmendmentStatus, DevelopmentStatus[]> = {
  Open: ["Not Started", "In Development"],
  "In Progress": ["In Development", "Code Review"],
  Testing: ["Ready for QA"],
  Completed: ["Ready for QA"],
  Deployed: ["Ready for QA"],
};

const clearAmendmentData = async (t?: Transaction) => {
  await AmendmentLink.destroy({ where: {}, transaction: t });
  await AmendmentProgress.destroy({ where: {}, transaction: t });
  await AmendmentApplication.destroy({ where: {}, transaction: t });
  await AmendmentDocument.destroy({ where: {}, transaction: t });
  await Amendment.destroy({ where: {}, transaction: t });
};

const seedCatalogs = async (t: Transaction) => {
  const qaEmployees: Employee[] = [];
  for (const member of seedData.qaTeam) {
    // eslint-disable-next-line no-await-in-loop
    const [employee] = await Employee.findOrCreate({
      where: { employeeName: member.employeeName },
      defaults: { ...member, windowsLogin: null, isActive: true },
      transaction: t,
    });
    qaEmployees.push(employee);
  }

  let applications = 0;
  for (const app of seedData.applications) {
    // eslint-disable-next-line no-await-in-loop
    const [application, created] = await Application.findOrCreate({
      where: { applicationName: app.applicationName },
      defaults: { applicationName: app.applicationName, description: null, isActive: true },
      transaction: t,
    });
    if (!created) continue;
    applications++;
    for (const version of app.versions) {
      // eslint-disable-next-line no-await-in-loop
      await ApplicationVersion.create(
        { applicationId: application.id, version, releasedDate: null, notes: null, isActive: true },
        { transaction: t }
      );
    }
  }

  return { qaEmployees, applications };
};

/**
 * Synthetic amendments over the last 90 days with progress notes, application links
 * and cross-links. Everything runs in one transaction.
 */
export const seedAmendments = async (sequelize: Sequelize, options: SeedOptions = {}): Promise<SeedReport> => {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const count = options.count ?? 50;

  return sequelize.transaction(async (t) => {
    if (options.clear) await clearAmendmentData(t);

    const { qaEmployees, applications } = await seedCatalogs(t);
    const report: SeedReport = {
      employees: qaEmployees.length,
      applications,
      amendments: 0,
      progressEntries: 0,
      applicationLinks: 0,
      links: 0,
    };

    const start = addDays(now, -90);
    const amendments: Amendment[] = [];

    for (let i = 0; i < count; i++) {
      const offset = randomInt(random, 0, 89);
      const daysAgo = 89 - offset;
      const dateReported = addDays(start, offset);
      const reference = formatReference(dateReported, i + 1);

      const amendmentStatus = pick(random, statusPoolFor(daysAgo));
      const qaCompleted = amendmentStatus === "Completed" || amendmentStatus === "Deployed";
      const qaAssigned = qaCompleted || amendmentStatus === "Testing";

      // eslint-disable-next-line no-await-in-loop
      const amendment = await Amendment.create(
        {
          amendmentReference: reference,
          amendmentType: pick(random, AMENDMENT_TYPES),
          description: pick(random, seedData.descriptions),
          amendmentStatus,
          developmentStatus: pick(random, DEVELOPMENT_FOR_STATUS[amendmentStatus]),
          priority: pick(random, PRIORITIES),
          force: random() > 0.3 ? pick(random, FORCES) : null,
          application: random() > 0.2 ? pick(random, seedData.applications).applicationName : null,
          notes: random() > 0.5 ? `Notes for amendment ${reference}` : null,
          reportedBy: pick(random, seedData.reporters),
          assignedTo: random() > 0.2 ? pick(random, seedData.developers) : null,
          dateReported,
          databaseChanges: random() > 0.7,
          dbUpgradeChanges: random() > 0.85,
          releaseNotes: qaCompleted ? `Release notes for ${reference}` : null,
          qaAssignedId: qaAssigned && qaEmployees.length > 0 ? pick(random, qaEmployees).id : null,
          qaAssignedDate: qaAssigned ? addDays(dateReported, randomInt(random, 1, 5)) : null,
          qaTestPlanCheck: qaCompleted && random() > 0.3,
          qaTestReleaseNotesCheck: qaCompleted && random() > 0.3,
          qaCompleted,
          qaSignature: qaCompleted ? pick(random, seedData.qaTeam).employeeName : null,
          qaCompletedDate: qaCompleted ? addDays(dateReported, randomInt(random, 5, 15)) : null,
          qaNotes: qaCompleted && random() > 0.5 ? `QA notes for ${reference}` : null,
          qaTestPlanLink: null,
          createdBy: pick(random, seedData.reporters),
          createdOn: dateReported,
          modifiedBy: random() > 0.3 ? pick(random, seedData.developers) : null,
          modifiedOn: daysAgo > 0 ? addDays(dateReported, randomInt(random, 1, daysAgo)) : dateReported,
        },
        { transaction: t, silent: true }
      );
      amendments.push(amendment);
      report.amendments++;

      const entries =
        amendmentStatus === "Open"
          ? randomInt(random, 0, 2)
          : amendmentStatus === "In Progress"
            ? randomInt(random, 1, 3)
            : randomInt(random, 2, 5);
      for (let n = 0; n < entries; n++) {
        const startDate = addDays(dateReported, n * randomInt(random, 1, 3));
        // eslint-disable-next-line no-await-in-loop
        await AmendmentProgress.create(
          {
            amendmentId: amendment.id,
            startDate,
            description: pick(random, seedData.progressTemplates),
            notes: random() > 0.6 ? `Additional notes for progress update ${n + 1}` : null,
            createdBy: pick(random, seedData.developers),
            createdOn: startDate,
            modifiedBy: null,
          },
          { transaction: t }
        );
        report.progressEntries++;
      }

      if (amendment.application && random() > 0.3) {
        for (const app of sample(random, seedData.applications, randomInt(random, 1, 2))) {
          // eslint-disable-next-line no-await-in-loop
          const catalogued = await Application.findOne({
            where: { applicationName: app.applicationName },
            transaction: t,
          });
          // eslint-disable-next-line no-await-in-loop
          await AmendmentApplication.create(
            {
              amendmentId: amendment.id,
              applicationId: catalogued?.id ?? null,
              applicationName: app.applicationName,
              reportedVersion: random() > 0.3 ? pick(random, app.versions) : null,
              appliedVersion: qaCompleted ? pick(random, app.versions) : null,
              developmentStatus: amendment.developmentStatus,
            },
            { transaction: t }
          );
          report.applicationLinks++;
        }
      }
    }

    // Links always point back at an earlier amendment; Blocks gets its Blocked By twin
    for (let i = 1; i < amendments.length; i++) {
      if (random() >= 0.2) continue;
      const source = amendments[i];
      const target = amendments[randomInt(random, 0, i - 1)];
      const linkType = pick(random, LINK_TYPES);
      // eslint-disable-next-line no-await-in-loop
      await AmendmentLink.create(
        { amendmentId: source.id, linkedAmendmentId: target.id, linkType },
        { transaction: t }
      );
      report.links++;

      if (linkType === "Blocks") {
        // eslint-disable-next-line no-await-in-loop
        await AmendmentLink.create(
          { amendmentId: target.id, linkedAmendmentId: source.id, linkType: "Blocked By" },
          { transaction: t }
        );
        report.links++;
      }
    }

    return report;
  });
};
