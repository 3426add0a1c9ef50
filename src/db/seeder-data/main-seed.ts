import type { Sequelize } from "sequelize";
import dbInstance, { initControlDBConnection } from "../core/control-db";
import { ConsoleSpinner } from "../../services/console-info";
import { errorLog, infoLog } from "../../services/logging-service";
import { seedAmendments, type SeedOptions } from "./amendment-seed";

export const runSeeders = async (sequelize: Sequelize, options: SeedOptions = {}) => {
  ConsoleSpinner.start("Seeding amendments");
  const report = await seedAmendments(sequelize, options);
  ConsoleSpinner.success(`Seeded ${report.amendments} amendments`);
  infoLog(
    `Employees ${report.employees}, applications ${report.applications}, progress ${report.progressEntries}, ` +
      `application links ${report.applicationLinks}, links ${report.links}`
  );
  return report;
};

// npm run seed -- [count] [--clear]
if (require.main === module) {
  const args = process.argv.slice(2);
  const countArg = args.find((arg) => /^\d+$/.test(arg));

  initControlDBConnection()
    .then(async (connected) => {
      if (!connected) throw new Error("Database unavailable");
      await runSeeders(dbInstance, {
        count: countArg ? Number(countArg) : undefined,
        clear: args.includes("--clear"),
      });
    })
    .catch((err: unknown) => {
      ConsoleSpinner.error("Seeding failed");
      errorLog(err);
      process.exitCode = 1;
    })
    .finally(() => dbInstance.close());
}
