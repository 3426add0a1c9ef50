import fs from "fs";
import path from "path";
import dbInstance, { initControlDBConnection } from "../core/control-db";
import { ConsoleSpinner } from "../../services/console-info";
import { errorLog, infoLog } from "../../services/logging-service";
import { importLegacyDump } from "./legacy-importer";
import { decodeDump } from "./legacy-sql-parser";

// Usage: npm run import:legacy -- <path to script.sql>
const main = async () => {
  const source = process.argv[2] ?? process.env.LEGACY_DUMP_PATH;
  if (!source) {
    throw new Error("Pass the SQL Server export as the first argument or set LEGACY_DUMP_PATH");
  }

  const file = path.resolve(source);
  ConsoleSpinner.start(`Reading ${file}`);
  const content = decodeDump(await fs.promises.readFile(file));

  if (!(await initControlDBConnection())) {
    throw new Error("Database unavailable");
  }

  ConsoleSpinner.start("Importing amendments");
  const report = await importLegacyDump(content);
  ConsoleSpinner.success(`Imported ${report.migrated} of ${report.found} amendments (${report.skipped} skipped)`);

  infoLog(`Application links created: ${report.applicationLinks}`);
  if (report.referencesInitialised) {
    for (const [type, value] of Object.entries(report.referenceCounters)) {
      infoLog(`Reference counter ${type}: ${value}`);
    }
  }
};

main()
  .catch((err: unknown) => {
    ConsoleSpinner.error("Legacy import failed");
    errorLog(err);
    process.exitCode = 1;
  })
  .finally(() => dbInstance.close());
