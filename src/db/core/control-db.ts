import { Sequelize } from "sequelize";
import { config } from "../../config/config";
import { ConsoleSpinner } from "../../services/console-info";
import { loggingOptions, warningLog, errorLog } from "../../services/logging-service";
import { initControlDB } from "./init-control-db";

const dbConfig = config.db;

// Sequelize setup using environment-specific config
const db: Sequelize = new Sequelize({
  dialect: dbConfig.dialect,
  database: dbConfig.database,
  username: dbConfig.username,
  password: dbConfig.password,
  host: dbConfig.host,
  port: dbConfig.port,
  storage: dbConfig.storage,
  // SQLite rejects any timezone option
  ...(dbConfig.dialect === "sqlite" ? {} : { timezone: dbConfig.timezone }),
  ...(dbConfig.logging ? loggingOptions : { logging: false }),
});

initControlDB(db);

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// Authenticate and check DB connection with retry/backoff
const authenticate = async (maxAttempts = 6): Promise<boolean> => {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await db.authenticate();
      ConsoleSpinner.success(`Connected to '${dbConfig.database ?? dbConfig.storage}' DB`);
      return true;
    } catch (err) {
      const waitMs = attempt * 1500;
      const reason = err instanceof Error ? err.message : String(err);
      warningLog(`Database authentication attempt ${attempt}/${maxAttempts} failed: ${reason}`);
      if (attempt < maxAttempts) {
        // eslint-disable-next-line no-await-in-loop
        await sleep(waitMs);
        continue;
      }
      errorLog(err);
    }
  }
  return false;
};

const syncControlledDB = async (maxAttempts = 3): Promise<boolean> => {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await db.sync({ alter: dbConfig.dialect !== "sqlite" });
      ConsoleSpinner.success(`Models synced for control DB`);
      return true;
    } catch (err) {
      const waitMs = attempt * 2000;
      const reason = err instanceof Error ? err.message : String(err);
      warningLog(`Error syncing DB attempt ${attempt}/${maxAttempts}: ${reason}`);
      if (attempt < maxAttempts) {
        // eslint-disable-next-line no-await-in-loop
        await sleep(waitMs);
        continue;
      }
      errorLog(err);
    }
  }
  return false;
};

// Caller decides when to connect; nothing runs on import
export const initControlDBConnection = async (maxAttempts = 6): Promise<boolean> => {
  const ok = await authenticate(maxAttempts);
  if (!ok) {
    warningLog("Control DB not authenticated; skipping automatic sync.");
    return false;
  }
  return syncControlledDB();
};

export const isDatabaseReachable = async (): Promise<boolean> => {
  try {
    await db.authenticate();
    return true;
  } catch {
    return false;
  }
};

export default db;
