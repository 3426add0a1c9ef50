import colors from "colors/safe";
import log4js from "log4js";
import { config } from "../config/config";

log4js.configure({
  appenders: {
    console: { type: "console" },
  },
  categories: {
    default: { appenders: ["console"], level: config.logLevel },
    amendment_sql: { appenders: ["console"], level: config.logLevel },
  },
});

const logger = log4js.getLogger("amendment_tracker");
const sqlLogger = log4js.getLogger("amendment_sql");

const SLOW_QUERY_MS = 100;

const timestamp = () => new Date().toLocaleTimeString("en-GB");

export const errorLog = (err: unknown) => {
  const text = err instanceof Error ? err.stack || err.message : String(err);
  logger.error(`[${timestamp()}], ${text}`);
};

export const warningLog = (warning: string) => {
  logger.warn(`[${timestamp()}], ${warning}`);
};

export const infoLog = (info: string) => {
  logger.info(`[${timestamp()}], ${info}`);
};

const colourFor = (sql: string): ((text: string) => string) => {
  const statement = sql.replace(/^Executing \([^)]*\):\s*/, "").trimStart().toUpperCase();
  if (statement.startsWith("SELECT")) return colors.blue;
  if (statement.startsWith("UPDATE")) return colors.yellow;
  if (statement.startsWith("INSERT")) return colors.green;
  if (statement.startsWith("DELETE")) return colors.magenta;
  return colors.white;
};

// Passed to Sequelize as `logging` together with `benchmark: true`.
export const loggingOptions = {
  benchmark: true,
  logging: (sql: string, timing?: number) => {
    if (timing !== undefined && timing >= SLOW_QUERY_MS) {
      sqlLogger.warn(colors.red(`[${timing} ms] ${sql}`));
      return;
    }
    const col = colourFor(sql);
    sqlLogger.debug(timing !== undefined ? `${colors.green(`[${timing} ms]`)} ${col(sql)}` : col(sql));
  },
};
