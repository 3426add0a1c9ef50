import path from "path";
import { Logger, createLogger, format } from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import environment from "../../../../environment";
import { config } from "../../../config/config";
const { timestamp, prettyPrint, json } = format;

type LevelType = "error" | "warn" | "info";

export class BaseLogger {
  readonly logger: Logger;

  constructor(filename: string, level?: LevelType) {
    this.logger = this.createLogger(filename, level);
  }

  private createLogger(filename: string, level: LevelType = "error"): Logger {
    const transport: DailyRotateFile = new DailyRotateFile({
      filename: path.join(config.logDir, `${filename}-%DATE%.log`),
      maxSize: "20m",
      maxFiles: "7d",
    });

    return createLogger({
      level,
      silent: environment === "test",
      format: format.combine(json(), prettyPrint(), timestamp()),
      transports: [transport],
    });
  }
}
