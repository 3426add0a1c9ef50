// config.ts

import dotenv from "dotenv";
import type { Dialect } from "sequelize";
import environment, { type EnvironmentName } from "../../environment";

dotenv.config();

export interface DatabaseConfig {
  dialect: Dialect;
  database?: string;
  username?: string;
  password?: string;
  host?: string;
  port?: number;
  storage?: string;
  logging: boolean;
  timezone?: string;
}

export interface AppConfig {
  db: DatabaseConfig;
  port: number;
  corsOrigins: string[];
  uploadDir: string;
  maxUploadBytes: number;
  logDir: string;
  logLevel: "debug" | "info" | "warn" | "error" | "off";
  referenceRetryAttempts: number;
}

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
};

const listFromEnv = (value: string | undefined, fallback: string[]): string[] =>
  value
    ? value
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean)
    : fallback;

const mysql = (database: string): DatabaseConfig => ({
  dialect: "mysql",
  database: process.env.MYSQL_DB_NAME || database,
  username: process.env.MYSQL_DB_USERNAME || "root",
  password: process.env.MYSQL_DB_PASSWORD || "",
  host: process.env.MYSQL_DB_HOST || "localhost",
  port: numberFromEnv(process.env.MYSQL_DB_PORT, 3306),
  logging: process.env.DB_LOGGING === "true",
  timezone: process.env.DB_TIMEZONE || "+00:00",
});

const configs: Record<EnvironmentName, AppConfig> = {
  development: {
    db: mysql("amendment_tracker_dev"),
    port: numberFromEnv(process.env.PORT, 9005),
    corsOrigins: listFromEnv(process.env.CORS_ORIGINS, ["http://localhost:3000"]),
    uploadDir: process.env.UPLOAD_DIR || "uploads",
    maxUploadBytes: numberFromEnv(process.env.MAX_UPLOAD_MB, 20) * 1024 * 1024,
    logDir: process.env.LOG_DIR || "logs",
    logLevel: "debug",
    referenceRetryAttempts: numberFromEnv(process.env.REFERENCE_RETRY_ATTEMPTS, 3),
  },
  test: {
    db: {
      dialect: "sqlite",
      storage: ":memory:",
      logging: false,
    },
    port: 0,
    corsOrigins: ["http://localhost:3000"],
    uploadDir: process.env.UPLOAD_DIR || "uploads-test",
    maxUploadBytes: 1024 * 1024,
    logDir: process.env.LOG_DIR || "logs-test",
    logLevel: "off",
    referenceRetryAttempts: 3,
  },
  production: {
    db: mysql("amendment_tracker"),
    port: numberFromEnv(process.env.PORT, 9005),
    corsOrigins: listFromEnv(process.env.CORS_ORIGINS, []),
    uploadDir: process.env.UPLOAD_DIR || "uploads",
    maxUploadBytes: numberFromEnv(process.env.MAX_UPLOAD_MB, 20) * 1024 * 1024,
    logDir: process.env.LOG_DIR || "logs",
    logLevel: "info",
    referenceRetryAttempts: numberFromEnv(process.env.REFERENCE_RETRY_ATTEMPTS, 3),
  },
};

export const config: AppConfig = configs[environment];
