import http from "http";
import { amendmentTrackerConfig } from "../environment";
import { createApp } from "./app";
import { config } from "./config/config";
import { initControlDBConnection } from "./db/core/control-db";
import { ConsoleSpinner } from "./services/console-info";
import { errorLog, infoLog } from "./services/logging-service";

const start = async () => {
  const { projectName, version } = amendmentTrackerConfig;
  ConsoleSpinner.start(`Starting ${projectName} ${version} (${ConsoleSpinner.getENV()})`);

  const connected = await initControlDBConnection();
  if (!connected) {
    ConsoleSpinner.error("Database unavailable; server not started");
    process.exitCode = 1;
    return;
  }

  const server = http.createServer(createApp());
  server.listen(config.port, () => {
    ConsoleSpinner.success(`Server is running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    infoLog(`${signal} received, closing server`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

start().catch((err: unknown) => {
  errorLog(err);
  process.exitCode = 1;
});
