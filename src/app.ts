import express from "express";
import cors from "cors";
import asyncHandler from "express-async-handler";
import errorHandler from "./middleware/errorHandler.middleware";
import routes from "./routes/route-index";
import { config } from "./config/config";
import { isDatabaseReachable } from "./db/core/control-db";
import { errorResponse, successResponse } from "./utils/responseHandler";

export const createApp = () => {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  app.get(
    "/api/health",
    asyncHandler(async (req, res) => {
      const database = await isDatabaseReachable();
      if (!database) {
        errorResponse(res, "Database unreachable", { database: "down" }, 503);
        return;
      }
      successResponse(res, "OK", { database: "up" });
    })
  );

  routes(app);

  app.use((req, res) => {
    errorResponse(res, "Route Not Found", { path: req.originalUrl }, 404);
  });

  //global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
