import type { Application } from "express";
import amendmentStatsRoutes from "./api-webapp/amendments/dashboard/dashboard-api";
import amendmentRoutes from "./api-webapp/amendments/amendment/amendment-api";
import amendmentProgressRoutes from "./api-webapp/amendments/amendment-progress/amendment-progress-api";
import amendmentApplicationRoutes from "./api-webapp/amendments/amendment-application/amendment-application-api";
import amendmentLinkRoutes from "./api-webapp/amendments/amendment-link/amendment-link-api";
import amendmentDocumentRoutes from "./api-webapp/amendments/amendment-document/amendment-document-api";
import referenceRoutes from "./api-webapp/amendments/amendment-reference/amendment-reference-api";
import employeeRoutes from "./api-webapp/employee/employee-api";
import applicationRoutes from "./api-webapp/application/application-api";

export default (app: Application) => {
    // Web App Apis Route Index
    app.use("/api/amendments", amendmentStatsRoutes);
    app.use("/api/amendments", amendmentProgressRoutes);
    app.use("/api/amendments", amendmentApplicationRoutes);
    app.use("/api/amendments", amendmentLinkRoutes);
    app.use("/api/amendments", amendmentDocumentRoutes);
    app.use("/api/amendments", amendmentRoutes);
    app.use("/api/reference", referenceRoutes);
    app.use("/api/employees", employeeRoutes);
    app.use("/api/applications", applicationRoutes);
};
