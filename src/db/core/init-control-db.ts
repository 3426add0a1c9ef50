import type { Sequelize } from "sequelize";

import { Amendment } from "../../routes/api-webapp/amendments/amendment/amendment-model";
import { AmendmentProgress } from "../../routes/api-webapp/amendments/amendment-progress/amendment-progress-model";
import { AmendmentApplication } from "../../routes/api-webapp/amendments/amendment-application/amendment-application-model";
import { AmendmentLink } from "../../routes/api-webapp/amendments/amendment-link/amendment-link-model";
import { AmendmentDocument } from "../../routes/api-webapp/amendments/amendment-document/amendment-document-model";
import { AmendmentReferences } from "../../routes/api-webapp/amendments/amendment-reference/amendment-reference-model";
import { Employee } from "../../routes/api-webapp/employee/employee-model";
import { Application } from "../../routes/api-webapp/application/application-model";
import { ApplicationVersion } from "../../routes/api-webapp/application/application-version-model";

export {
  Amendment,
  AmendmentProgress,
  AmendmentApplication,
  AmendmentLink,
  AmendmentDocument,
  AmendmentReferences,
  Employee,
  Application,
  ApplicationVersion,
};

export function initControlDB(sequelize: Sequelize) {
  Amendment.initModel(sequelize);
  AmendmentProgress.initModel(sequelize);
  AmendmentApplication.initModel(sequelize);
  AmendmentLink.initModel(sequelize);
  AmendmentDocument.initModel(sequelize);
  AmendmentReferences.initModel(sequelize);
  Employee.initModel(sequelize);
  Application.initModel(sequelize);
  ApplicationVersion.initModel(sequelize);

  // Relations and associations
  /*** amendment <-> progress */
  Amendment.hasMany(AmendmentProgress, {
    foreignKey: "amendmentId",
    as: "progressEntries",
    onDelete: "CASCADE",
  });
  AmendmentProgress.belongsTo(Amendment, {
    foreignKey: "amendmentId",
    as: "amendment",
  });

  /*** amendment <-> application links */
  Amendment.hasMany(AmendmentApplication, {
    foreignKey: "amendmentId",
    as: "applications",
    onDelete: "CASCADE",
  });
  AmendmentApplication.belongsTo(Amendment, {
    foreignKey: "amendmentId",
    as: "amendment",
  });
  AmendmentApplication.belongsTo(Application, {
    foreignKey: "applicationId",
    as: "catalogApplication",
  });

  /*** amendment -> outgoing links; the target side carries no constraint */
  Amendment.hasMany(AmendmentLink, {
    foreignKey: "amendmentId",
    as: "links",
    onDelete: "CASCADE",
  });
  AmendmentLink.belongsTo(Amendment, {
    foreignKey: "amendmentId",
    as: "amendment",
  });
  AmendmentLink.belongsTo(Amendment, {
    foreignKey: "linkedAmendmentId",
    as: "linkedAmendment",
    constraints: false,
  });

  /*** amendment <-> documents */
  Amendment.hasMany(AmendmentDocument, {
    foreignKey: "amendmentId",
    as: "documents",
    onDelete: "CASCADE",
  });
  AmendmentDocument.belongsTo(Amendment, {
    foreignKey: "amendmentId",
    as: "amendment",
  });

  /*** application <-> versions */
  Application.hasMany(ApplicationVersion, {
    foreignKey: "applicationId",
    as: "versions",
    onDelete: "CASCADE",
  });
  ApplicationVersion.belongsTo(Application, {
    foreignKey: "applicationId",
    as: "application",
  });
}
