import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    NonAttribute,
    Sequelize,
} from "sequelize";
import {
    AMENDMENT_STATUSES,
    AMENDMENT_TYPES,
    DEVELOPMENT_STATUSES,
    PRIORITIES,
    type AmendmentStatus,
    type AmendmentType,
    type DevelopmentStatus,
    type Priority,
} from "../../../../utils/constants";
import type { AmendmentProgress } from "../amendment-progress/amendment-progress-model";
import type { AmendmentApplication } from "../amendment-application/amendment-application-model";
import type { AmendmentLink } from "../amendment-link/amendment-link-model";
import type { AmendmentDocument } from "../amendment-document/amendment-document-model";

export class Amendment extends Model<
    InferAttributes<Amendment>,
    InferCreationAttributes<Amendment>
> {
    declare id: CreationOptional<number>;
    declare amendmentReference: string; // AMD-YYYYMMDD-NNN, never changes once assigned

    declare amendmentType: AmendmentType;
    declare description: string;
    declare amendmentStatus: CreationOptional<AmendmentStatus>;
    declare developmentStatus: CreationOptional<DevelopmentStatus>;
    declare priority: CreationOptional<Priority>;
    declare force: string | null;
    declare application: string | null;
    declare notes: string | null;

    declare reportedBy: string | null;
    declare assignedTo: string | null;
    declare dateReported: Date | null;

    declare databaseChanges: CreationOptional<boolean>;
    declare dbUpgradeChanges: CreationOptional<boolean>;
    declare releaseNotes: string | null;

    // QA sign-off
    declare qaAssignedId: number | null;
    declare qaAssignedDate: Date | null;
    declare qaTestPlanCheck: CreationOptional<boolean>;
    declare qaTestReleaseNotesCheck: CreationOptional<boolean>;
    declare qaCompleted: CreationOptional<boolean>;
    declare qaSignature: string | null;
    declare qaCompletedDate: Date | null;
    declare qaNotes: string | null;
    declare qaTestPlanLink: string | null;

    declare createdBy: string | null;
    declare createdOn: CreationOptional<Date>;
    declare modifiedBy: string | null;
    declare modifiedOn: CreationOptional<Date>;

    declare progressEntries?: NonAttribute<AmendmentProgress[]>;
    declare applications?: NonAttribute<AmendmentApplication[]>;
    declare links?: NonAttribute<AmendmentLink[]>;
    declare documents?: NonAttribute<AmendmentDocument[]>;

    static initModel(sequelize: Sequelize): typeof Amendment {
        Amendment.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                amendmentReference: {
                    type: DataTypes.STRING(50),
                    allowNull: false,
                    unique: true,
                    comment: "Human-readable reference, e.g. AMD-20231215-001",
                },
                amendmentType: {
                    type: DataTypes.ENUM(...AMENDMENT_TYPES),
                    allowNull: false,
                },
                description: {
                    type: DataTypes.TEXT,
                    allowNull: false,
                    validate: {
                        notEmpty: {
                            msg: "Amendment description cannot be empty",
                        },
                    },
                },
                amendmentStatus: {
                    type: DataTypes.ENUM(...AMENDMENT_STATUSES),
                    allowNull: false,
                    defaultValue: "Open",
                },
                developmentStatus: {
                    type: DataTypes.ENUM(...DEVELOPMENT_STATUSES),
                    allowNull: false,
                    defaultValue: "Not Started",
                },
                priority: {
                    type: DataTypes.ENUM(...PRIORITIES),
                    allowNull: false,
                    defaultValue: "Medium",
                },
                force: {
                    type: DataTypes.STRING(50),
                    allowNull: true,
                    comment: "Reporting force or organisation",
                },
                application: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                notes: {
                    type: DataTypes.TEXT,
                    allowNull: true,
                },
                reportedBy: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                assignedTo: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                dateReported: {
                    type: DataTypes.DATE,
                    allowNull: true,
                },
                databaseChanges: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: false,
                },
                dbUpgradeChanges: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: false,
                },
                releaseNotes: {
                    type: DataTypes.TEXT,
                    allowNull: true,
                },
                qaAssignedId: {
                    type: DataTypes.INTEGER,
                    allowNull: true,
                    comment: "Employee id of the QA reviewer",
                },
                qaAssignedDate: {
                    type: DataTypes.DATE,
                    allowNull: true,
                },
                qaTestPlanCheck: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: false,
                },
                qaTestReleaseNotesCheck: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: false,
                },
                qaCompleted: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: false,
                },
                qaSignature: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                qaCompletedDate: {
                    type: DataTypes.DATE,
                    allowNull: true,
                },
                qaNotes: {
                    type: DataTypes.TEXT,
                    allowNull: true,
                },
                qaTestPlanLink: {
                    type: DataTypes.STRING(500),
                    allowNull: true,
                },
                createdBy: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                createdOn: {
                    type: DataTypes.DATE,
                    allowNull: false,
                    defaultValue: DataTypes.NOW,
                },
                modifiedBy: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                modifiedOn: {
                    type: DataTypes.DATE,
                    allowNull: false,
                    defaultValue: DataTypes.NOW,
                },
            },
            {
                sequelize,
                modelName: "Amendment",
                tableName: "amendments",
                timestamps: true,
                createdAt: "createdOn",
                updatedAt: "modifiedOn",
                indexes: [
                    {
                        fields: ["amendmentStatus"],
                        name: "idx_amendments_status",
                    },
                    {
                        fields: ["dateReported"],
                        name: "idx_amendments_date_reported",
                    },
                ],
            }
        );

        return Amendment;
    }
}
