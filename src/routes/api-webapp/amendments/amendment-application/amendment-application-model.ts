import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    Sequelize,
} from "sequelize";
import { DEVELOPMENT_STATUSES, type DevelopmentStatus } from "../../../../utils/constants";

export class AmendmentApplication extends Model<
    InferAttributes<AmendmentApplication>,
    InferCreationAttributes<AmendmentApplication>
> {
    declare id: CreationOptional<number>;
    declare amendmentId: number; // FK to Amendment
    declare applicationId: number | null; // FK to Application, null when only the name is known

    declare applicationName: string;
    declare reportedVersion: string | null;
    declare appliedVersion: string | null;
    declare developmentStatus: DevelopmentStatus | null;

    static initModel(sequelize: Sequelize): typeof AmendmentApplication {
        AmendmentApplication.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                amendmentId: {
                    type: DataTypes.INTEGER,
                    allowNull: false,
                    references: {
                        model: "amendments",
                        key: "id",
                    },
                    onDelete: "CASCADE",
                },
                applicationId: {
                    type: DataTypes.INTEGER,
                    allowNull: true,
                    references: {
                        model: "applications",
                        key: "id",
                    },
                    onDelete: "SET NULL",
                },
                applicationName: {
                    type: DataTypes.STRING(100),
                    allowNull: false,
                    validate: {
                        notEmpty: {
                            msg: "Application name cannot be empty",
                        },
                    },
                },
                reportedVersion: {
                    type: DataTypes.STRING(50),
                    allowNull: true,
                    comment: "Version the issue was reported against",
                },
                appliedVersion: {
                    type: DataTypes.STRING(50),
                    allowNull: true,
                    comment: "Version the change shipped in",
                },
                developmentStatus: {
                    type: DataTypes.ENUM(...DEVELOPMENT_STATUSES),
                    allowNull: true,
                },
            },
            {
                sequelize,
                modelName: "AmendmentApplication",
                tableName: "amendment_applications",
                timestamps: false,
                indexes: [
                    {
                        fields: ["amendmentId"],
                        name: "idx_amendment_applications_amendment",
                    },
                ],
            }
        );

        return AmendmentApplication;
    }
}
