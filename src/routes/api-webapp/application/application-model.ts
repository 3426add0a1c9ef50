import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    NonAttribute,
    Sequelize,
} from "sequelize";
import type { ApplicationVersion } from "./application-version-model";

export class Application extends Model<
    InferAttributes<Application>,
    InferCreationAttributes<Application>
> {
    declare id: CreationOptional<number>;
    declare applicationName: string;
    declare description: string | null;
    declare isActive: CreationOptional<boolean>;
    declare createdOn: CreationOptional<Date>;
    declare modifiedOn: CreationOptional<Date>;

    declare versions?: NonAttribute<ApplicationVersion[]>;

    static initModel(sequelize: Sequelize): typeof Application {
        Application.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                applicationName: {
                    type: DataTypes.STRING(100),
                    allowNull: false,
                    unique: true,
                    validate: {
                        notEmpty: {
                            msg: "Application name cannot be empty",
                        },
                    },
                },
                description: {
                    type: DataTypes.TEXT,
                    allowNull: true,
                },
                isActive: {
                    type: DataTypes.BOOLEAN,
                    allowNull: false,
                    defaultValue: true,
                },
                createdOn: {
                    type: DataTypes.DATE,
                    allowNull: false,
                    defaultValue: DataTypes.NOW,
                },
                modifiedOn: {
                    type: DataTypes.DATE,
                    allowNull: false,
                    defaultValue: DataTypes.NOW,
                },
            },
            {
                sequelize,
                modelName: "Application",
                tableName: "applications",
                timestamps: true,
                createdAt: "createdOn",
                updatedAt: "modifiedOn",
            }
        );

        return Application;
    }
}
