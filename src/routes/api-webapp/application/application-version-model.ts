import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    Sequelize,
} from "sequelize";

export class ApplicationVersion extends Model<
    InferAttributes<ApplicationVersion>,
    InferCreationAttributes<ApplicationVersion>
> {
    declare id: CreationOptional<number>;
    declare applicationId: number; // FK to Application
    declare version: string;
    declare releasedDate: Date | null;
    declare notes: string | null;
    declare isActive: CreationOptional<boolean>;
    declare createdOn: CreationOptional<Date>;
    declare modifiedOn: CreationOptional<Date>;

    static initModel(sequelize: Sequelize): typeof ApplicationVersion {
        ApplicationVersion.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                applicationId: {
                    type: DataTypes.INTEGER,
                    allowNull: false,
                    references: {
                        model: "applications",
                        key: "id",
                    },
                    onDelete: "CASCADE",
                },
                version: {
                    type: DataTypes.STRING(50),
                    allowNull: false,
                    validate: {
                        notEmpty: {
                            msg: "Version cannot be empty",
                        },
                    },
                },
                releasedDate: {
                    type: DataTypes.DATE,
                    allowNull: true,
                },
                notes: {
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
                modelName: "ApplicationVersion",
                tableName: "application_versions",
                timestamps: true,
                createdAt: "createdOn",
                updatedAt: "modifiedOn",
            }
        );

        return ApplicationVersion;
    }
}
