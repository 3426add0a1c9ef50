import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    Sequelize,
} from "sequelize";

export class AmendmentProgress extends Model<
    InferAttributes<AmendmentProgress>,
    InferCreationAttributes<AmendmentProgress>
> {
    declare id: CreationOptional<number>;
    declare amendmentId: number; // FK to Amendment

    declare startDate: Date | null;
    declare description: string;
    declare notes: string | null;

    declare createdBy: string | null;
    declare createdOn: CreationOptional<Date>;
    declare modifiedBy: string | null;
    declare modifiedOn: CreationOptional<Date>;

    static initModel(sequelize: Sequelize): typeof AmendmentProgress {
        AmendmentProgress.init(
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
                startDate: {
                    type: DataTypes.DATE,
                    allowNull: true,
                },
                description: {
                    type: DataTypes.TEXT,
                    allowNull: false,
                    validate: {
                        notEmpty: {
                            msg: "Progress description cannot be empty",
                        },
                    },
                },
                notes: {
                    type: DataTypes.TEXT,
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
                modelName: "AmendmentProgress",
                tableName: "amendment_progress",
                timestamps: true,
                createdAt: "createdOn",
                updatedAt: "modifiedOn",
                indexes: [
                    {
                        fields: ["amendmentId"],
                        name: "idx_amendment_progress_amendment",
                    },
                ],
            }
        );

        return AmendmentProgress;
    }
}
