import {
    CreationOptional,
    DataTypes,
    InferCreationAttributes,
    InferAttributes,
    Model,
    Sequelize,
} from "sequelize";

export class Employee extends Model<
    InferAttributes<Employee>,
    InferCreationAttributes<Employee>
> {
    declare id: CreationOptional<number>;
    declare employeeName: string;
    declare initials: string | null;
    declare email: string | null;
    declare windowsLogin: string | null;
    declare isActive: CreationOptional<boolean>;
    declare createdOn: CreationOptional<Date>;
    declare modifiedOn: CreationOptional<Date>;

    static initModel(sequelize: Sequelize): typeof Employee {
        Employee.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                employeeName: {
                    type: DataTypes.STRING(100),
                    allowNull: false,
                    validate: {
                        notEmpty: {
                            msg: "Employee name cannot be empty",
                        },
                    },
                },
                initials: {
                    type: DataTypes.STRING(10),
                    allowNull: true,
                },
                email: {
                    type: DataTypes.STRING(150),
                    allowNull: true,
                    validate: {
                        isEmail: {
                            msg: "Employee email must be a valid address",
                        },
                    },
                },
                windowsLogin: {
                    type: DataTypes.STRING(100),
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
                modelName: "Employee",
                tableName: "employees",
                timestamps: true,
                createdAt: "createdOn",
                updatedAt: "modifiedOn",
                indexes: [
                    {
                        fields: ["employeeName"],
                        name: "idx_employees_name",
                    },
                ],
            }
        );

        return Employee;
    }
}
