import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    Sequelize,
} from "sequelize";

/**
 * Singleton row holding the highest legacy reference number seen per amendment type.
 * Filled by the legacy importer; the live allocator derives sequences from existing
 * references instead.
 */
export class AmendmentReferences extends Model<
    InferAttributes<AmendmentReferences>,
    InferCreationAttributes<AmendmentReferences>
> {
    declare id: CreationOptional<number>;
    declare bugReference: CreationOptional<number>;
    declare faultReference: CreationOptional<number>;
    declare enhancementReference: CreationOptional<number>;
    declare featureReference: CreationOptional<number>;
    declare suggestionReference: CreationOptional<number>;
    declare maintenanceReference: CreationOptional<number>;
    declare documentationReference: CreationOptional<number>;

    static initModel(sequelize: Sequelize): typeof AmendmentReferences {
        // init mutates attribute definitions, so each column needs its own object
        const counter = () => ({
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0,
        });

        AmendmentReferences.init(
            {
                id: {
                    type: DataTypes.INTEGER,
                    primaryKey: true,
                    autoIncrement: true,
                    allowNull: false,
                },
                bugReference: counter(),
                faultReference: counter(),
                enhancementReference: counter(),
                featureReference: counter(),
                suggestionReference: counter(),
                maintenanceReference: counter(),
                documentationReference: counter(),
            },
            {
                sequelize,
                modelName: "AmendmentReferences",
                tableName: "amendment_references",
                timestamps: false,
            }
        );

        return AmendmentReferences;
    }
}
