import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    NonAttribute,
    Sequelize,
} from "sequelize";
import type { Amendment } from "../amendment/amendment-model";
import { LINK_TYPES, type LinkType } from "../../../../utils/constants";

export class AmendmentLink extends Model<
    InferAttributes<AmendmentLink>,
    InferCreationAttributes<AmendmentLink>
> {
    declare id: CreationOptional<number>;
    declare amendmentId: number; // source
    declare linkedAmendmentId: number; // target, may point at a deleted amendment
    declare linkType: CreationOptional<LinkType>;

    declare linkedAmendment?: NonAttribute<Amendment | null>;

    static initModel(sequelize: Sequelize): typeof AmendmentLink {
        AmendmentLink.init(
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
                linkedAmendmentId: {
                    type: DataTypes.INTEGER,
                    allowNull: false,
                    comment: "No FK constraint: links survive deletion of their target",
                },
                linkType: {
                    type: DataTypes.ENUM(...LINK_TYPES),
                    allowNull: false,
                    defaultValue: "Related",
                },
            },
            {
                sequelize,
                modelName: "AmendmentLink",
                tableName: "amendment_links",
                timestamps: false,
                indexes: [
                    {
                        fields: ["amendmentId", "linkedAmendmentId"],
                        name: "idx_amendment_links_pair",
                    },
                ],
            }
        );

        return AmendmentLink;
    }
}
