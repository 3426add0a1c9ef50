import {
    CreationOptional,
    DataTypes,
    InferAttributes,
    InferCreationAttributes,
    Model,
    Sequelize,
} from "sequelize";
import { DOCUMENT_TYPES, type DocumentType } from "../../../../utils/constants";

export class AmendmentDocument extends Model<
    InferAttributes<AmendmentDocument>,
    InferCreationAttributes<AmendmentDocument>
> {
    declare id: CreationOptional<number>;
    declare amendmentId: number; // FK to Amendment

    declare documentName: string;
    declare originalFilename: string;
    declare filePath: string; // relative to the upload root
    declare fileSize: number | null;
    declare mimeType: string | null;
    declare documentType: CreationOptional<DocumentType>;
    declare description: string | null;

    declare uploadedBy: string | null;
    declare uploadedOn: CreationOptional<Date>;

    static initModel(sequelize: Sequelize): typeof AmendmentDocument {
        AmendmentDocument.init(
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
                documentName: {
                    type: DataTypes.STRING(255),
                    allowNull: false,
                },
                originalFilename: {
                    type: DataTypes.STRING(255),
                    allowNull: false,
                },
                filePath: {
                    type: DataTypes.STRING(500),
                    allowNull: false,
                    comment: "Storage path relative to the upload directory",
                },
                fileSize: {
                    type: DataTypes.INTEGER,
                    allowNull: true,
                },
                mimeType: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                documentType: {
                    type: DataTypes.ENUM(...DOCUMENT_TYPES),
                    allowNull: false,
                    defaultValue: "Other",
                },
                description: {
                    type: DataTypes.TEXT,
                    allowNull: true,
                },
                uploadedBy: {
                    type: DataTypes.STRING(100),
                    allowNull: true,
                },
                uploadedOn: {
                    type: DataTypes.DATE,
                    allowNull: false,
                    defaultValue: DataTypes.NOW,
                },
            },
            {
                sequelize,
                modelName: "AmendmentDocument",
                tableName: "amendment_documents",
                timestamps: true,
                createdAt: "uploadedOn",
                updatedAt: false,
                indexes: [
                    {
                        fields: ["amendmentId"],
                        name: "idx_amendment_documents_amendment",
                    },
                ],
            }
        );

        return AmendmentDocument;
    }
}
