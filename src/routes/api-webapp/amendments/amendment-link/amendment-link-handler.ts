import type { Transaction } from "sequelize";
import { AmendmentLink } from "./amendment-link-model";
import { Amendment } from "../amendment/amendment-model";
import { findAmendmentOrThrow } from "../amendment/amendment-handler";
import { GLOBAL_CONSTANTS } from "../../../../utils/constants";
import { ConflictError, NotFoundError, toAppError } from "../../../../utils/app-errors";
import type { CreateLinkInput } from "../../../../validations/amendment-validation";

/**
 * Directed link source -> target. Both must exist and the ordered pair must be new;
 * the reverse pair and self-links are accepted.
 */
export const linkAmendments = async (amendmentId: number, input: CreateLinkInput, t: Transaction) => {
  await findAmendmentOrThrow(amendmentId, t);
  await findAmendmentOrThrow(input.linkedAmendmentId, t);

  const existing = await AmendmentLink.findOne({
    where: { amendmentId, linkedAmendmentId: input.linkedAmendmentId },
    transaction: t,
  });
  if (existing) {
    throw new ConflictError(`Amendment ${amendmentId} is already linked to ${input.linkedAmendmentId}`, {
      linkId: existing.id,
    });
  }

  try {
    return await AmendmentLink.create(
      {
        amendmentId,
        linkedAmendmentId: input.linkedAmendmentId,
        linkType: input.linkType ?? GLOBAL_CONSTANTS.defaults.linkType,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

// Outgoing links; linkedAmendment is null when the target has been deleted
export const getLinksForAmendment = async (amendmentId: number, t?: Transaction | null) => {
  await findAmendmentOrThrow(amendmentId, t);
  return AmendmentLink.findAll({
    where: { amendmentId },
    include: [
      {
        model: Amendment,
        as: "linkedAmendment",
        attributes: ["id", "amendmentReference", "description", "amendmentStatus"],
      },
    ],
    order: [["id", "ASC"]],
    transaction: t,
  });
};

export const deleteLink = async (linkId: number, t: Transaction) => {
  const link = await AmendmentLink.findByPk(linkId, { transaction: t });
  if (!link) throw new NotFoundError(`Link ${linkId} not found`);
  await link.destroy({ transaction: t });
};
