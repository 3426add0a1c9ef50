import { Op, type Transaction } from "sequelize";
import { Amendment } from "../amendment/amendment-model";
import { GLOBAL_CONSTANTS } from "../../../../utils/constants";
import { throwValidation } from "../../../../utils/app-errors";

/** Source of "now" for reference dates; swapped out in tests. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface AllocateReferenceOptions {
  clock?: Clock;
  transaction?: Transaction | null;
}

export type ReferenceAllocator = (options?: AllocateReferenceOptions) => Promise<string>;

const pad = (value: number, width: number) => String(value).padStart(width, "0");

// Local calendar date, YYYYMMDD
export const formatReferenceDate = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1, 2)}${pad(date.getDate(), 2)}`;

const referenceDatePrefix = (date: Date): string =>
  `${GLOBAL_CONSTANTS.reference.prefix}-${formatReferenceDate(date)}`;

export const formatReference = (date: Date, sequence: number): string =>
  `${referenceDatePrefix(date)}-${pad(sequence, GLOBAL_CONSTANTS.reference.sequenceDigits)}`;

/** Sequence number after the last `-`; anything non-numeric is rejected. */
export const parseReferenceSequence = (reference: string): number => {
  const segment = reference.slice(reference.lastIndexOf("-") + 1);
  if (!/^\d+$/.test(segment)) {
    throwValidation(`Malformed amendment reference "${reference}"`, { reference });
  }
  return Number(segment);
};

/**
 * Next reference for today: AMD-YYYYMMDD-NNN.
 *
 * The highest existing reference is picked by descending string order, so once a day
 * passes 999 entries the 4-digit suffixes sort below "999". Two calls with no insert
 * in between return the same value; the create path retries on the unique index.
 * Inside a transaction the read locks, so a retry sees rows committed since the
 * transaction's snapshot was taken.
 */
export const generateAmendmentReference: ReferenceAllocator = async ({
  clock = systemClock,
  transaction = null,
} = {}) => {
  const today = clock.now();
  const datePrefix = referenceDatePrefix(today);

  const latest = await Amendment.findOne({
    attributes: ["id", "amendmentReference"],
    where: {
      amendmentReference: { [Op.startsWith]: `${datePrefix}-` },
    },
    order: [["amendmentReference", "DESC"]],
    transaction,
    ...(transaction ? { lock: transaction.LOCK.UPDATE } : {}),
  });

  const sequence = latest ? parseReferenceSequence(latest.amendmentReference) + 1 : 1;
  return formatReference(today, sequence);
};
