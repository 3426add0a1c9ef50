import { z } from "zod";
import { fromZodError } from "../utils/app-errors";

const v_id = z.coerce.number().int().positive();

/** Route ids arrive as strings; anything but a positive integer is a 400. */
export const parseIdParam = (value: string | undefined, name = "id"): number => {
  const parsed = v_id.safeParse(value);
  if (!parsed.success) {
    throw fromZodError(parsed.error, `Invalid ${name}`);
  }
  return parsed.data;
};
