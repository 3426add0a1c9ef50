import type { Request } from "express";

type ActorParam = "created_by" | "modified_by" | "uploaded_by";

/**
 * Who is making the change: the `created_by` / `modified_by` query parameter wins,
 * then the value in the body, otherwise undefined (left untouched on update).
 */
export const resolveActor = (
  req: Request,
  param: ActorParam,
  bodyValue?: string | null
): string | null | undefined => {
  const fromQuery = req.query[param];
  if (typeof fromQuery === "string" && fromQuery.trim().length > 0) {
    return fromQuery.trim();
  }
  return bodyValue;
};
