import type { RequestHandler } from "express";
import type { ZodIssue, ZodTypeAny } from "zod";
import { errorResponse } from "../utils/responseHandler";

type RequestValidation = {
  params?: ZodTypeAny;
  query?: ZodTypeAny;
  body?: ZodTypeAny;
};

type Location = keyof RequestValidation;

interface LocationIssues {
  location: Location;
  issues: { path: string; message: string }[];
}

const describe = (location: Location, issues: ZodIssue[]): LocationIssues => ({
  location,
  issues: issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
});

/**
 * Validates the parts of the request that have a schema and answers 400 with every
 * issue found. On success the parsed body replaces the raw one.
 */
export const validate =
  (schemas: RequestValidation): RequestHandler =>
  (req, res, next) => {
    const errors: LocationIssues[] = [];
    let parsedBody: unknown = req.body;

    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (!parsed.success) errors.push(describe("params", parsed.error.issues));
    }
    if (schemas.query) {
      const parsed = schemas.query.safeParse(req.query);
      if (!parsed.success) errors.push(describe("query", parsed.error.issues));
    }
    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body ?? {});
      if (parsed.success) parsedBody = parsed.data;
      else errors.push(describe("body", parsed.error.issues));
    }

    if (errors.length > 0) {
      errorResponse(res, "Validation failed", errors, 400);
      return;
    }
    req.body = parsedBody;
    next();
  };
