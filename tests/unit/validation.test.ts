import { describe, expect, it } from "vitest";
import {
  v_amendment_query,
  v_bulk_update_amendments,
  v_create_amendment,
  v_update_amendment,
} from "../../src/validations/amendment-validation";
import { v_employee_query } from "../../src/validations/catalog-validation";
import { parseIdParam } from "../../src/validations/zod-params";
import { ValidationFailureError } from "../../src/utils/app-errors";

describe("amendment list query", () => {
  it("applies paging defaults", () => {
    const parsed = v_amendment_query.parse({});
    expect(parsed.skip).toBe(0);
    expect(parsed.limit).toBe(100);
    expect(parsed.sortOrder).toBe("desc");
    expect(parsed.sortBy).toBeUndefined();
    expect(parsed.filter.amendmentStatus).toBeUndefined();
  });

  it("accepts comma lists and repeated parameters", () => {
    const parsed = v_amendment_query.parse({
      amendment_status: "Open, Testing",
      priority: ["High", "Critical"],
      amendment_ids: "3,7",
      force: "",
    });
    expect(parsed.filter.amendmentStatus).toEqual(["Open", "Testing"]);
    expect(parsed.filter.priority).toEqual(["High", "Critical"]);
    expect(parsed.filter.amendmentIds).toEqual([3, 7]);
    expect(parsed.filter.force).toEqual([]);
  });

  it("parses flags and dates", () => {
    const parsed = v_amendment_query.parse({
      qa_completed: "yes",
      qa_assigned: "0",
      database_changes: "TRUE",
      date_reported_from: "2024-01-31",
    });
    expect(parsed.filter.qaCompleted).toBe(true);
    expect(parsed.filter.qaAssigned).toBe(false);
    expect(parsed.filter.databaseChanges).toBe(true);
    expect(parsed.filter.dateReportedFrom).toEqual(new Date("2024-01-31"));
  });

  it("treats empty text, date and flag parameters as absent", () => {
    const parsed = v_amendment_query.parse({
      search_text: "",
      amendment_reference: "  ",
      date_reported_from: "",
      qa_completed: "",
    });
    expect(parsed.filter.searchText).toBeUndefined();
    expect(parsed.filter.amendmentReference).toBeUndefined();
    expect(parsed.filter.dateReportedFrom).toBeUndefined();
    expect(parsed.filter.qaCompleted).toBeUndefined();
  });

  it("trims text filters", () => {
    const parsed = v_amendment_query.parse({ search_text: " invoice ", amendment_reference: "AMD-20240101-001 " });
    expect(parsed.filter.searchText).toBe("invoice");
    expect(parsed.filter.amendmentReference).toBe("AMD-20240101-001");
  });

  it("rejects unknown enum values, bad flags and oversized pages", () => {
    expect(v_amendment_query.safeParse({ amendment_status: "Parked" }).success).toBe(false);
    expect(v_amendment_query.safeParse({ qa_completed: "maybe" }).success).toBe(false);
    expect(v_amendment_query.safeParse({ limit: "1001" }).success).toBe(false);
    expect(v_amendment_query.safeParse({ limit: "0" }).success).toBe(false);
    expect(v_amendment_query.safeParse({ skip: "-1" }).success).toBe(false);
    expect(v_amendment_query.safeParse({ sort_order: "sideways" }).success).toBe(false);
  });
});

describe("amendment bodies", () => {
  it("requires a type and a non-blank description", () => {
    expect(v_create_amendment.safeParse({ description: "x" }).success).toBe(false);
    expect(v_create_amendment.safeParse({ amendmentType: "Fault", description: "   " }).success).toBe(false);
  });

  it("strips a caller-supplied reference", () => {
    const parsed = v_create_amendment.parse({
      amendmentType: "Fault",
      description: "Broken",
      amendmentReference: "AMD-20200101-001",
    });
    expect(parsed).toEqual({ amendmentType: "Fault", description: "Broken" });
  });

  it("keeps only the keys sent on update", () => {
    expect(v_update_amendment.parse({ priority: "Low" })).toEqual({ priority: "Low" });
    expect(v_update_amendment.safeParse({ priority: "Urgent" }).success).toBe(false);
  });

  it("needs at least one id for a bulk update", () => {
    expect(v_bulk_update_amendments.safeParse({ amendmentIds: [], updates: {} }).success).toBe(false);
    expect(v_bulk_update_amendments.parse({ amendmentIds: [1, 2], updates: { notes: null } })).toEqual({
      amendmentIds: [1, 2],
      updates: { notes: null },
    });
  });
});

describe("catalog and params", () => {
  it("reads the active filter", () => {
    expect(v_employee_query.parse({ active: "false" })).toEqual({ active: false });
    expect(v_employee_query.parse({})).toEqual({});
    expect(v_employee_query.safeParse({ active: "maybe" }).success).toBe(false);
  });

  it("parses positive integer ids", () => {
    expect(parseIdParam("42")).toBe(42);
    expect(() => parseIdParam("abc", "amendmentId")).toThrow(ValidationFailureError);
    expect(() => parseIdParam("0")).toThrow(ValidationFailureError);
  });
});
