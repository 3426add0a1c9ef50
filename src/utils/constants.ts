import forces from "../db/reference-data/forces.json";

export const AMENDMENT_TYPES = [
  "Bug",
  "Fault",
  "Enhancement",
  "Feature",
  "Suggestion",
  "Maintenance",
  "Documentation",
] as const;
export type AmendmentType = (typeof AMENDMENT_TYPES)[number];

export const AMENDMENT_STATUSES = ["Open", "In Progress", "Testing", "Completed", "Deployed"] as const;
export type AmendmentStatus = (typeof AMENDMENT_STATUSES)[number];

export const DEVELOPMENT_STATUSES = ["Not Started", "In Development", "Code Review", "Ready for QA"] as const;
export type DevelopmentStatus = (typeof DEVELOPMENT_STATUSES)[number];

export const PRIORITIES = ["Low", "Medium", "High", "Critical"] as const;
export type Priority = (typeof PRIORITIES)[number];

export const LINK_TYPES = ["Related", "Duplicate", "Blocks", "Blocked By"] as const;
export type LinkType = (typeof LINK_TYPES)[number];

export const DOCUMENT_TYPES = ["Test Plan", "Screenshot", "Specification", "Other"] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

// Police forces and partner organisations that report amendments.
export const FORCES: readonly string[] = forces;

export const GLOBAL_CONSTANTS = {
  defaults: {
    amendmentStatus: "Open" satisfies AmendmentStatus,
    developmentStatus: "Not Started" satisfies DevelopmentStatus,
    priority: "Medium" satisfies Priority,
    linkType: "Related" satisfies LinkType,
    documentType: "Other" satisfies DocumentType,
  },
  pagination: {
    defaultLimit: 100,
    maxLimit: 1000,
  },
  reference: {
    prefix: "AMD",
    sequenceDigits: 3,
  },
} as const;
