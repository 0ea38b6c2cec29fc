import { v } from "convex/values";

export const auditFields = {
  createdAt: v.number(),
  updatedAt: v.number(),
  updatedBy: v.optional(v.string()),
};

export const vehicleClassField = v.union(v.literal("A"), v.literal("B"), v.literal("C"));
export const coverageLevelField = v.union(v.literal("silver"), v.literal("gold"), v.literal("platinum"));

export const multiplierFields = {
  multiplier: v.number(),
  ...auditFields,
};

// Audit columns never leave the database; the engine only sees reference values.
export const AUDIT_FIELD_NAMES: ReadonlySet<string> = new Set(["_id", "_creationTime", ...Object.keys(auditFields)]);
