import { defineSchema, defineTable } from "convex/server";
import { v } from "convex/values";

import { auditFields, coverageLevelField, multiplierFields, vehicleClassField } from "./model/fields";

export default defineSchema({
  vscVehicleClassification: defineTable({
    make: v.string(),
    vehicleClass: vehicleClassField,
    ...auditFields,
  }).index("by_make", ["make"]),

  vscCoverageDescriptors: defineTable({
    coverageLevel: coverageLevelField,
    name: v.string(),
    description: v.string(),
    coveredComponents: v.array(v.string()),
    benefits: v.array(v.string()),
    exclusions: v.optional(v.array(v.string())),
    ...auditFields,
  }).index("by_coverage_level", ["coverageLevel"]),

  vscTermMultipliers: defineTable({
    termMonths: v.number(),
    ...multiplierFields,
  }).index("by_term", ["termMonths"]),

  vscDeductibleMultipliers: defineTable({
    deductible: v.number(),
    ...multiplierFields,
  }).index("by_deductible", ["deductible"]),

  vscMileageBrackets: defineTable({
    key: v.string(),
    minMileage: v.number(),
    maxMileage: v.number(),
    ...multiplierFields,
  }).index("by_key", ["key"]),

  vscAgeBrackets: defineTable({
    key: v.string(),
    maxAgeYears: v.number(),
    ...multiplierFields,
  }).index("by_key", ["key"]),

  vscBaseRates: defineTable({
    vehicleClass: vehicleClassField,
    coverageLevel: coverageLevelField,
    baseRate: v.number(),
    ...auditFields,
  }).index("by_class_coverage", ["vehicleClass", "coverageLevel"]),

  // Rows are never edited in place: a new rate is a new row with a later effectiveDate.
  // Convex has no unique constraint; writers check by_rate_key before inserting.
  vscRateMatrix: defineTable({
    vehicleClass: vehicleClassField,
    coverageLevel: coverageLevelField,
    termMonths: v.number(),
    mileageRangeKey: v.string(),
    minMileage: v.number(),
    maxMileage: v.number(),
    rateAmount: v.number(),
    effectiveDate: v.string(),
    active: v.boolean(),
    ...auditFields,
  })
    .index("by_rate_key", ["vehicleClass", "coverageLevel", "termMonths", "mileageRangeKey", "effectiveDate"])
    .index("by_active", ["active"]),

  adminSettings: defineTable({
    category: v.string(),
    key: v.string(),
    value: v.union(v.number(), v.string()),
    ...auditFields,
  }).index("by_category_key", ["category", "key"]),
});
