import type { ReferenceTableName } from "../rating/referenceTables";

/** Convex table backing each reference table the rating engine caches. */
export const REFERENCE_TABLE_STORAGE = {
  vehicleClassification: "vscVehicleClassification",
  coverageDescriptors: "vscCoverageDescriptors",
  termMultipliers: "vscTermMultipliers",
  deductibleMultipliers: "vscDeductibleMultipliers",
  mileageBrackets: "vscMileageBrackets",
  ageBrackets: "vscAgeBrackets",
  baseRates: "vscBaseRates",
  rateMatrix: "vscRateMatrix",
} as const satisfies Record<ReferenceTableName, string>;

export const ADMIN_SETTINGS_TABLE = "adminSettings";
