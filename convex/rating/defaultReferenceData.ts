import { readFileSync } from "node:fs";

import { z } from "zod";

import { REFERENCE_TABLE_SCHEMAS, type ReferenceTableRows } from "./referenceTables";

const positiveMultiplier = z.number().finite().positive();

export const EligibilityRulesSchema = z.object({
  maxAgeYears: z.number().int().positive(),
  maxMileage: z.number().int().positive(),
  warningAgeYears: z.number().int().positive(),
  warningMileage: z.number().int().positive(),
  recommendGoldAgeYears: z.number().int().positive(),
  luxuryBrands: z.array(z.string().min(2)),
  highMaintenanceBrands: z.array(z.string().min(2)),
  valueBrands: z.array(z.string().min(2)),
});

export const DefaultReferenceDataSchema = z.object({
  version: z.string().min(1),
  settings: z.object({
    productType: z.string().min(1),
    adminFee: z.number().finite().nonnegative(),
    taxRate: z.number().finite().min(0).lt(1),
  }),
  customerDiscounts: z.object({
    retail: positiveMultiplier,
    wholesale: positiveMultiplier,
  }),
  eligibility: EligibilityRulesSchema,
  tables: z.object({
    vehicleClassification: REFERENCE_TABLE_SCHEMAS.vehicleClassification.min(1),
    coverageDescriptors: REFERENCE_TABLE_SCHEMAS.coverageDescriptors.min(1),
    termMultipliers: REFERENCE_TABLE_SCHEMAS.termMultipliers.min(1),
    deductibleMultipliers: REFERENCE_TABLE_SCHEMAS.deductibleMultipliers.min(1),
    mileageBrackets: REFERENCE_TABLE_SCHEMAS.mileageBrackets.min(1),
    ageBrackets: REFERENCE_TABLE_SCHEMAS.ageBrackets.min(1),
    baseRates: REFERENCE_TABLE_SCHEMAS.baseRates.min(1),
    rateMatrix: REFERENCE_TABLE_SCHEMAS.rateMatrix,
  }),
});

export type EligibilityRules = z.infer<typeof EligibilityRulesSchema>;
export type DefaultReferenceData = Omit<z.infer<typeof DefaultReferenceDataSchema>, "tables"> & {
  tables: ReferenceTableRows;
};

const loadDefaultReferenceData = (): DefaultReferenceData => {
  const raw: unknown = JSON.parse(readFileSync(new URL("./defaultReferenceData.json", import.meta.url), "utf8"));
  const parsed = DefaultReferenceDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `[config] defaultReferenceData.json is invalid: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );
  }

  return parsed.data;
};

/**
 * Versioned fallback configuration used whenever the reference store or the
 * settings provider cannot answer. Every hardcoded rate, multiplier, fee and
 * eligibility threshold the engine knows about lives here.
 */
export const DEFAULT_REFERENCE_DATA: DefaultReferenceData = loadDefaultReferenceData();
