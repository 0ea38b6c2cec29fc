import { z } from "zod";

import { CoverageLevelSchema, VehicleClassSchema } from "@vsc/contracts";

const multiplier = z.number().finite().positive();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "effectiveDate must be an ISO date (YYYY-MM-DD)");

export const VehicleClassificationRowSchema = z.object({
  make: z.string().trim().toLowerCase().min(1),
  vehicleClass: VehicleClassSchema,
});

export const CoverageDescriptorRowSchema = z.object({
  coverageLevel: CoverageLevelSchema,
  name: z.string(),
  description: z.string(),
  coveredComponents: z.array(z.string()),
  benefits: z.array(z.string()),
  exclusions: z.array(z.string()).optional(),
});

export const TermMultiplierRowSchema = z.object({
  termMonths: z.number().int().positive(),
  multiplier,
});

export const DeductibleMultiplierRowSchema = z.object({
  deductible: z.number().int().nonnegative(),
  multiplier,
});

export const MileageBracketRowSchema = z
  .object({
    key: z.string().min(1),
    minMileage: z.number().int().nonnegative(),
    maxMileage: z.number().int().nonnegative(),
    multiplier,
  })
  .refine((row) => row.minMileage <= row.maxMileage, { message: "minMileage must not exceed maxMileage" });

export const AgeBracketRowSchema = z.object({
  key: z.string().min(1),
  maxAgeYears: z.number().int().nonnegative(),
  multiplier,
});

export const BaseRateRowSchema = z.object({
  vehicleClass: VehicleClassSchema,
  coverageLevel: CoverageLevelSchema,
  baseRate: z.number().finite().positive(),
});

export const RateMatrixEntrySchema = z
  .object({
    vehicleClass: VehicleClassSchema,
    coverageLevel: CoverageLevelSchema,
    termMonths: z.number().int().positive(),
    mileageRangeKey: z.string().min(1),
    minMileage: z.number().int().nonnegative(),
    maxMileage: z.number().int().nonnegative(),
    rateAmount: z.number().finite().positive(),
    effectiveDate: isoDate,
    active: z.boolean(),
  })
  .refine((row) => row.minMileage <= row.maxMileage, { message: "minMileage must not exceed maxMileage" });

export type VehicleClassificationRow = z.infer<typeof VehicleClassificationRowSchema>;
export type CoverageDescriptorRow = z.infer<typeof CoverageDescriptorRowSchema>;
export type TermMultiplierRow = z.infer<typeof TermMultiplierRowSchema>;
export type DeductibleMultiplierRow = z.infer<typeof DeductibleMultiplierRowSchema>;
export type MileageBracketRow = z.infer<typeof MileageBracketRowSchema>;
export type AgeBracketRow = z.infer<typeof AgeBracketRowSchema>;
export type BaseRateRow = z.infer<typeof BaseRateRowSchema>;
export type RateMatrixEntry = z.infer<typeof RateMatrixEntrySchema>;

export type ReferenceTableRows = {
  vehicleClassification: VehicleClassificationRow[];
  coverageDescriptors: CoverageDescriptorRow[];
  termMultipliers: TermMultiplierRow[];
  deductibleMultipliers: DeductibleMultiplierRow[];
  mileageBrackets: MileageBracketRow[];
  ageBrackets: AgeBracketRow[];
  baseRates: BaseRateRow[];
  rateMatrix: RateMatrixEntry[];
};

export type ReferenceTableName = keyof ReferenceTableRows;

export const REFERENCE_TABLE_NAMES = [
  "vehicleClassification",
  "coverageDescriptors",
  "termMultipliers",
  "deductibleMultipliers",
  "mileageBrackets",
  "ageBrackets",
  "baseRates",
  "rateMatrix",
] as const satisfies readonly ReferenceTableName[];

// An empty rate matrix only means no exact rates are on file; every other table must have rows.
export const EMPTY_TABLE_ALLOWED: ReadonlySet<ReferenceTableName> = new Set<ReferenceTableName>(["rateMatrix"]);

export const REFERENCE_TABLE_SCHEMAS = {
  vehicleClassification: z.array(VehicleClassificationRowSchema),
  coverageDescriptors: z.array(CoverageDescriptorRowSchema),
  termMultipliers: z.array(TermMultiplierRowSchema),
  deductibleMultipliers: z.array(DeductibleMultiplierRowSchema),
  mileageBrackets: z.array(MileageBracketRowSchema),
  ageBrackets: z.array(AgeBracketRowSchema),
  baseRates: z.array(BaseRateRowSchema),
  rateMatrix: z.array(RateMatrixEntrySchema),
} satisfies { [K in ReferenceTableName]: z.ZodType<ReferenceTableRows[K], z.ZodTypeDef, unknown> };

export type ReferenceRowParseResult<K extends ReferenceTableName> =
  | { ok: true; rows: ReferenceTableRows[K] }
  | { ok: false; issues: string[] };

type ReferenceRowParsers = {
  [K in ReferenceTableName]: (raw: unknown) => ReferenceRowParseResult<K>;
};

const parserFor =
  <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
  (raw: unknown): { ok: true; rows: T } | { ok: false; issues: string[] } => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return { ok: true, rows: parsed.data };
    }

    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    };
  };

const REFERENCE_ROW_PARSERS: ReferenceRowParsers = {
  vehicleClassification: parserFor(REFERENCE_TABLE_SCHEMAS.vehicleClassification),
  coverageDescriptors: parserFor(REFERENCE_TABLE_SCHEMAS.coverageDescriptors),
  termMultipliers: parserFor(REFERENCE_TABLE_SCHEMAS.termMultipliers),
  deductibleMultipliers: parserFor(REFERENCE_TABLE_SCHEMAS.deductibleMultipliers),
  mileageBrackets: parserFor(REFERENCE_TABLE_SCHEMAS.mileageBrackets),
  ageBrackets: parserFor(REFERENCE_TABLE_SCHEMAS.ageBrackets),
  baseRates: parserFor(REFERENCE_TABLE_SCHEMAS.baseRates),
  rateMatrix: parserFor(REFERENCE_TABLE_SCHEMAS.rateMatrix),
};

export function parseReferenceRows<K extends ReferenceTableName>(table: K, raw: unknown): ReferenceRowParseResult<K> {
  return REFERENCE_ROW_PARSERS[table](raw);
}
