import { z } from "zod";

export const COVERAGE_LEVELS = ["silver", "gold", "platinum"] as const;
export const CUSTOMER_SEGMENTS = ["retail", "wholesale"] as const;
export const VEHICLE_CLASSES = ["A", "B", "C"] as const;
export const VALID_TERM_MONTHS = [12, 24, 36, 48, 60, 72] as const;

export const CoverageLevelSchema = z.enum(COVERAGE_LEVELS);
export const CustomerSegmentSchema = z.enum(CUSTOMER_SEGMENTS);
export const VehicleClassSchema = z.enum(VEHICLE_CLASSES);
export const PricingMethodSchema = z.enum(["exact", "computed"]);
export const DataSourceSchema = z.enum(["store", "fallback"]);
export const EligibilityStatusSchema = z.enum(["ELIGIBLE", "ELIGIBLE_WITH_WARNING", "INELIGIBLE"]);

const lowerCaseEnum = <T extends [string, ...string[]]>(schema: z.ZodEnum<T>) =>
  z.string().trim().toLowerCase().pipe(schema);

// Coercing null or "" would read as 0, so only numbers and non-blank strings reach the coercion.
const coercedInteger = (messages: { required: string; invalid: string }) =>
  z
    .union([z.number(), z.string().trim().min(1, messages.required)], {
      errorMap: (_, ctx) => ({ message: ctx.data === undefined || ctx.data === null ? messages.required : messages.invalid }),
    })
    .pipe(z.coerce.number({ invalid_type_error: messages.invalid }).int(messages.invalid));

const MILEAGE_MESSAGES = { required: "Mileage is required", invalid: "Mileage is required and must be a number" };
const MILEAGE_RANGE_MESSAGE = "Mileage must be between 0 and 500,000";

const YearSchema = coercedInteger({ required: "Vehicle year is required", invalid: "Year must be a number" });

const MileageSchema = coercedInteger(MILEAGE_MESSAGES).pipe(
  z.number().min(0, MILEAGE_RANGE_MESSAGE).max(500_000, MILEAGE_RANGE_MESSAGE),
);

export const VinSchema = z
  .string()
  .transform((value) => value.replace(/[^A-Za-z0-9]/g, "").toUpperCase())
  .pipe(z.string().length(17, "VIN must be 17 alphanumeric characters after normalization."));

export const RatingRequestSchema = z.object({
  vin: VinSchema.optional(),
  make: z.string().trim().min(2, "Vehicle make is required").optional(),
  model: z.string().trim().optional(),
  year: YearSchema.optional(),
  mileage: MileageSchema,
  coverageLevel: lowerCaseEnum(CoverageLevelSchema).default("gold"),
  termMonths: z.coerce
    .number()
    .int()
    .refine((term) => VALID_TERM_MONTHS.some((valid) => valid === term), {
      message: `Term must be one of: ${VALID_TERM_MONTHS.join(", ")}`,
    })
    .default(36),
  deductible: coercedInteger({ required: "Deductible is required", invalid: "Deductible must be a whole number" })
    .pipe(z.number().nonnegative("Deductible must not be negative"))
    .default(100),
  customerSegment: lowerCaseEnum(CustomerSegmentSchema).default("retail"),
  jurisdiction: z.string().trim().length(2).toUpperCase().optional(),
});

export const EligibilityCheckRequestSchema = z.object({
  vin: VinSchema.optional(),
  make: z.string().trim().min(2).optional(),
  year: YearSchema.optional(),
  mileage: MileageSchema.optional(),
});

export const EligibilityThresholdsSchema = z.object({
  maxAgeYears: z.number().int().positive(),
  maxMileage: z.number().int().positive(),
});

export const VinInfoSchema = z.object({
  vin: z.string(),
  autoPopulated: z.boolean(),
  decoded: z
    .object({
      make: z.string().nullable(),
      model: z.string().nullable(),
      year: z.number().int().nullable(),
      source: z.enum(["nhtsa", "vin_pattern"]),
    })
    .nullable(),
});

export const RatingBreakdownSchema = z.object({
  basePrice: z.number().nonnegative(),
  adminFee: z.number().nonnegative(),
  subtotal: z.number().nonnegative(),
  taxAmount: z.number().nonnegative(),
  totalPrice: z.number().nonnegative(),
  monthlyPayment: z.number().nonnegative(),
});

export const RatingFactorsSchema = z.object({
  rateAmount: z.number().positive().nullable(),
  baseRate: z.number().positive().nullable(),
  ageMultiplier: z.number().positive().nullable(),
  mileageMultiplier: z.number().positive().nullable(),
  termMultiplier: z.number().positive().nullable(),
  deductibleMultiplier: z.number().positive(),
  customerDiscount: z.number().positive(),
  taxRate: z.number().nonnegative(),
});

export const ProvenanceSchema = z.object({
  adminFee: DataSourceSchema,
  taxRate: DataSourceSchema,
  rateData: DataSourceSchema,
  fallbackTables: z.array(z.string()),
  referenceDataVersion: z.string(),
});

export const QuotedResponseSchema = z.object({
  status: z.literal("quoted"),
  eligible: z.literal(true),
  quoteId: z.string().regex(/^VSC-\d{14}-[0-9a-f]{8}$/),
  vehicle: z.object({
    make: z.string(),
    model: z.string(),
    year: z.number().int(),
    mileage: z.number().int(),
    ageYears: z.number().int(),
    vehicleClass: VehicleClassSchema,
  }),
  coverage: z.object({
    coverageLevel: CoverageLevelSchema,
    termMonths: z.number().int(),
    deductible: z.number().int(),
    customerSegment: CustomerSegmentSchema,
    jurisdiction: z.string().nullable(),
  }),
  pricingMethod: PricingMethodSchema,
  breakdown: RatingBreakdownSchema,
  ratingFactors: RatingFactorsSchema,
  provenance: ProvenanceSchema,
  eligibilityStatus: EligibilityStatusSchema,
  warnings: z.array(z.string()),
  surchargeNotices: z.array(z.string()),
  recommendations: z.array(z.string()),
  issuedAt: z.string().datetime(),
  validUntil: z.string().datetime(),
  currency: z.literal("USD"),
  vinInfo: VinInfoSchema.optional(),
});

export const IneligibleResponseSchema = z.object({
  status: z.literal("declined"),
  eligible: z.literal(false),
  reason: z.literal("INELIGIBLE_VEHICLE"),
  message: z.string(),
  thresholds: EligibilityThresholdsSchema,
  vehicle: z.object({
    make: z.string(),
    year: z.number().int(),
    mileage: z.number().int(),
    ageYears: z.number().int(),
  }),
  restrictions: z.array(z.string()),
  recommendations: z.array(z.string()),
  vinInfo: VinInfoSchema.optional(),
});

export const ValidationIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
});

export const ValidationDeclineResponseSchema = z.object({
  status: z.literal("declined"),
  eligible: z.literal(false),
  reason: z.literal("VALIDATION_ERROR"),
  message: z.string(),
  issues: z.array(ValidationIssueSchema).min(1),
});

export const RatingResponseSchema = z.union([
  QuotedResponseSchema,
  IneligibleResponseSchema,
  ValidationDeclineResponseSchema,
]);

export const EligibilityCheckResponseSchema = z.union([
  z.object({
    status: z.literal("checked"),
    eligible: z.boolean(),
    eligibilityStatus: EligibilityStatusSchema,
    message: z.string().nullable(),
    vehicle: z.object({
      make: z.string(),
      year: z.number().int(),
      mileage: z.number().int().nullable(),
      ageYears: z.number().int(),
      vehicleClass: VehicleClassSchema,
    }),
    thresholds: EligibilityThresholdsSchema,
    warnings: z.array(z.string()),
    restrictions: z.array(z.string()),
    surchargeNotices: z.array(z.string()),
    recommendations: z.array(z.string()),
    vinInfo: VinInfoSchema.optional(),
  }),
  ValidationDeclineResponseSchema,
]);

export type CoverageLevel = z.infer<typeof CoverageLevelSchema>;
export type CustomerSegment = z.infer<typeof CustomerSegmentSchema>;
export type VehicleClass = z.infer<typeof VehicleClassSchema>;
export type PricingMethod = z.infer<typeof PricingMethodSchema>;
export type DataSource = z.infer<typeof DataSourceSchema>;
export type EligibilityStatus = z.infer<typeof EligibilityStatusSchema>;
export type RatingRequestInput = z.input<typeof RatingRequestSchema>;
export type RatingRequest = z.infer<typeof RatingRequestSchema>;
export type EligibilityCheckRequest = z.infer<typeof EligibilityCheckRequestSchema>;
export type EligibilityThresholds = z.infer<typeof EligibilityThresholdsSchema>;
export type VinInfo = z.infer<typeof VinInfoSchema>;
export type RatingBreakdown = z.infer<typeof RatingBreakdownSchema>;
export type RatingFactors = z.infer<typeof RatingFactorsSchema>;
export type Provenance = z.infer<typeof ProvenanceSchema>;
export type QuotedResponse = z.infer<typeof QuotedResponseSchema>;
export type IneligibleResponse = z.infer<typeof IneligibleResponseSchema>;
export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;
export type ValidationDeclineResponse = z.infer<typeof ValidationDeclineResponseSchema>;
export type RatingResponse = z.infer<typeof RatingResponseSchema>;
export type EligibilityCheckResponse = z.infer<typeof EligibilityCheckResponseSchema>;
