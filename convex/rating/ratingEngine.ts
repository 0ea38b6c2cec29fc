import {
  COVERAGE_LEVELS,
  VALID_TERM_MONTHS,
  VEHICLE_CLASSES,
  type CoverageLevel,
  type EligibilityCheckRequest,
  type EligibilityCheckResponse,
  type EligibilityThresholds,
  type RatingRequest,
  type RatingResponse,
  type ValidationDeclineResponse,
  type ValidationIssue,
  type VehicleClass,
  type VinInfo,
} from "@vsc/contracts";

import { describeError, withTimeout } from "../model/withTimeout";
import type { DecodedVehicle, VinDecodeAdapter } from "../vin/types";
import { evaluateEligibility, INELIGIBLE_VEHICLE_MESSAGE } from "./eligibility";
import { PriceAssembler, presentBreakdown, type Quote, type SettingsProvider } from "./priceAssembler";
import type { ReferenceDataCache } from "./referenceDataCache";
import type { ReferenceTableName } from "./referenceTables";
import { RateResolver } from "./rateResolver";
import { baseRatesForClass, type VehicleClassDescription, VehicleClassifier } from "./vehicleClassifier";

// Only rejects nonsense years; anything older than the age limit is declined by the eligibility gate.
export const MIN_MODEL_YEAR = 1900;

export type RatingEngineOptions = {
  cache: ReferenceDataCache;
  settings: SettingsProvider;
  vinDecoder?: VinDecodeAdapter | null;
  vinTimeoutMs?: number;
  settingsTimeoutMs?: number;
  now?: () => Date;
};

export type RatingOutcome = {
  response: RatingResponse;
  /** Unrounded, frozen quote; null when the request was declined. */
  quote: Quote | null;
};

export type CoverageOptions = {
  referenceDataVersion: string;
  degraded: boolean;
  coverageLevels: Array<{
    coverageLevel: CoverageLevel;
    name: string;
    description: string;
    coveredComponents: string[];
    benefits: string[];
    exclusions: string[];
    baseRates: Partial<Record<VehicleClass, number>>;
  }>;
  termOptions: Array<{ termMonths: number; multiplier: number }>;
  deductibleOptions: Array<{ deductible: number; multiplier: number }>;
  customerDiscounts: Record<"retail" | "wholesale", number>;
  vehicleClasses: Array<{ vehicleClass: VehicleClass; exampleMakes: string[] }>;
};

export type EligibilityRequirements = {
  thresholds: EligibilityThresholds;
  warningThresholds: { ageYears: number; mileage: number };
  declineMessage: typeof INELIGIBLE_VEHICLE_MESSAGE;
  modelYearRange: { min: number; max: number };
  termOptions: number[];
  deductibleOptions: number[];
};

type VehicleFields = {
  vin?: string;
  make?: string;
  model?: string;
  year?: number;
};

type ResolvedVehicle =
  | { ok: true; make: string; model: string; year: number; vinInfo?: VinInfo }
  | { ok: false; issues: ValidationIssue[] };

export const validationDecline = (issues: ValidationIssue[]): ValidationDeclineResponse => ({
  status: "declined",
  eligible: false,
  reason: "VALIDATION_ERROR",
  message: "The rating request is missing required fields or contains invalid values.",
  issues,
});

const EXAMPLE_MAKES_PER_CLASS = 5;

const titleCaseMake = (make: string): string =>
  make.length <= 3 ? make.toUpperCase() : make.replace(/(^|[\s-])([a-z])/g, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());

export class RatingEngine {
  private readonly cache: ReferenceDataCache;
  private readonly vinDecoder: VinDecodeAdapter | null;
  private readonly vinTimeoutMs: number;
  private readonly now: () => Date;
  private readonly classifier: VehicleClassifier;
  private readonly resolver: RateResolver;
  private readonly assembler: PriceAssembler;

  constructor(options: RatingEngineOptions) {
    this.cache = options.cache;
    this.vinDecoder = options.vinDecoder ?? null;
    this.vinTimeoutMs = options.vinTimeoutMs ?? 3_000;
    this.now = options.now ?? (() => new Date());
    this.classifier = new VehicleClassifier(this.cache);
    this.resolver = new RateResolver(this.cache);
    this.assembler = new PriceAssembler(options.settings, {
      now: this.now,
      defaults: this.cache.defaults,
      ...(options.settingsTimeoutMs !== undefined ? { settingsTimeoutMs: options.settingsTimeoutMs } : {}),
    });
  }

  async rate(request: RatingRequest): Promise<RatingResponse> {
    return (await this.quote(request)).response;
  }

  /**
   * VIN resolution, classification, the eligibility gate, then pricing.
   * Declines come back as responses; only `UnrecoverableRatingError` is thrown.
   */
  async quote(request: RatingRequest): Promise<RatingOutcome> {
    const vehicle = await this.resolveVehicle(request);
    if (!vehicle.ok) {
      return { response: validationDecline(vehicle.issues), quote: null };
    }

    const today = this.now();
    const ageYears = today.getUTCFullYear() - vehicle.year;
    const classification = await this.classifier.resolve(vehicle.make);
    const eligibility = evaluateEligibility(
      { make: vehicle.make, ageYears, mileage: request.mileage },
      this.cache.defaults.eligibility,
    );
    const vinInfo = vehicle.vinInfo ? { vinInfo: vehicle.vinInfo } : {};

    if (!eligibility.eligible) {
      return {
        response: {
          status: "declined",
          eligible: false,
          reason: "INELIGIBLE_VEHICLE",
          message: eligibility.message,
          thresholds: eligibility.thresholds,
          vehicle: { make: vehicle.make, year: vehicle.year, mileage: request.mileage, ageYears },
          restrictions: eligibility.restrictions,
          recommendations: eligibility.recommendations,
          ...vinInfo,
        },
        quote: null,
      };
    }

    const rate = await this.resolver.resolve(eligibility, {
      vehicleClass: classification.vehicleClass,
      coverageLevel: request.coverageLevel,
      termMonths: request.termMonths,
      deductible: request.deductible,
      customerSegment: request.customerSegment,
      mileage: request.mileage,
      asOf: today.toISOString().slice(0, 10),
    });

    const fallbackTables: ReferenceTableName[] = classification.degraded
      ? ["vehicleClassification", ...rate.fallbackTables]
      : rate.fallbackTables;

    const quote = await this.assembler.assemble(
      { ...rate, fallbackTables, rateData: fallbackTables.length > 0 ? "fallback" : "store" },
      {
        make: vehicle.make,
        model: vehicle.model,
        year: vehicle.year,
        mileage: request.mileage,
        ageYears,
        vehicleClass: classification.vehicleClass,
        coverageLevel: request.coverageLevel,
        termMonths: request.termMonths,
        deductible: request.deductible,
        customerSegment: request.customerSegment,
        jurisdiction: request.jurisdiction ?? null,
      },
    );

    return {
      response: {
        status: "quoted",
        eligible: true,
        quoteId: quote.quoteId,
        vehicle: {
          make: vehicle.make,
          model: vehicle.model,
          year: vehicle.year,
          mileage: request.mileage,
          ageYears,
          vehicleClass: classification.vehicleClass,
        },
        coverage: {
          coverageLevel: request.coverageLevel,
          termMonths: request.termMonths,
          deductible: request.deductible,
          customerSegment: request.customerSegment,
          jurisdiction: request.jurisdiction ?? null,
        },
        pricingMethod: quote.pricingMethod,
        breakdown: presentBreakdown(quote.breakdown),
        ratingFactors: { ...quote.ratingFactors },
        provenance: { ...quote.provenance, fallbackTables: [...quote.provenance.fallbackTables] },
        eligibilityStatus: eligibility.status,
        warnings: eligibility.warnings,
        surchargeNotices: eligibility.surchargeNotices,
        recommendations: eligibility.recommendations,
        issuedAt: quote.issuedAt,
        validUntil: quote.validUntil,
        currency: "USD",
        ...vinInfo,
      },
      quote,
    };
  }

  async checkEligibility(request: EligibilityCheckRequest): Promise<EligibilityCheckResponse> {
    const vehicle = await this.resolveVehicle(request);
    if (!vehicle.ok) {
      return validationDecline(vehicle.issues);
    }

    const ageYears = this.now().getUTCFullYear() - vehicle.year;
    const { vehicleClass } = await this.classifier.resolve(vehicle.make);
    const mileage = request.mileage ?? null;
    const eligibility = evaluateEligibility({ make: vehicle.make, ageYears, mileage }, this.cache.defaults.eligibility);

    return {
      status: "checked",
      eligible: eligibility.eligible,
      eligibilityStatus: eligibility.status,
      message: eligibility.message,
      vehicle: { make: vehicle.make, year: vehicle.year, mileage, ageYears, vehicleClass },
      thresholds: eligibility.thresholds,
      warnings: eligibility.warnings,
      restrictions: eligibility.restrictions,
      surchargeNotices: eligibility.surchargeNotices,
      recommendations: eligibility.recommendations,
      ...(vehicle.vinInfo ? { vinInfo: vehicle.vinInfo } : {}),
    };
  }

  async getCoverageOptions(): Promise<CoverageOptions> {
    const [descriptors, baseRates, terms, deductibles, classification] = await Promise.all([
      this.cache.get("coverageDescriptors"),
      this.cache.get("baseRates"),
      this.cache.get("termMultipliers"),
      this.cache.get("deductibleMultipliers"),
      this.cache.get("vehicleClassification"),
    ]);

    const ratesByClass = VEHICLE_CLASSES.map((vehicleClass) => ({
      vehicleClass,
      rates: baseRatesForClass(vehicleClass, baseRates.rows),
    }));

    const coverageLevels = COVERAGE_LEVELS.flatMap((coverageLevel) => {
      const descriptor = descriptors.rows.find((row) => row.coverageLevel === coverageLevel);
      if (!descriptor) return [];

      const levelRates: Partial<Record<VehicleClass, number>> = {};
      for (const { vehicleClass, rates } of ratesByClass) {
        const rate = rates[coverageLevel];
        if (rate !== undefined) levelRates[vehicleClass] = rate;
      }

      return [
        {
          coverageLevel,
          name: descriptor.name,
          description: descriptor.description,
          coveredComponents: descriptor.coveredComponents,
          benefits: descriptor.benefits,
          exclusions: descriptor.exclusions ?? [],
          baseRates: levelRates,
        },
      ];
    });

    return {
      referenceDataVersion: this.cache.defaults.version,
      degraded: [descriptors, baseRates, terms, deductibles, classification].some((snapshot) => snapshot.degraded),
      coverageLevels,
      termOptions: [...terms.rows]
        .sort((left, right) => left.termMonths - right.termMonths)
        .map(({ termMonths, multiplier }) => ({ termMonths, multiplier })),
      deductibleOptions: [...deductibles.rows]
        .sort((left, right) => left.deductible - right.deductible)
        .map(({ deductible, multiplier }) => ({ deductible, multiplier })),
      customerDiscounts: { ...this.cache.defaults.customerDiscounts },
      vehicleClasses: VEHICLE_CLASSES.map((vehicleClass) => ({
        vehicleClass,
        exampleMakes: classification.rows
          .filter((row) => row.vehicleClass === vehicleClass)
          .slice(0, EXAMPLE_MAKES_PER_CLASS)
          .map((row) => titleCaseMake(row.make)),
      })),
    };
  }

  getVehicleClassInfo(make: string): Promise<VehicleClassDescription> {
    return this.classifier.describe(make);
  }

  getEligibilityRequirements(): EligibilityRequirements {
    const rules = this.cache.defaults.eligibility;
    return {
      thresholds: { maxAgeYears: rules.maxAgeYears, maxMileage: rules.maxMileage },
      warningThresholds: { ageYears: rules.warningAgeYears, mileage: rules.warningMileage },
      declineMessage: INELIGIBLE_VEHICLE_MESSAGE,
      modelYearRange: { min: MIN_MODEL_YEAR, max: this.now().getUTCFullYear() + 1 },
      termOptions: [...VALID_TERM_MONTHS],
      deductibleOptions: this.cache.defaults.tables.deductibleMultipliers.map((row) => row.deductible),
    };
  }

  // Caller-supplied fields win; decoded VIN values only fill the gaps.
  private async resolveVehicle(fields: VehicleFields): Promise<ResolvedVehicle> {
    let make = fields.make;
    let model = fields.model;
    let year = fields.year;
    let vinInfo: VinInfo | undefined;

    if (fields.vin) {
      const decoded = await this.decodeVin(fields.vin);
      let autoPopulated = false;
      if (decoded) {
        if (make === undefined && decoded.make !== null) {
          make = decoded.make;
          autoPopulated = true;
        }
        if (model === undefined && decoded.model !== null) {
          model = decoded.model;
          autoPopulated = true;
        }
        if (year === undefined && decoded.year !== null) {
          year = decoded.year;
          autoPopulated = true;
        }
      }
      vinInfo = { vin: fields.vin, autoPopulated, decoded };
    }

    const maxYear = this.now().getUTCFullYear() + 1;
    const issues: ValidationIssue[] = [];
    if (make === undefined || make.trim().length < 2) {
      issues.push({
        field: "make",
        message: fields.vin ? "Vehicle make is required (VIN could not be decoded)" : "Vehicle make is required",
      });
    }
    if (year === undefined) {
      issues.push({
        field: "year",
        message: fields.vin ? "Vehicle year is required (VIN could not be decoded)" : "Vehicle year is required",
      });
    } else if (year < MIN_MODEL_YEAR || year > maxYear) {
      issues.push({ field: "year", message: `Year must be between ${MIN_MODEL_YEAR} and ${maxYear}` });
    }

    if (make === undefined || year === undefined || issues.length > 0) {
      return { ok: false, issues };
    }

    return { ok: true, make: make.trim(), model: model ?? "", year, ...(vinInfo ? { vinInfo } : {}) };
  }

  // A failing or slow decoder only costs the auto-populated fields.
  private async decodeVin(vin: string): Promise<DecodedVehicle | null> {
    if (!this.vinDecoder) return null;

    try {
      return await withTimeout(this.vinDecoder.decode(vin), this.vinTimeoutMs, "vin decode");
    } catch (error) {
      console.warn("vin_decode_failed", { vinSuffix: vin.slice(-6), message: describeError(error) });
      return null;
    }
  }
}
