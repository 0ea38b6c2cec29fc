import type { CoverageLevel, CustomerSegment, DataSource, PricingMethod, VehicleClass } from "@vsc/contracts";

import type { EligibleResult } from "./eligibility";
import { requirePositive, UnrecoverableRatingError } from "./errors";
import type { ReferenceDataCache, ReferenceTableSnapshot } from "./referenceDataCache";
import type {
  AgeBracketRow,
  BaseRateRow,
  DeductibleMultiplierRow,
  MileageBracketRow,
  RateMatrixEntry,
  ReferenceTableName,
  TermMultiplierRow,
} from "./referenceTables";

export type RateRequest = {
  vehicleClass: VehicleClass;
  coverageLevel: CoverageLevel;
  termMonths: number;
  deductible: number;
  customerSegment: CustomerSegment;
  mileage: number;
  /** ISO date (YYYY-MM-DD) the rate must be effective on. */
  asOf: string;
};

export type RateFactors = {
  rateAmount: number | null;
  baseRate: number | null;
  ageMultiplier: number | null;
  mileageMultiplier: number | null;
  termMultiplier: number | null;
  deductibleMultiplier: number;
  customerDiscount: number;
};

export type ResolvedRate = {
  pricingMethod: PricingMethod;
  /** Unrounded price after the deductible multiplier and customer discount. */
  basePrice: number;
  factors: RateFactors;
  exactEntry: RateMatrixEntry | null;
  rateData: DataSource;
  fallbackTables: ReferenceTableName[];
};

export type RateMatrixIndex = ReadonlyMap<string, readonly RateMatrixEntry[]>;

export const rateMatrixKey = (vehicleClass: VehicleClass, coverageLevel: CoverageLevel, termMonths: number): string =>
  `${vehicleClass}|${coverageLevel}|${termMonths}`;

const indexCache = new WeakMap<readonly RateMatrixEntry[], RateMatrixIndex>();

/**
 * Groups the matrix by `class|coverage|term`; each group is ordered by
 * `minMileage` so bracket search can stop at the first bracket above the
 * requested mileage. Memoized per rows array, which is stable for a cache TTL.
 */
export function buildRateMatrixIndex(rows: readonly RateMatrixEntry[]): RateMatrixIndex {
  const cached = indexCache.get(rows);
  if (cached) return cached;

  const index = new Map<string, RateMatrixEntry[]>();
  for (const row of rows) {
    const key = rateMatrixKey(row.vehicleClass, row.coverageLevel, row.termMonths);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  for (const bucket of index.values()) {
    bucket.sort((left, right) => left.minMileage - right.minMileage || left.maxMileage - right.maxMileage);
  }

  indexCache.set(rows, index);
  return index;
}

export function findExactRate(
  index: RateMatrixIndex,
  key: string,
  mileage: number,
  asOf: string,
): RateMatrixEntry | null {
  const bucket = index.get(key);
  if (!bucket) return null;

  let best: RateMatrixEntry | null = null;
  for (const entry of bucket) {
    if (entry.minMileage > mileage) break;
    if (mileage > entry.maxMileage || !entry.active || entry.effectiveDate > asOf) continue;
    if (!best || entry.effectiveDate > best.effectiveDate) {
      best = entry;
    }
  }

  return best;
}

// Unknown keys are neutral.
export const termMultiplierFor = (rows: readonly TermMultiplierRow[], termMonths: number): number =>
  rows.find((row) => row.termMonths === termMonths)?.multiplier ?? 1.0;

export const deductibleMultiplierFor = (rows: readonly DeductibleMultiplierRow[], deductible: number): number =>
  rows.find((row) => row.deductible === deductible)?.multiplier ?? 1.0;

// Past the last bracket the highest one applies.
export function mileageMultiplierFor(rows: readonly MileageBracketRow[], mileage: number): number | undefined {
  const ordered = [...rows].sort((left, right) => left.maxMileage - right.maxMileage);
  return (ordered.find((row) => mileage <= row.maxMileage) ?? ordered.at(-1))?.multiplier;
}

export function ageMultiplierFor(rows: readonly AgeBracketRow[], ageYears: number): number | undefined {
  const ordered = [...rows].sort((left, right) => left.maxAgeYears - right.maxAgeYears);
  return (ordered.find((row) => ageYears <= row.maxAgeYears) ?? ordered.at(-1))?.multiplier;
}

const findBaseRate = (
  rows: readonly BaseRateRow[],
  vehicleClass: VehicleClass,
  coverageLevel: CoverageLevel,
): number | undefined =>
  rows.find((row) => row.vehicleClass === vehicleClass && row.coverageLevel === coverageLevel)?.baseRate;

export class RateResolver {
  constructor(private readonly cache: ReferenceDataCache) {}

  /**
   * Takes an `EligibleResult` so a declined vehicle can never reach pricing.
   * Order is fixed: exact or computed base, then deductible, then discount.
   */
  async resolve(eligibility: EligibleResult, request: RateRequest): Promise<ResolvedRate> {
    const fallbackTables = new Set<ReferenceTableName>();
    const read = async <K extends ReferenceTableName>(table: K): Promise<ReferenceTableSnapshot<K>> => {
      const snapshot = await this.cache.get(table);
      if (snapshot.degraded) fallbackTables.add(table);
      return snapshot;
    };

    const key = rateMatrixKey(request.vehicleClass, request.coverageLevel, request.termMonths);
    const matrix = await read("rateMatrix");
    const exactEntry = findExactRate(buildRateMatrixIndex(matrix.rows), key, request.mileage, request.asOf);

    let pricingMethod: PricingMethod;
    let price: number;
    let factors: Omit<RateFactors, "deductibleMultiplier" | "customerDiscount">;

    if (exactEntry) {
      pricingMethod = "exact";
      price = requirePositive("rateAmount", exactEntry.rateAmount, key);
      factors = { rateAmount: price, baseRate: null, ageMultiplier: null, mileageMultiplier: null, termMultiplier: null };
    } else {
      pricingMethod = "computed";
      const baseRate = requirePositive(
        "baseRate",
        await this.resolveBaseRate(request.vehicleClass, request.coverageLevel, read, fallbackTables),
        `${request.vehicleClass}|${request.coverageLevel}`,
      );
      const ageMultiplier = requirePositive(
        "ageMultiplier",
        ageMultiplierFor((await read("ageBrackets")).rows, eligibility.ageYears),
      );
      const mileageMultiplier = requirePositive(
        "mileageMultiplier",
        mileageMultiplierFor((await read("mileageBrackets")).rows, request.mileage),
      );
      const termMultiplier = requirePositive(
        "termMultiplier",
        termMultiplierFor((await read("termMultipliers")).rows, request.termMonths),
        String(request.termMonths),
      );

      price = baseRate * ageMultiplier * mileageMultiplier * termMultiplier;
      factors = { rateAmount: null, baseRate, ageMultiplier, mileageMultiplier, termMultiplier };
    }

    const deductibleMultiplier = requirePositive(
      "deductibleMultiplier",
      deductibleMultiplierFor((await read("deductibleMultipliers")).rows, request.deductible),
      String(request.deductible),
    );
    const customerDiscount = requirePositive(
      "customerDiscount",
      this.cache.defaults.customerDiscounts[request.customerSegment],
      request.customerSegment,
    );

    const tables = [...fallbackTables];
    return {
      pricingMethod,
      basePrice: price * deductibleMultiplier * customerDiscount,
      factors: { ...factors, deductibleMultiplier, customerDiscount },
      exactEntry,
      rateData: tables.length > 0 ? "fallback" : "store",
      fallbackTables: tables,
    };
  }

  private async resolveBaseRate(
    vehicleClass: VehicleClass,
    coverageLevel: CoverageLevel,
    read: (table: "baseRates") => Promise<ReferenceTableSnapshot<"baseRates">>,
    fallbackTables: Set<ReferenceTableName>,
  ): Promise<number> {
    const stored = findBaseRate((await read("baseRates")).rows, vehicleClass, coverageLevel);
    if (stored !== undefined) return stored;

    const fallback = findBaseRate(this.cache.defaults.tables.baseRates, vehicleClass, coverageLevel);
    if (fallback === undefined) {
      throw new UnrecoverableRatingError({ factor: "baseRate", value: null, key: `${vehicleClass}|${coverageLevel}` });
    }

    console.warn("base_rate_fallback", { vehicleClass, coverageLevel, fallbackVersion: this.cache.defaults.version });
    fallbackTables.add("baseRates");
    return fallback;
  }
}
