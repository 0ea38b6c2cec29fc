import type { CoverageLevel, VehicleClass } from "@vsc/contracts";

import type { ReferenceDataCache } from "./referenceDataCache";
import type { BaseRateRow, VehicleClassificationRow } from "./referenceTables";

export const DEFAULT_VEHICLE_CLASS: VehicleClass = "B";

export type VehicleClassDescription = {
  make: string;
  vehicleClass: VehicleClass;
  baseRates: Partial<Record<CoverageLevel, number>>;
};

export const normalizeMake = (make: string): string => make.trim().toLowerCase();

/**
 * Exact key first, then a substring match in either direction so compound
 * names such as "Ford Motor Company" or "Mercedes" still resolve. Unknown
 * makes fall into class B.
 */
export function classifyMake(make: string, rows: readonly VehicleClassificationRow[]): VehicleClass {
  const normalized = normalizeMake(make);
  if (!normalized) return DEFAULT_VEHICLE_CLASS;

  const exact = rows.find((row) => row.make === normalized);
  if (exact) return exact.vehicleClass;

  const partial = rows.find((row) => normalized.includes(row.make) || row.make.includes(normalized));
  return partial?.vehicleClass ?? DEFAULT_VEHICLE_CLASS;
}

export const baseRatesForClass = (
  vehicleClass: VehicleClass,
  rows: readonly BaseRateRow[],
): Partial<Record<CoverageLevel, number>> => {
  const rates: Partial<Record<CoverageLevel, number>> = {};
  for (const row of rows) {
    if (row.vehicleClass === vehicleClass) {
      rates[row.coverageLevel] = row.baseRate;
    }
  }
  return rates;
};

export class VehicleClassifier {
  constructor(private readonly cache: ReferenceDataCache) {}

  async classify(make: string): Promise<VehicleClass> {
    return (await this.resolve(make)).vehicleClass;
  }

  /** Same as `classify`, plus whether the classification table was served from fallback data. */
  async resolve(make: string): Promise<{ vehicleClass: VehicleClass; degraded: boolean }> {
    const { rows, degraded } = await this.cache.get("vehicleClassification");
    return { vehicleClass: classifyMake(make, rows), degraded };
  }

  async describe(make: string): Promise<VehicleClassDescription> {
    const vehicleClass = await this.classify(make);
    const { rows } = await this.cache.get("baseRates");

    return {
      make,
      vehicleClass,
      baseRates: baseRatesForClass(vehicleClass, rows),
    };
  }
}
