import type { EligibilityThresholds } from "@vsc/contracts";

import { DEFAULT_REFERENCE_DATA, type EligibilityRules } from "./defaultReferenceData";

export const INELIGIBLE_VEHICLE_MESSAGE =
  "Vehicle doesn't qualify. Make sure you entered the correct current mileage. Vehicle must be 20 model years or newer and less than 200,000 miles at time of quote";

export type EligibilityInput = {
  make: string;
  ageYears: number;
  mileage: number | null;
};

type EligibilityCommon = {
  make: string;
  ageYears: number;
  mileage: number | null;
  thresholds: EligibilityThresholds;
  warnings: string[];
  restrictions: string[];
  surchargeNotices: string[];
  recommendations: string[];
};

export type EligibleResult = EligibilityCommon & {
  eligible: true;
  status: "ELIGIBLE" | "ELIGIBLE_WITH_WARNING";
  message: null;
};

export type IneligibleResult = EligibilityCommon & {
  eligible: false;
  status: "INELIGIBLE";
  message: typeof INELIGIBLE_VEHICLE_MESSAGE;
};

export type EligibilityResult = EligibleResult | IneligibleResult;

const milesFormat = new Intl.NumberFormat("en-US");
const formatMiles = (miles: number): string => milesFormat.format(miles);

const matchingBrand = (make: string, brands: readonly string[]): string | undefined => {
  const normalized = make.trim().toLowerCase();
  if (!normalized) return undefined;
  return brands.find((brand) => normalized.includes(brand.toLowerCase()));
};

const recommend = (make: string, ageYears: number, rules: EligibilityRules): string[] => {
  const recommendations: string[] = [];

  if (ageYears > rules.warningAgeYears) {
    recommendations.push("Platinum coverage recommended for older vehicles");
    recommendations.push("Consider shorter term options for maximum value");
  } else if (ageYears > rules.recommendGoldAgeYears) {
    recommendations.push("Gold or Platinum coverage recommended");
  }

  if (matchingBrand(make, rules.luxuryBrands)) {
    recommendations.push("Platinum coverage strongly recommended for luxury vehicles");
    recommendations.push("Consider zero deductible option");
  }

  if (matchingBrand(make, rules.valueBrands)) {
    recommendations.push("All coverage levels available - Silver may provide excellent value");
  }

  if (recommendations.length === 0) {
    recommendations.push("Gold coverage offers the best balance of protection and value");
    recommendations.push("All coverage levels (Silver, Gold, Platinum) available for your vehicle");
  }

  return recommendations;
};

/**
 * Hard gate: older than `maxAgeYears` or at/over `maxMileage` is ineligible.
 * The warning band and brand notices are advisory and never change the gate.
 * An unknown mileage only skips the mileage checks.
 */
export function evaluateEligibility(
  input: EligibilityInput,
  rules: EligibilityRules = DEFAULT_REFERENCE_DATA.eligibility,
): EligibilityResult {
  const { make, ageYears, mileage } = input;
  const warnings: string[] = [];
  const restrictions: string[] = [];

  if (ageYears > rules.maxAgeYears) {
    restrictions.push(`Vehicle is ${ageYears} years old (must be ${rules.maxAgeYears} model years or newer)`);
  } else if (ageYears > rules.warningAgeYears) {
    warnings.push(`Vehicle is ${ageYears} years old - limited options may apply`);
  }

  if (mileage !== null) {
    if (mileage >= rules.maxMileage) {
      restrictions.push(
        `Vehicle has ${formatMiles(mileage)} miles (must be less than ${formatMiles(rules.maxMileage)} miles)`,
      );
    } else if (mileage >= rules.warningMileage) {
      warnings.push("High mileage vehicle - premium rates may apply");
    }
  }

  const surchargeNotices: string[] = [];
  const luxury = matchingBrand(make, rules.luxuryBrands);
  if (luxury) {
    surchargeNotices.push(`${luxury} is a luxury brand - a luxury vehicle surcharge may apply`);
  }
  const highMaintenance = matchingBrand(make, rules.highMaintenanceBrands);
  if (highMaintenance) {
    surchargeNotices.push(`${highMaintenance} is a high-maintenance brand - a maintenance surcharge may apply`);
  }

  const common: EligibilityCommon = {
    make,
    ageYears,
    mileage,
    thresholds: { maxAgeYears: rules.maxAgeYears, maxMileage: rules.maxMileage },
    warnings,
    restrictions,
    surchargeNotices,
    recommendations: [],
  };

  if (restrictions.length > 0) {
    return {
      ...common,
      eligible: false,
      status: "INELIGIBLE",
      message: INELIGIBLE_VEHICLE_MESSAGE,
      recommendations: ["Please verify your vehicle's current mileage and model year"],
    };
  }

  return {
    ...common,
    eligible: true,
    status: warnings.length > 0 ? "ELIGIBLE_WITH_WARNING" : "ELIGIBLE",
    message: null,
    recommendations: recommend(make, ageYears, rules),
  };
}
