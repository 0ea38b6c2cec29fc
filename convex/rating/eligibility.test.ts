import assert from "node:assert/strict";
import test from "node:test";

import { evaluateEligibility, INELIGIBLE_VEHICLE_MESSAGE } from "./eligibility.ts";

test("a recent, low-mileage value brand is eligible without warnings", () => {
  const result = evaluateEligibility({ make: "Toyota", ageYears: 5, mileage: 40_000 });

  assert.equal(result.eligible, true);
  assert.equal(result.status, "ELIGIBLE");
  assert.equal(result.message, null);
  assert.deepEqual(result.warnings, []);
  assert.deepEqual(result.restrictions, []);
  assert.deepEqual(result.surchargeNotices, []);
  assert.deepEqual(result.recommendations, ["All coverage levels available - Silver may provide excellent value"]);
  assert.deepEqual(result.thresholds, { maxAgeYears: 20, maxMileage: 200_000 });
});

test("a vehicle older than 20 years is declined with the fixed message", () => {
  const result = evaluateEligibility({ make: "BMW", ageYears: 30, mileage: 50_000 });

  assert.equal(result.eligible, false);
  assert.equal(result.status, "INELIGIBLE");
  assert.equal(
    result.message,
    "Vehicle doesn't qualify. Make sure you entered the correct current mileage. Vehicle must be 20 model years or newer and less than 200,000 miles at time of quote",
  );
  assert.deepEqual(result.restrictions, ["Vehicle is 30 years old (must be 20 model years or newer)"]);
  assert.deepEqual(result.recommendations, ["Please verify your vehicle's current mileage and model year"]);
  assert.deepEqual(result.surchargeNotices, ["BMW is a luxury brand - a luxury vehicle surcharge may apply"]);
});

test("exactly 200,000 miles is ineligible", () => {
  const result = evaluateEligibility({ make: "Honda", ageYears: 3, mileage: 200_000 });

  assert.equal(result.status, "INELIGIBLE");
  assert.deepEqual(result.restrictions, ["Vehicle has 200,000 miles (must be less than 200,000 miles)"]);
});

test("every mileage at or above the limit and every age above it is ineligible", () => {
  for (const mileage of [200_000, 200_001, 350_000, 500_000]) {
    assert.equal(evaluateEligibility({ make: "Honda", ageYears: 1, mileage }).eligible, false, `mileage ${mileage}`);
  }
  for (let ageYears = 21; ageYears <= 60; ageYears += 1) {
    assert.equal(evaluateEligibility({ make: "Honda", ageYears, mileage: 1_000 }).eligible, false, `age ${ageYears}`);
  }
});

test("both failed gates are listed as restrictions", () => {
  const result = evaluateEligibility({ make: "Ford", ageYears: 21, mileage: 210_500 });

  assert.equal(result.message, INELIGIBLE_VEHICLE_MESSAGE);
  assert.deepEqual(result.restrictions, [
    "Vehicle is 21 years old (must be 20 model years or newer)",
    "Vehicle has 210,500 miles (must be less than 200,000 miles)",
  ]);
});

test("the warning band is eligible with advisory messages", () => {
  const aged = evaluateEligibility({ make: "Ford", ageYears: 20, mileage: 10_000 });
  assert.equal(aged.status, "ELIGIBLE_WITH_WARNING");
  assert.equal(aged.eligible, true);
  assert.deepEqual(aged.warnings, ["Vehicle is 20 years old - limited options may apply"]);

  const worn = evaluateEligibility({ make: "Ford", ageYears: 2, mileage: 150_000 });
  assert.equal(worn.status, "ELIGIBLE_WITH_WARNING");
  assert.deepEqual(worn.warnings, ["High mileage vehicle - premium rates may apply"]);

  assert.equal(evaluateEligibility({ make: "Ford", ageYears: 15, mileage: 149_999 }).status, "ELIGIBLE");
});

test("brand notices and recommendations never change the gate", () => {
  const result = evaluateEligibility({ make: "Land Rover", ageYears: 12, mileage: 60_000 });

  assert.equal(result.status, "ELIGIBLE");
  assert.deepEqual(result.surchargeNotices, [
    "Land Rover is a high-maintenance brand - a maintenance surcharge may apply",
  ]);
  assert.deepEqual(result.recommendations, ["Gold or Platinum coverage recommended"]);
});

test("older luxury vehicles collect age and brand recommendations", () => {
  const result = evaluateEligibility({ make: "lexus", ageYears: 16, mileage: 10_000 });

  assert.equal(result.status, "ELIGIBLE_WITH_WARNING");
  assert.deepEqual(result.surchargeNotices, ["Lexus is a luxury brand - a luxury vehicle surcharge may apply"]);
  assert.deepEqual(result.recommendations, [
    "Platinum coverage recommended for older vehicles",
    "Consider shorter term options for maximum value",
    "Platinum coverage strongly recommended for luxury vehicles",
    "Consider zero deductible option",
  ]);
});

test("makes with no specific advice get the general recommendations", () => {
  assert.deepEqual(evaluateEligibility({ make: "Ford", ageYears: 2, mileage: 20_000 }).recommendations, [
    "Gold coverage offers the best balance of protection and value",
    "All coverage levels (Silver, Gold, Platinum) available for your vehicle",
  ]);
});

test("unknown mileage only skips the mileage checks", () => {
  assert.equal(evaluateEligibility({ make: "Ford", ageYears: 4, mileage: null }).status, "ELIGIBLE");
  assert.equal(evaluateEligibility({ make: "Ford", ageYears: 25, mileage: null }).status, "INELIGIBLE");
});
