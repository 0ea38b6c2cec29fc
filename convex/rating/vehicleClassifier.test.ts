import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_REFERENCE_DATA } from "./defaultReferenceData.ts";
import { ReferenceDataCache } from "./referenceDataCache.ts";
import { classifyMake, VehicleClassifier } from "./vehicleClassifier.ts";

const rows = DEFAULT_REFERENCE_DATA.tables.vehicleClassification;

test("classifyMake matches exact keys regardless of case and padding", () => {
  assert.equal(classifyMake("Toyota", rows), "A");
  assert.equal(classifyMake("  FORD ", rows), "B");
  assert.equal(classifyMake("Land Rover", rows), "C");
});

test("classifyMake tolerates compound manufacturer names in both directions", () => {
  assert.equal(classifyMake("Ford Motor Company", rows), "B");
  assert.equal(classifyMake("Mercedes-Benz USA", rows), "C");
  assert.equal(classifyMake("volks", rows), "C");
});

test("unknown and empty makes default to class B", () => {
  assert.equal(classifyMake("Zigzagmobile", rows), "B");
  assert.equal(classifyMake("   ", rows), "B");
});

test("VehicleClassifier reads the classification table through the cache", async () => {
  const classifier = new VehicleClassifier(
    new ReferenceDataCache(
      { loadTable: async (table) => (table === "vehicleClassification" ? [{ make: "Zigzagmobile", vehicleClass: "C" }] : []) },
      { now: () => 0 },
    ),
  );

  assert.equal(await classifier.classify("zigzagmobile"), "C");
  assert.deepEqual(await classifier.resolve("Toyota"), { vehicleClass: "B", degraded: false });
});

test("describe returns the class with its base rates", async (t) => {
  t.mock.method(console, "warn", () => undefined);
  const classifier = new VehicleClassifier(
    new ReferenceDataCache(
      {
        loadTable: async () => {
          throw new Error("offline");
        },
      },
      { now: () => 0 },
    ),
  );

  assert.deepEqual(await classifier.describe("BMW"), {
    make: "BMW",
    vehicleClass: "C",
    baseRates: { silver: 1400, gold: 2100, platinum: 2800 },
  });
});
