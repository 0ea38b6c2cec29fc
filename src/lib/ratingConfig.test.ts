import assert from "node:assert/strict";
import test from "node:test";

import { NHTSA_DECODE_URL } from "../../convex/vin/decodeClient.ts";
import { getRatingEnvConfig } from "./ratingConfig.ts";

test("getRatingEnvConfig applies defaults for an empty environment", () => {
  assert.deepEqual(getRatingEnvConfig({}), {
    convexUrl: null,
    cacheTtlMs: 300_000,
    storeTimeoutMs: 2_000,
    settingsTimeoutMs: 2_000,
    vinTimeoutMs: 3_000,
    vinDecodeUrl: NHTSA_DECODE_URL,
  });
});

test("getRatingEnvConfig reads overrides and treats blanks as unset", () => {
  const config = getRatingEnvConfig({
    CONVEX_URL: "https://example-deployment.convex.cloud",
    VSC_CACHE_TTL_MS: "60000",
    VSC_STORE_TIMEOUT_MS: " ",
    VSC_SETTINGS_TIMEOUT_MS: "500",
    VSC_VIN_TIMEOUT_MS: "1500",
    VSC_VIN_DECODE_URL: "off",
  });

  assert.deepEqual(config, {
    convexUrl: "https://example-deployment.convex.cloud",
    cacheTtlMs: 60_000,
    storeTimeoutMs: 2_000,
    settingsTimeoutMs: 500,
    vinTimeoutMs: 1_500,
    vinDecodeUrl: null,
  });
});

test("getRatingEnvConfig names the variable it cannot use", () => {
  assert.throws(
    () => getRatingEnvConfig({ VSC_SETTINGS_TIMEOUT_MS: "-5" }),
    /\[config\] Invalid environment variable VSC_SETTINGS_TIMEOUT_MS: /,
  );
  assert.throws(() => getRatingEnvConfig({ CONVEX_URL: "not a url" }), /Invalid environment variable CONVEX_URL/);
});
