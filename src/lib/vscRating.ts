import { ConvexHttpClient } from "convex/browser";
import type { ZodError } from "zod";

import {
  EligibilityCheckRequestSchema,
  EligibilityCheckResponseSchema,
  RatingRequestSchema,
  RatingResponseSchema,
  type EligibilityCheckResponse,
  type RatingResponse,
  type ValidationIssue,
} from "@vsc/contracts";

import {
  ConvexAdminSettingsStore,
  ConvexReferenceDataStore,
  convexQueryClient,
} from "../../convex/rating/convexReferenceDataStore";
import { ReferenceDataCache, type ReferenceDataStore } from "../../convex/rating/referenceDataCache";
import { RatingEngine, validationDecline } from "../../convex/rating/ratingEngine";
import { AdminSettingsProvider, type AdminSettingsStore } from "../../convex/settings/settingsProvider";
import { NhtsaDecodeClient } from "../../convex/vin/decodeClient";
import type { VinDecodeAdapter } from "../../convex/vin/types";
import { NhtsaVinDecodeAdapter } from "../../convex/vin/vinDecodeAdapter";
import { getRatingEnvConfig, type RatingEnvConfig } from "./ratingConfig";

export type RatingEngineOverrides = {
  store?: ReferenceDataStore;
  settingsStore?: AdminSettingsStore;
  vinDecoder?: VinDecodeAdapter | null;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

// The adapter bounds the remote call itself; the engine's bound also covers its local WMI fallback.
const VIN_LOCAL_DECODE_GRACE_MS = 500;

const notConfigured = (): Promise<never> =>
  Promise.reject(new Error("CONVEX_URL is not configured"));

// Without a Convex deployment every table and setting resolves to the versioned defaults.
const offlineStore: ReferenceDataStore = { loadTable: notConfigured };
const offlineSettingsStore: AdminSettingsStore = { getSetting: notConfigured };

export function createRatingEngine(
  config: RatingEnvConfig = getRatingEnvConfig(),
  overrides: RatingEngineOverrides = {},
): RatingEngine {
  const client = config.convexUrl ? convexQueryClient(new ConvexHttpClient(config.convexUrl)) : null;
  const store = overrides.store ?? (client ? new ConvexReferenceDataStore(client) : offlineStore);
  const settingsStore = overrides.settingsStore ?? (client ? new ConvexAdminSettingsStore(client) : offlineSettingsStore);
  const now = overrides.now ?? (() => new Date());

  const remote = config.vinDecodeUrl
    ? new NhtsaDecodeClient({
        baseUrl: config.vinDecodeUrl,
        timeoutMs: config.vinTimeoutMs,
        ...(overrides.fetchImpl ? { fetchImpl: overrides.fetchImpl } : {}),
      })
    : null;
  const vinDecoder = overrides.vinDecoder !== undefined ? overrides.vinDecoder : new NhtsaVinDecodeAdapter(remote, { now });

  return new RatingEngine({
    cache: new ReferenceDataCache(store, {
      ttlMs: config.cacheTtlMs,
      loadTimeoutMs: config.storeTimeoutMs,
      now: () => now().getTime(),
    }),
    settings: new AdminSettingsProvider(settingsStore),
    vinDecoder,
    vinTimeoutMs: config.vinTimeoutMs + VIN_LOCAL_DECODE_GRACE_MS,
    settingsTimeoutMs: config.settingsTimeoutMs,
    now,
  });
}

export const toValidationIssues = (error: ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    field: issue.path.join(".") || "request",
    message: issue.message,
  }));

/**
 * Boundary for untrusted input: malformed requests come back as a
 * `VALIDATION_ERROR` decline instead of an exception.
 */
export async function rateVehicle(engine: RatingEngine, input: unknown): Promise<RatingResponse> {
  const parsed = RatingRequestSchema.safeParse(input);
  if (!parsed.success) {
    return validationDecline(toValidationIssues(parsed.error));
  }

  return RatingResponseSchema.parse(await engine.rate(parsed.data));
}

export async function checkVehicleEligibility(engine: RatingEngine, input: unknown): Promise<EligibilityCheckResponse> {
  const parsed = EligibilityCheckRequestSchema.safeParse(input);
  if (!parsed.success) {
    return validationDecline(toValidationIssues(parsed.error));
  }

  return EligibilityCheckResponseSchema.parse(await engine.checkEligibility(parsed.data));
}
