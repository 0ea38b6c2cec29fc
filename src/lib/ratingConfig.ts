import { z } from "zod";

import { NHTSA_DECODE_URL } from "../../convex/vin/decodeClient";

export type RatingEnvConfig = {
  convexUrl: string | null;
  cacheTtlMs: number;
  storeTimeoutMs: number;
  settingsTimeoutMs: number;
  vinTimeoutMs: number;
  vinDecodeUrl: string | null;
};

const timeoutMs = (fallback: number) => z.coerce.number().int().positive().max(60_000).default(fallback);

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .pipe(z.string().url().optional());

const RatingEnvSchema = z.object({
  CONVEX_URL: optionalUrl,
  VSC_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60_000),
  VSC_STORE_TIMEOUT_MS: timeoutMs(2_000),
  VSC_SETTINGS_TIMEOUT_MS: timeoutMs(2_000),
  VSC_VIN_TIMEOUT_MS: timeoutMs(3_000),
  // "off" disables the remote decoder; VINs are then decoded from the WMI table only.
  VSC_VIN_DECODE_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === "off" ? null : value || NHTSA_DECODE_URL))
    .pipe(z.string().url().nullable()),
});

const blankToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim().length === 0 ? undefined : value;

export function getRatingEnvConfig(env: NodeJS.ProcessEnv = process.env): RatingEnvConfig {
  const parsed = RatingEnvSchema.safeParse({
    CONVEX_URL: env.CONVEX_URL ?? "",
    VSC_CACHE_TTL_MS: blankToUndefined(env.VSC_CACHE_TTL_MS),
    VSC_STORE_TIMEOUT_MS: blankToUndefined(env.VSC_STORE_TIMEOUT_MS),
    VSC_SETTINGS_TIMEOUT_MS: blankToUndefined(env.VSC_SETTINGS_TIMEOUT_MS),
    VSC_VIN_TIMEOUT_MS: blankToUndefined(env.VSC_VIN_TIMEOUT_MS),
    VSC_VIN_DECODE_URL: env.VSC_VIN_DECODE_URL,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `[config] Invalid environment variable ${issue?.path.join(".") ?? "unknown"}: ${issue?.message ?? "invalid value"}. ` +
        "Fix it in your deployment environment before starting the rating engine.",
    );
  }

  const config = parsed.data;
  return {
    convexUrl: config.CONVEX_URL ?? null,
    cacheTtlMs: config.VSC_CACHE_TTL_MS,
    storeTimeoutMs: config.VSC_STORE_TIMEOUT_MS,
    settingsTimeoutMs: config.VSC_SETTINGS_TIMEOUT_MS,
    vinTimeoutMs: config.VSC_VIN_TIMEOUT_MS,
    vinDecodeUrl: config.VSC_VIN_DECODE_URL,
  };
}
