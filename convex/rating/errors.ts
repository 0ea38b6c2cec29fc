export type UnrecoverableRatingDetails = {
  factor: string;
  value: number | null;
  key?: string;
};

/**
 * Raised when a rate or multiplier is structurally broken and no fallback can
 * stand in for it. This is the only failure the rating engine surfaces as an
 * exception; declines and degraded data are returned values.
 */
export class UnrecoverableRatingError extends Error {
  public readonly details: UnrecoverableRatingDetails;

  constructor(details: UnrecoverableRatingDetails) {
    super(
      `Unusable ${details.factor}${details.key ? ` for ${details.key}` : ""}: ${details.value ?? "missing"}`,
    );
    this.name = "UnrecoverableRatingError";
    this.details = details;
  }
}

export const requirePositive = (factor: string, value: number | undefined, key?: string): number => {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw new UnrecoverableRatingError({ factor, value: value ?? null, ...(key ? { key } : {}) });
  }

  return value;
};
