import { randomUUID } from "node:crypto";

import type {
  CoverageLevel,
  CustomerSegment,
  DataSource,
  PricingMethod,
  Provenance,
  RatingBreakdown,
  RatingFactors,
  VehicleClass,
} from "@vsc/contracts";

import { describeError, withTimeout } from "../model/withTimeout";
import { DEFAULT_REFERENCE_DATA, type DefaultReferenceData } from "./defaultReferenceData";
import type { ResolvedRate } from "./rateResolver";

export interface SettingsProvider {
  getAdminFee(productType: string): Promise<number>;
  getTaxRate(jurisdiction?: string): Promise<number>;
}

export type QuoteInputs = {
  make: string;
  model: string;
  year: number;
  mileage: number;
  ageYears: number;
  vehicleClass: VehicleClass;
  coverageLevel: CoverageLevel;
  termMonths: number;
  deductible: number;
  customerSegment: CustomerSegment;
  jurisdiction: string | null;
};

export type Quote = Readonly<{
  quoteId: string;
  issuedAt: string;
  validUntil: string;
  inputs: Readonly<QuoteInputs>;
  pricingMethod: PricingMethod;
  breakdown: Readonly<RatingBreakdown>;
  ratingFactors: Readonly<RatingFactors>;
  provenance: Readonly<Omit<Provenance, "fallbackTables"> & { fallbackTables: readonly string[] }>;
}>;

export type PriceAssemblerOptions = {
  settingsTimeoutMs?: number;
  now?: () => Date;
  defaults?: DefaultReferenceData;
};

export const QUOTE_VALIDITY_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export const roundCurrency = (value: number): number => Number(value.toFixed(2));

export const presentBreakdown = (breakdown: RatingBreakdown): RatingBreakdown => ({
  basePrice: roundCurrency(breakdown.basePrice),
  adminFee: roundCurrency(breakdown.adminFee),
  subtotal: roundCurrency(breakdown.subtotal),
  taxAmount: roundCurrency(breakdown.taxAmount),
  totalPrice: roundCurrency(breakdown.totalPrice),
  monthlyPayment: roundCurrency(breakdown.monthlyPayment),
});

export function computeBreakdown(basePrice: number, adminFee: number, taxRate: number, termMonths: number): RatingBreakdown {
  const subtotal = basePrice + adminFee;
  const taxAmount = subtotal * taxRate;
  const totalPrice = subtotal + taxAmount;
  return {
    basePrice,
    adminFee,
    subtotal,
    taxAmount,
    totalPrice,
    monthlyPayment: termMonths > 0 ? totalPrice / termMonths : totalPrice,
  };
}

const pad = (value: number): string => String(value).padStart(2, "0");

export function buildQuoteId(issuedAt: Date, suffix: string = randomUUID().replace(/-/g, "").slice(0, 8)): string {
  const stamp = [
    issuedAt.getUTCFullYear(),
    pad(issuedAt.getUTCMonth() + 1),
    pad(issuedAt.getUTCDate()),
    pad(issuedAt.getUTCHours()),
    pad(issuedAt.getUTCMinutes()),
    pad(issuedAt.getUTCSeconds()),
  ].join("");
  return `VSC-${stamp}-${suffix}`;
}

type SettingValue = { value: number; source: DataSource };

export class PriceAssembler {
  private readonly settingsTimeoutMs: number;
  private readonly now: () => Date;
  private readonly defaults: DefaultReferenceData;

  constructor(
    private readonly settings: SettingsProvider,
    options: PriceAssemblerOptions = {},
  ) {
    this.settingsTimeoutMs = options.settingsTimeoutMs ?? 2_000;
    this.now = options.now ?? (() => new Date());
    this.defaults = options.defaults ?? DEFAULT_REFERENCE_DATA;
  }

  async assemble(rate: ResolvedRate, inputs: QuoteInputs): Promise<Quote> {
    const [adminFee, taxRate] = await Promise.all([
      this.readSetting("adminFee", this.defaults.settings.adminFee, (value) => value >= 0, () =>
        this.settings.getAdminFee(this.defaults.settings.productType),
      ),
      this.readSetting("taxRate", this.defaults.settings.taxRate, (value) => value >= 0 && value < 1, () =>
        this.settings.getTaxRate(inputs.jurisdiction ?? undefined),
      ),
    ]);

    const issuedAt = this.now();
    const validUntil = new Date(issuedAt.getTime() + QUOTE_VALIDITY_DAYS * DAY_MS);

    return Object.freeze({
      quoteId: buildQuoteId(issuedAt),
      issuedAt: issuedAt.toISOString(),
      validUntil: validUntil.toISOString(),
      inputs: Object.freeze({ ...inputs }),
      pricingMethod: rate.pricingMethod,
      breakdown: Object.freeze(computeBreakdown(rate.basePrice, adminFee.value, taxRate.value, inputs.termMonths)),
      ratingFactors: Object.freeze({ ...rate.factors, taxRate: taxRate.value }),
      provenance: Object.freeze({
        adminFee: adminFee.source,
        taxRate: taxRate.source,
        rateData: rate.rateData,
        fallbackTables: Object.freeze([...rate.fallbackTables]),
        referenceDataVersion: this.defaults.version,
      }),
    });
  }

  private async readSetting(
    setting: "adminFee" | "taxRate",
    fallback: number,
    isUsable: (value: number) => boolean,
    read: () => Promise<number>,
  ): Promise<SettingValue> {
    let reason: string;
    try {
      const value = await withTimeout(read(), this.settingsTimeoutMs, `settings ${setting}`);
      if (Number.isFinite(value) && isUsable(value)) {
        return { value, source: "store" };
      }
      reason = `unusable_value: ${value}`;
    } catch (error) {
      reason = describeError(error);
    }

    console.warn("settings_fallback", { setting, reason, fallback });
    return { value: fallback, source: "fallback" };
  }
}
