import { z } from "zod";

import type { SettingsProvider } from "../rating/priceAssembler";

export interface AdminSettingsStore {
  /** Resolves the stored value, or null when the setting does not exist. */
  getSetting(category: string, key: string): Promise<unknown>;
}

export class SettingNotFoundError extends Error {
  public readonly details: { category: string; keys: string[] };

  constructor(details: { category: string; keys: string[] }) {
    super(`No ${details.category} setting found for ${details.keys.join(", ")}`);
    this.name = "SettingNotFoundError";
    this.details = details;
  }
}

const SettingNumberSchema = z.coerce.number().finite().nonnegative();

/**
 * Reads fees and tax rates from the admin settings table. A more specific key
 * is tried before the general one; nothing here substitutes a constant, that
 * is left to the caller's fallback policy.
 */
export class AdminSettingsProvider implements SettingsProvider {
  constructor(private readonly store: AdminSettingsStore) {}

  getAdminFee(productType: string): Promise<number> {
    return this.firstNumber("fees", [`${productType.toLowerCase()}_admin_fee`, "admin_fee"]);
  }

  getTaxRate(jurisdiction?: string): Promise<number> {
    const keys = jurisdiction ? [`${jurisdiction.toLowerCase()}_tax_rate`, "default_tax_rate"] : ["default_tax_rate"];
    return this.firstNumber("taxes", keys);
  }

  private async firstNumber(category: string, keys: string[]): Promise<number> {
    for (const key of keys) {
      const raw = await this.store.getSetting(category, key);
      if (raw === null || raw === undefined || raw === "") continue;

      const parsed = SettingNumberSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`Setting ${category}.${key} is not a usable number: ${String(raw)}`);
      }
      return parsed.data;
    }

    throw new SettingNotFoundError({ category, keys });
  }
}
