import assert from "node:assert/strict";
import test from "node:test";

import { type AdminSettingsStore, AdminSettingsProvider, SettingNotFoundError } from "./settingsProvider.ts";

class MemorySettingsStore implements AdminSettingsStore {
  public readonly lookups: string[] = [];

  constructor(private readonly values: Record<string, unknown>) {}

  async getSetting(category: string, key: string): Promise<unknown> {
    const id = `${category}.${key}`;
    this.lookups.push(id);
    return this.values[id] ?? null;
  }
}

test("admin fee prefers the product-specific key", async () => {
  const store = new MemorySettingsStore({ "fees.vsc_admin_fee": 75, "fees.admin_fee": 25 });
  assert.equal(await new AdminSettingsProvider(store).getAdminFee("vsc"), 75);
  assert.deepEqual(store.lookups, ["fees.vsc_admin_fee"]);
});

test("admin fee falls back to the general key and coerces stored strings", async () => {
  const store = new MemorySettingsStore({ "fees.admin_fee": "35.5" });
  assert.equal(await new AdminSettingsProvider(store).getAdminFee("VSC"), 35.5);
  assert.deepEqual(store.lookups, ["fees.vsc_admin_fee", "fees.admin_fee"]);
});

test("tax rate looks up the state before the default", async () => {
  const store = new MemorySettingsStore({ "taxes.ca_tax_rate": 0.0725, "taxes.default_tax_rate": 0.05 });
  const provider = new AdminSettingsProvider(store);

  assert.equal(await provider.getTaxRate("CA"), 0.0725);
  assert.equal(await provider.getTaxRate("TX"), 0.05);
  assert.equal(await provider.getTaxRate(), 0.05);
  assert.deepEqual(store.lookups, [
    "taxes.ca_tax_rate",
    "taxes.tx_tax_rate",
    "taxes.default_tax_rate",
    "taxes.default_tax_rate",
  ]);
});

test("missing settings reject so the caller can apply its fallback", async () => {
  const provider = new AdminSettingsProvider(new MemorySettingsStore({}));

  await assert.rejects(provider.getTaxRate("NV"), (error: unknown) => {
    assert.ok(error instanceof SettingNotFoundError);
    assert.deepEqual(error.details, { category: "taxes", keys: ["nv_tax_rate", "default_tax_rate"] });
    return true;
  });
});

test("non-numeric settings reject instead of pricing with NaN", async () => {
  const provider = new AdminSettingsProvider(new MemorySettingsStore({ "fees.vsc_admin_fee": "fifty" }));
  await assert.rejects(provider.getAdminFee("vsc"), /Setting fees\.vsc_admin_fee is not a usable number: fifty/);
});
