import assert from "node:assert/strict";
import test from "node:test";

import { toReferenceRow } from "../referenceData.ts";
import { AdminSettingsProvider } from "../settings/settingsProvider.ts";
import {
  ConvexAdminSettingsStore,
  ConvexReferenceDataStore,
  REFERENCE_DATA_FUNCTIONS,
  type ConvexQueryClient,
} from "./convexReferenceDataStore.ts";
import { ReferenceDataCache } from "./referenceDataCache.ts";

class RecordingClient implements ConvexQueryClient {
  public readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];

  constructor(private readonly respond: (name: string, args: Record<string, unknown>) => unknown) {}

  async query(name: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ name, args });
    return this.respond(name, args);
  }
}

test("ConvexReferenceDataStore queries listTable with the table name", async () => {
  const rows = [{ make: "honda", vehicleClass: "A" }];
  const client = new RecordingClient(() => rows);

  const loaded = await new ConvexReferenceDataStore(client).loadTable("vehicleClassification");

  assert.equal(loaded, rows);
  assert.deepEqual(client.calls, [
    { name: REFERENCE_DATA_FUNCTIONS.listTable, args: { table: "vehicleClassification" } },
  ]);
});

test("rows served through Convex are validated by the cache", async () => {
  const client = new RecordingClient(() => [
    { make: "rivian", vehicleClass: "C" },
    { make: "honda", vehicleClass: "A" },
  ]);
  const cache = new ReferenceDataCache(new ConvexReferenceDataStore(client));

  const snapshot = await cache.get("vehicleClassification");

  assert.equal(snapshot.source, "store");
  assert.deepEqual(snapshot.rows, [
    { make: "rivian", vehicleClass: "C" },
    { make: "honda", vehicleClass: "A" },
  ]);
});

test("ConvexAdminSettingsStore backs the settings provider", async () => {
  const client = new RecordingClient((_, args) => (args.key === "default_tax_rate" ? 0.0725 : null));
  const provider = new AdminSettingsProvider(new ConvexAdminSettingsStore(client));

  assert.equal(await provider.getTaxRate("TX"), 0.0725);
  assert.deepEqual(client.calls, [
    { name: REFERENCE_DATA_FUNCTIONS.getAdminSetting, args: { category: "taxes", key: "tx_tax_rate" } },
    { name: REFERENCE_DATA_FUNCTIONS.getAdminSetting, args: { category: "taxes", key: "default_tax_rate" } },
  ]);
});

test("a failing Convex query rejects from the store", async () => {
  const client = new RecordingClient(() => {
    throw new Error("deployment unreachable");
  });

  await assert.rejects(new ConvexReferenceDataStore(client).loadTable("baseRates"), /deployment unreachable/);
});

test("toReferenceRow drops system and audit columns", () => {
  assert.deepEqual(
    toReferenceRow({
      _id: "doc-1",
      _creationTime: 1,
      createdAt: 2,
      updatedAt: 3,
      updatedBy: "admin",
      termMonths: 36,
      multiplier: 1,
    }),
    { termMonths: 36, multiplier: 1 },
  );
});
