import type { ConvexHttpClient } from "convex/browser";
import { makeFunctionReference } from "convex/server";

import type { AdminSettingsStore } from "../settings/settingsProvider";
import type { ReferenceDataStore } from "./referenceDataCache";
import type { ReferenceTableName } from "./referenceTables";

export type ConvexQueryClient = {
  query: (name: string, args: Record<string, unknown>) => Promise<unknown>;
};

export const REFERENCE_DATA_FUNCTIONS = {
  listTable: "referenceData:listTable",
  getAdminSetting: "referenceData:getAdminSetting",
} as const;

/** Lets a `ConvexHttpClient` serve as a `ConvexQueryClient`. */
export const convexQueryClient = (client: ConvexHttpClient): ConvexQueryClient => ({
  query: (name, args) => client.query(makeFunctionReference<"query", Record<string, unknown>, unknown>(name), args),
});

export class ConvexReferenceDataStore implements ReferenceDataStore {
  constructor(private readonly client: ConvexQueryClient) {}

  async loadTable(table: ReferenceTableName): Promise<unknown> {
    return await this.client.query(REFERENCE_DATA_FUNCTIONS.listTable, { table });
  }
}

export class ConvexAdminSettingsStore implements AdminSettingsStore {
  constructor(private readonly client: ConvexQueryClient) {}

  async getSetting(category: string, key: string): Promise<unknown> {
    return await this.client.query(REFERENCE_DATA_FUNCTIONS.getAdminSetting, { category, key });
  }
}
