import type { DataSource } from "@vsc/contracts";

import { describeError, withTimeout } from "../model/withTimeout";
import { DEFAULT_REFERENCE_DATA, type DefaultReferenceData } from "./defaultReferenceData";
import {
  EMPTY_TABLE_ALLOWED,
  parseReferenceRows,
  REFERENCE_TABLE_NAMES,
  type ReferenceTableName,
  type ReferenceTableRows,
} from "./referenceTables";

export interface ReferenceDataStore {
  loadTable(table: ReferenceTableName): Promise<unknown>;
}

export interface ReferenceTableSnapshot<K extends ReferenceTableName> {
  table: K;
  rows: ReferenceTableRows[K];
  source: DataSource;
  degraded: boolean;
  loadedAt: number;
  fallbackVersion: string;
  fallbackReason?: string;
}

export interface ReferenceDataCacheOptions {
  ttlMs?: number;
  loadTimeoutMs?: number;
  now?: () => number;
  defaults?: DefaultReferenceData;
}

type CacheEntry<K extends ReferenceTableName> = {
  snapshot: ReferenceTableSnapshot<K>;
  expiresAt: number;
};

type CacheEntries = { [K in ReferenceTableName]?: CacheEntry<K> };
type InFlightLoads = { [K in ReferenceTableName]?: Promise<ReferenceTableSnapshot<K>> };

export const REFERENCE_CACHE_TTL_MS = 5 * 60_000;

/**
 * Lazily loads each reference table from the store and keeps it for `ttlMs`.
 * A table that cannot be read (error, timeout, empty or malformed rows) is
 * served from `defaults` and marked degraded; `get` never rejects.
 */
export class ReferenceDataCache {
  private readonly store: ReferenceDataStore;
  private readonly ttlMs: number;
  private readonly loadTimeoutMs: number;
  private readonly now: () => number;
  readonly defaults: DefaultReferenceData;

  private entries: CacheEntries = {};
  private inFlight: InFlightLoads = {};
  private generation = 0;

  constructor(store: ReferenceDataStore, options: ReferenceDataCacheOptions = {}) {
    this.store = store;
    this.ttlMs = options.ttlMs ?? REFERENCE_CACHE_TTL_MS;
    this.loadTimeoutMs = options.loadTimeoutMs ?? 2_000;
    this.now = options.now ?? Date.now;
    this.defaults = options.defaults ?? DEFAULT_REFERENCE_DATA;
  }

  async get<K extends ReferenceTableName>(table: K): Promise<ReferenceTableSnapshot<K>> {
    const cached = this.entries[table];
    if (cached) {
      if (cached.expiresAt > this.now()) {
        return cached.snapshot;
      }
      delete this.entries[table];
    }

    const pending = this.inFlight[table];
    if (pending) {
      return pending;
    }

    const generation = this.generation;
    const loading = this.load(table).then((snapshot) => {
      if (generation === this.generation) {
        const entries: { [P in K]?: CacheEntry<P> } = this.entries;
        entries[table] = { snapshot, expiresAt: snapshot.loadedAt + this.ttlMs };
      }
      return snapshot;
    });

    const inFlight: { [P in K]?: Promise<ReferenceTableSnapshot<P>> } = this.inFlight;
    inFlight[table] = loading;
    try {
      return await loading;
    } finally {
      if (this.inFlight[table] === loading) {
        delete this.inFlight[table];
      }
    }
  }

  clear(): void {
    this.generation += 1;
    this.entries = {};
    this.inFlight = {};
  }

  cachedTables(): ReferenceTableName[] {
    const now = this.now();
    return REFERENCE_TABLE_NAMES.filter((table) => {
      const entry = this.entries[table];
      return entry !== undefined && entry.expiresAt > now;
    });
  }

  private async load<K extends ReferenceTableName>(table: K): Promise<ReferenceTableSnapshot<K>> {
    let raw: unknown;
    try {
      raw = await withTimeout(this.store.loadTable(table), this.loadTimeoutMs, `reference table ${table}`);
    } catch (error) {
      return this.fallback(table, describeError(error));
    }

    const parsed = parseReferenceRows(table, raw);
    if (!parsed.ok) {
      return this.fallback(table, `invalid_rows: ${parsed.issues.slice(0, 3).join("; ")}`);
    }

    if (parsed.rows.length === 0 && !EMPTY_TABLE_ALLOWED.has(table)) {
      return this.fallback(table, "empty_table");
    }

    return {
      table,
      rows: parsed.rows,
      source: "store",
      degraded: false,
      loadedAt: this.now(),
      fallbackVersion: this.defaults.version,
    };
  }

  private fallback<K extends ReferenceTableName>(table: K, reason: string): ReferenceTableSnapshot<K> {
    console.warn("reference_table_fallback", {
      table,
      reason,
      fallbackVersion: this.defaults.version,
    });

    return {
      table,
      rows: this.defaults.tables[table],
      source: "fallback",
      degraded: true,
      loadedAt: this.now(),
      fallbackVersion: this.defaults.version,
      fallbackReason: reason,
    };
  }
}
