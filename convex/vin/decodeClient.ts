import { z } from "zod";

import { withTimeout } from "../model/withTimeout";
import { normalizeDecodedVehicle } from "./normalize";

export const NHTSA_DECODE_URL = "https://vpic.nhtsa.dot.gov/api/vehicles/DecodeVinValuesExtended";

const DecodePayloadSchema = z.object({
  Results: z.array(z.record(z.unknown())).default([]),
});

export type NhtsaDecodeClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type RemoteDecodedVehicle = ReturnType<typeof normalizeDecodedVehicle>;

export class NhtsaDecodeClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NhtsaDecodeClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? NHTSA_DECODE_URL).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 3_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** The timeout covers the whole exchange, body included, not just the response headers. */
  async decode(vin: string): Promise<RemoteDecodedVehicle> {
    const controller = new AbortController();
    try {
      return await withTimeout(this.request(vin, controller.signal), this.timeoutMs, "NHTSA decode");
    } catch (error) {
      controller.abort("timeout");
      throw error;
    }
  }

  private async request(vin: string, signal: AbortSignal): Promise<RemoteDecodedVehicle> {
    const response = await this.fetchImpl(`${this.baseUrl}/${encodeURIComponent(vin)}?format=json`, { signal });

    if (!response.ok) {
      throw new Error(`NHTSA decode failed: ${response.status} ${response.statusText}`);
    }

    const payload = DecodePayloadSchema.parse(await response.json());
    const first = payload.Results[0];
    if (!first) {
      throw new Error("NHTSA returned no decode results.");
    }

    return normalizeDecodedVehicle(first);
  }
}
