import assert from "node:assert/strict";
import test from "node:test";

import { NhtsaDecodeClient } from "./decodeClient.ts";
import { type RemoteVinDecoder, NhtsaVinDecodeAdapter } from "./vinDecodeAdapter.ts";

const now = () => new Date("2025-06-15T12:00:00.000Z");

class StubRemote implements RemoteVinDecoder {
  public readonly calls: string[] = [];

  constructor(private readonly result: () => Promise<{ make: string | null; model: string | null; year: number | null }>) {}

  async decode(vin: string) {
    this.calls.push(vin);
    return this.result();
  }
}

test("returns the remote decode when it names a make", async () => {
  const remote = new StubRemote(async () => ({ make: "Toyota", model: "Camry", year: 2020 }));
  const adapter = new NhtsaVinDecodeAdapter(remote, { now });

  assert.deepEqual(await adapter.decode("4t1bf1fk0-lu123456"), {
    make: "Toyota",
    model: "Camry",
    year: 2020,
    source: "nhtsa",
  });
  assert.deepEqual(remote.calls, ["4T1BF1FK0LU123456"]);
});

test("falls back to the WMI table and year character when the remote decoder fails", async (t) => {
  const warn = t.mock.method(console, "warn", () => undefined);
  const remote = new StubRemote(async () => {
    throw new Error("socket hang up");
  });
  const adapter = new NhtsaVinDecodeAdapter(remote, { now });

  assert.deepEqual(await adapter.decode("WBA3A5C54SF123456"), {
    make: "BMW",
    model: null,
    year: 2025,
    source: "vin_pattern",
  });
  assert.equal(warn.mock.callCount(), 1);
  assert.deepEqual(warn.mock.calls[0]?.arguments, [
    "vin_decode_failed",
    { vinSuffix: "123456", message: "socket hang up" },
  ]);
});

test("falls back locally when the remote decode has no make", async () => {
  const adapter = new NhtsaVinDecodeAdapter(
    new StubRemote(async () => ({ make: null, model: null, year: null })),
    { now },
  );

  assert.deepEqual(await adapter.decode("4T1BF1FK0LU123456"), {
    make: "Toyota",
    model: null,
    year: 2020,
    source: "vin_pattern",
  });
});

test("decodes only the year when the manufacturer is unknown", async () => {
  const adapter = new NhtsaVinDecodeAdapter(null, { now });

  assert.deepEqual(await adapter.decode("9ZZAB1FKXLU123456"), {
    make: null,
    model: null,
    year: 2020,
    source: "vin_pattern",
  });
});

test("rejects a VIN with a bad check digit without calling the remote decoder", async (t) => {
  const warn = t.mock.method(console, "warn", () => undefined);
  const remote = new StubRemote(async () => ({ make: "Toyota", model: "Camry", year: 2020 }));
  const adapter = new NhtsaVinDecodeAdapter(remote, { now });

  assert.equal(await adapter.decode("4T1BF1FK1LU123456"), null);
  assert.deepEqual(remote.calls, []);
  assert.deepEqual(warn.mock.calls[0]?.arguments, ["vin_rejected", { vinSuffix: "123456", reason: "check_digit" }]);
});

test("NhtsaDecodeClient requests the extended decode endpoint and normalizes the first result", async () => {
  const requested: string[] = [];
  const client = new NhtsaDecodeClient({
    baseUrl: "https://vpic.example.test/api/vehicles/DecodeVinValuesExtended/",
    fetchImpl: async (input) => {
      requested.push(String(input));
      return new Response(
        JSON.stringify({ Results: [{ Make: "LAND ROVER", Model: "Defender", ModelYear: "2021" }] }),
        { status: 200 },
      );
    },
  });

  assert.deepEqual(await client.decode("SALEA7EU0M2000001"), { make: "Land Rover", model: "Defender", year: 2021 });
  assert.deepEqual(requested, [
    "https://vpic.example.test/api/vehicles/DecodeVinValuesExtended/SALEA7EU0M2000001?format=json",
  ]);
});

test("NhtsaDecodeClient rejects on HTTP errors and empty results", async () => {
  const failing = new NhtsaDecodeClient({
    fetchImpl: async () => new Response("down", { status: 503, statusText: "Service Unavailable" }),
  });
  await assert.rejects(failing.decode("4T1BF1FK0LU123456"), /NHTSA decode failed: 503 Service Unavailable/);

  const empty = new NhtsaDecodeClient({
    fetchImpl: async () => new Response(JSON.stringify({ Results: [] }), { status: 200 }),
  });
  await assert.rejects(empty.decode("4T1BF1FK0LU123456"), /NHTSA returned no decode results\./);
});

test("fills a missing remote model year from the year character", async () => {
  const adapter = new NhtsaVinDecodeAdapter(
    new StubRemote(async () => ({ make: "Toyota", model: "Camry", year: null })),
    { now },
  );

  assert.deepEqual(await adapter.decode("4T1BF1FK0LU123456"), {
    make: "Toyota",
    model: "Camry",
    year: 2020,
    source: "nhtsa",
  });
});

test("NhtsaDecodeClient times out when the response body stalls", async (t) => {
  const stalled = new Response(JSON.stringify({ Results: [] }), { status: 200 });
  t.mock.method(stalled, "json", () => new Promise<unknown>(() => undefined));
  const client = new NhtsaDecodeClient({ timeoutMs: 20, fetchImpl: async () => stalled });

  await assert.rejects(client.decode("4T1BF1FK0LU123456"), /NHTSA decode timed out after 20ms/);
});

test("a stalled remote body falls back to the local decode", async (t) => {
  const warn = t.mock.method(console, "warn", () => undefined);
  const stalled = new Response(JSON.stringify({ Results: [] }), { status: 200 });
  t.mock.method(stalled, "json", () => new Promise<unknown>(() => undefined));
  const adapter = new NhtsaVinDecodeAdapter(
    new NhtsaDecodeClient({ timeoutMs: 20, fetchImpl: async () => stalled }),
    { now },
  );

  assert.deepEqual(await adapter.decode("WBA3A5C54SF123456"), {
    make: "BMW",
    model: null,
    year: 2025,
    source: "vin_pattern",
  });
  assert.deepEqual(warn.mock.calls[0]?.arguments, [
    "vin_decode_failed",
    { vinSuffix: "123456", message: "NHTSA decode timed out after 20ms" },
  ]);
});
