import { readFileSync } from "node:fs";

import { z } from "zod";

import type { VinValidation } from "./types";

const nullLike = new Set(["", "0", "NOT APPLICABLE", "NULL", "N/A", "NONE", "-"]);

const coalesce = (...values: Array<unknown>): string | null => {
  for (const value of values) {
    if (typeof value !== "string") continue;
    const trimmed = value.trim();
    if (!nullLike.has(trimmed.toUpperCase())) {
      return trimmed;
    }
  }

  return null;
};

export const normalizeVin = (vin: string): string => vin.replace(/[^A-Za-z0-9]/g, "").toUpperCase();

const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;
const CHECK_WEIGHTS = [8, 7, 6, 5, 4, 3, 2, 10, 0, 9, 8, 7, 6, 5, 4, 3, 2];
const TRANSLITERATION: Record<string, number> = {
  A: 1, B: 2, C: 3, D: 4, E: 5, F: 6, G: 7, H: 8,
  J: 1, K: 2, L: 3, M: 4, N: 5, P: 7, R: 9,
  S: 2, T: 3, U: 4, V: 5, W: 6, X: 7, Y: 8, Z: 9,
};

export function computeCheckDigit(vin: string): string {
  let sum = 0;
  for (const [position, char] of [...vin].entries()) {
    const value = /\d/.test(char) ? Number(char) : (TRANSLITERATION[char] ?? 0);
    sum += value * (CHECK_WEIGHTS[position] ?? 0);
  }

  const remainder = sum % 11;
  return remainder === 10 ? "X" : String(remainder);
}

export function validateVin(input: string): VinValidation {
  const vin = normalizeVin(input);
  if (vin.length !== 17) return { valid: false, vin, reason: "length" };
  // I, O and Q never appear in a VIN.
  if (!VIN_PATTERN.test(vin)) return { valid: false, vin, reason: "characters" };
  if (vin[8] !== computeCheckDigit(vin)) return { valid: false, vin, reason: "check_digit" };
  return { valid: true, vin };
}

const YEAR_LETTERS = "ABCDEFGHJKLMNPRSTVWXY";

/**
 * Position 10 repeats every 30 years. Letters start the 2010 cycle and digits
 * the 2001 one; a year past next year belongs to the previous cycle.
 */
export function decodeModelYear(vin: string, currentYear: number): number | null {
  const char = vin[9];
  if (!char) return null;

  let year: number;
  const letterIndex = YEAR_LETTERS.indexOf(char);
  if (letterIndex >= 0) {
    year = 2010 + letterIndex;
  } else if (/^[1-9]$/.test(char)) {
    year = 2000 + Number(char);
  } else {
    return null;
  }

  return year > currentYear + 1 ? year - 30 : year;
}

const WmiTableSchema = z.record(z.string().length(3), z.string().min(1));

const WMI_MANUFACTURERS = WmiTableSchema.parse(
  JSON.parse(readFileSync(new URL("./wmiManufacturers.json", import.meta.url), "utf8")),
);

// Exact WMI first, then any known WMI from the same two-character prefix.
export function manufacturerFromWmi(vin: string): string | null {
  const wmi = vin.slice(0, 3);
  if (wmi.length < 3) return null;

  const exact = WMI_MANUFACTURERS[wmi];
  if (exact) return exact;

  const prefix = Object.entries(WMI_MANUFACTURERS).find(([key]) => key.startsWith(wmi.slice(0, 2)));
  return prefix?.[1] ?? null;
}

const toModelYear = (value: string | null): number | null => {
  if (value === null) return null;
  const year = Number(value);
  if (!Number.isInteger(year) || year < 1900 || year > 2100) {
    return null;
  }
  return year;
};

const titleCase = (value: string): string =>
  value === value.toUpperCase() && value.length > 3
    ? value.toLowerCase().replace(/(^|[\s-])([a-z])/g, (_, boundary: string, letter: string) => boundary + letter.toUpperCase())
    : value;

export const normalizeDecodedVehicle = (
  raw: Record<string, unknown>,
): { make: string | null; model: string | null; year: number | null } => {
  const make = coalesce(raw.Make, raw.Manufacturer);
  return {
    make: make === null ? null : titleCase(make),
    model: coalesce(raw.Model),
    year: toModelYear(coalesce(raw.ModelYear)),
  };
};
