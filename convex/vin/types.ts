export type VinDecodeSource = "nhtsa" | "vin_pattern";

export type DecodedVehicle = {
  make: string | null;
  model: string | null;
  year: number | null;
  source: VinDecodeSource;
};

export type VinValidation =
  | { valid: true; vin: string }
  | { valid: false; vin: string; reason: "length" | "characters" | "check_digit" };

export interface VinDecodeAdapter {
  /** Resolves null when nothing useful can be decoded; never rejects. */
  decode(vin: string): Promise<DecodedVehicle | null>;
}
