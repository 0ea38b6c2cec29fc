import { describeError } from "../model/withTimeout";
import type { RemoteDecodedVehicle } from "./decodeClient";
import { decodeModelYear, manufacturerFromWmi, validateVin } from "./normalize";
import type { DecodedVehicle, VinDecodeAdapter } from "./types";

export interface RemoteVinDecoder {
  decode(vin: string): Promise<RemoteDecodedVehicle>;
}

export type VinDecodeAdapterOptions = {
  now?: () => Date;
};

/**
 * Remote decode first; when the decoder is down or knows nothing, the WMI
 * table and the model-year character still give make and year.
 */
export class NhtsaVinDecodeAdapter implements VinDecodeAdapter {
  private readonly now: () => Date;

  constructor(
    private readonly remote: RemoteVinDecoder | null,
    options: VinDecodeAdapterOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async decode(input: string): Promise<DecodedVehicle | null> {
    const validation = validateVin(input);
    if (!validation.valid) {
      console.warn("vin_rejected", { vinSuffix: validation.vin.slice(-6), reason: validation.reason });
      return null;
    }

    const { vin } = validation;
    const patternYear = decodeModelYear(vin, this.now().getUTCFullYear());
    if (this.remote) {
      try {
        const decoded = await this.remote.decode(vin);
        if (decoded.make !== null) {
          return { ...decoded, year: decoded.year ?? patternYear, source: "nhtsa" };
        }
      } catch (error) {
        console.warn("vin_decode_failed", { vinSuffix: vin.slice(-6), message: describeError(error) });
      }
    }

    const make = manufacturerFromWmi(vin);
    if (make === null && patternYear === null) {
      return null;
    }

    return { make, model: null, year: patternYear, source: "vin_pattern" };
  }
}
