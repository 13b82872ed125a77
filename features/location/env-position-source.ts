import type { RawFix } from "@/features/models";
import type { PositionSource } from "./location-service";

type Env = Record<string, string | undefined>;

const readNumber = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

/**
 * Fixed position from `LATITUDE`, `LONGITUDE`, `ALTITUDE` and `ACCURACY`,
 * for hosts without a GNSS receiver.
 */
export class EnvPositionSource implements PositionSource {
  private readonly fix: RawFix | null;

  constructor(env: Env = process.env) {
    const latitude = readNumber(env.LATITUDE);
    const longitude = readNumber(env.LONGITUDE);
    this.fix =
      latitude === undefined || longitude === undefined || isNaN(latitude) || isNaN(longitude)
        ? null
        : {
            latitude,
            longitude,
            altitude: readNumber(env.ALTITUDE) ?? null,
            accuracy: readNumber(env.ACCURACY) ?? 0,
          };
  }

  get isConfigured(): boolean {
    return this.fix !== null;
  }

  async readFix(): Promise<RawFix> {
    if (!this.fix) throw new Error("LATITUDE and LONGITUDE are not set");
    return this.fix;
  }
}
