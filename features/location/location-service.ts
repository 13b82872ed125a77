import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import { createPosition, type Position, type RawFix } from "@/features/models";
import { describeError } from "@/features/transport/errors";

export type LocationErrorCode = "NOT_AUTHORIZED" | "LOCATION_UNAVAILABLE";

const MESSAGES: Record<LocationErrorCode, string> = {
  NOT_AUTHORIZED: "Location access not authorized",
  LOCATION_UNAVAILABLE: "Location unavailable",
};

export class LocationError extends Error {
  readonly code: LocationErrorCode;

  constructor(code: LocationErrorCode, reason?: string) {
    super(reason ? `${MESSAGES[code]}: ${reason}` : MESSAGES[code]);
    this.name = "LocationError";
    this.code = code;
  }
}

export function isLocationError(error: unknown, code?: LocationErrorCode): error is LocationError {
  return error instanceof LocationError && (code === undefined || error.code === code);
}

/** Position sensor port. */
export interface PositionSource {
  readFix(): Promise<RawFix>;
}

export interface LocationServiceOptions {
  source: PositionSource;
  log: LogSink;
  authorized?: boolean;
}

/**
 * One-shot position requests against a sensor, gated on authorization.
 */
export class LocationService {
  private readonly source: PositionSource;
  private readonly log: Logger;
  private authorized: boolean;
  private position: Position | null = null;

  constructor(options: LocationServiceOptions) {
    this.source = options.source;
    this.log = scopedLog(options.log, "Location");
    this.authorized = options.authorized ?? true;
  }

  get isAuthorized(): boolean {
    return this.authorized;
  }

  setAuthorized(authorized: boolean): void {
    this.authorized = authorized;
  }

  /** Last position returned by `requestPosition`. */
  get currentPosition(): Position | null {
    return this.position;
  }

  async requestPosition(): Promise<Position> {
    if (!this.authorized) throw new LocationError("NOT_AUTHORIZED");
    let fix: RawFix;
    try {
      fix = await this.source.readFix();
    } catch (error) {
      this.log.warn(`Position source failed: ${describeError(error)}`);
      throw new LocationError("LOCATION_UNAVAILABLE", describeError(error));
    }
    const position = createPosition(fix);
    this.position = position;
    this.log.debug(`Fix ${position.latitude.toFixed(5)}, ${position.longitude.toFixed(5)} ±${position.accuracy}m`);
    return position;
  }
}
