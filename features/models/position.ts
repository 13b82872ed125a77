/** Position data matching the server's expected format. */
export interface Position {
  latitude: number;
  longitude: number;
  /** Horizontal accuracy in metres. */
  accuracy: number;
  altitude: number;
  altitudeAccuracy: number;
  /** Course over ground in degrees, 0 when unknown. */
  heading: number;
  /** Metres per second, 0 when unknown. */
  speed: number;
  source: string;
}

/**
 * A fix as reported by a position sensor. Negative heading/speed mean
 * "invalid", null means "not reported".
 */
export interface RawFix {
  latitude: number;
  longitude: number;
  accuracy: number;
  altitude?: number | null;
  altitudeAccuracy?: number | null;
  heading?: number | null;
  speed?: number | null;
  source?: string;
}

function nonNegativeOrZero(value: number | null | undefined): number {
  return value != null && value >= 0 ? value : 0;
}

export function createPosition(fix: RawFix): Position {
  return {
    latitude: fix.latitude,
    longitude: fix.longitude,
    accuracy: fix.accuracy,
    altitude: fix.altitude ?? 0,
    altitudeAccuracy: fix.altitudeAccuracy ?? 0,
    heading: nonNegativeOrZero(fix.heading),
    speed: nonNegativeOrZero(fix.speed),
    source: fix.source ?? "gps",
  };
}
