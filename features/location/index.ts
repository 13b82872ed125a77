export { LocationService, LocationError, isLocationError } from "./location-service";
export { EnvPositionSource } from "./env-position-source";

export type { LocationErrorCode, LocationServiceOptions, PositionSource } from "./location-service";
