export { toHex, sha256Hex, fingerprintsMatch, formatFingerprint } from "./hex-utils";
