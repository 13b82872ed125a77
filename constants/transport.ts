/**
 * Transport Configuration
 *
 * Protocol identifiers and timings shared with the relay server.
 * UUIDs, the service type and endpoint paths must match the server build.
 */

// ============================================================================
// BLUETOOTH LE
// ============================================================================

export const BleConfig = {
  /**
   * GATT service exposed by the relay peripheral.
   */
  SERVICE_UUID: "12345678-1234-5678-1234-56789abcdef0",

  /**
   * Single characteristic used for both writes (payload) and notifications
   * (location requests).
   */
  CHARACTERISTIC_UUID: "abcdef01-1234-5678-1234-56789abcdef0",

  /**
   * Advertised peripheral name.
   */
  PERIPHERAL_NAME: "Serviceberry",

  /**
   * Notification text that asks for a position in addition to anything
   * containing "request".
   */
  REQUEST_SENTINEL: "GPS?",

  /**
   * Payload frame terminator (newline).
   */
  FRAME_TERMINATOR: 0x0a,

  /**
   * Write size used before the link reports one (ATT default MTU 23 - 3).
   */
  DEFAULT_WRITE_LENGTH: 20,

  CONNECTION_TIMEOUT_MS: 15_000,

  /**
   * How long startup scans for a relay peripheral before giving up.
   */
  SCAN_TIMEOUT_MS: 30_000,

  /**
   * Restore identifier under which the connected peripheral is remembered.
   */
  RESTORE_IDENTIFIER: "relay-central",
} as const;

// ============================================================================
// LOCAL NETWORK (mDNS + HTTPS)
// ============================================================================

export const LanConfig = {
  /**
   * Bonjour service type advertised by the relay server.
   */
  SERVICE_TYPE: "_serviceberry._tcp",

  /**
   * Default browse domain (trailing dot is standard DNS format).
   */
  DOMAIN: "local.",

  DEFAULT_PORT: 8080,

  SUBMIT_PATH: "/submit",
  REQUEST_PATH: "/request",
  STATUS_PATH: "/status",

  /**
   * Interval between polls of the request endpoint.
   */
  REQUEST_POLL_INTERVAL_MS: 5_000,

  REQUEST_TIMEOUT_MS: 30_000,
} as const;

// ============================================================================
// DISCOVERY
// ============================================================================

export const DiscoveryConfig = {
  /**
   * Delay before the whole browse operation is restarted after a failure.
   */
  RETRY_DELAY_MS: 2_000,

  MAX_RETRIES: 3,

  RESOLVE_TIMEOUT_MS: 10_000,

  /**
   * Separator used by the `paths` TXT entry.
   */
  PATHS_SEPARATOR: ", ",

  /**
   * How long startup waits for the first discovered server.
   */
  FIRST_SERVER_TIMEOUT_MS: 30_000,
} as const;

// ============================================================================
// RECONNECT
// ============================================================================

export const ReconnectConfig = {
  MAX_ATTEMPTS: 10,
  BASE_DELAY_MS: 1_000,
  MAX_DELAY_MS: 15_000,
} as const;

// ============================================================================
// PREFERENCES
// ============================================================================

export const PreferenceKeys = {
  IS_ONBOARDED: "isOnboarded",
  TRANSPORT_MODE: "transportMode",
  SERVER_INFO: "serverInfo",
} as const;
