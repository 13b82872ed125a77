import { TLSSocket } from "node:tls";
import { Agent, buildConnector } from "undici";
import { fingerprintsMatch, sha256Hex } from "@/features/hex";
import { TransportError } from "@/features/transport/errors";

/**
 * Whether a leaf certificate's DER bytes hash to `expectedFingerprint`.
 * An empty fingerprint accepts any certificate.
 */
export async function certificateMatches(
  der: Uint8Array,
  expectedFingerprint: string,
): Promise<boolean> {
  if (expectedFingerprint.length === 0) return true;
  const actual = await sha256Hex(der);
  return fingerprintsMatch(actual, expectedFingerprint);
}

/**
 * Connector that completes the TLS handshake without CA validation, then
 * checks the peer certificate against `expectedFingerprint`. Session
 * caching is off so every connection runs a full handshake.
 */
export function createPinnedConnector(expectedFingerprint: string): buildConnector.connector {
  const connect = buildConnector({ rejectUnauthorized: false, maxCachedSessions: 0 });

  return (options, callback) => {
    connect(options, (error, socket) => {
      if (error || !socket) {
        callback(error ?? new Error("Connection failed"), null);
        return;
      }
      if (!(socket instanceof TLSSocket)) {
        callback(null, socket);
        return;
      }
      const der = socket.getPeerCertificate().raw ?? new Uint8Array();
      certificateMatches(der, expectedFingerprint).then(
        (matches) => {
          if (matches) {
            callback(null, socket);
            return;
          }
          socket.destroy();
          callback(new TransportError("CERTIFICATE_MISMATCH"), null);
        },
        (hashError: unknown) => {
          socket.destroy();
          callback(hashError instanceof Error ? hashError : new Error(String(hashError)), null);
        },
      );
    });
  };
}

/** Dispatcher for one server, pinned to its certificate fingerprint. */
export function createPinnedAgent(expectedFingerprint: string): Agent {
  return new Agent({ connect: createPinnedConnector(expectedFingerprint) });
}
