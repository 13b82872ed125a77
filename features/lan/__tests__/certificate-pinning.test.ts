import { X509Certificate } from "node:crypto";
import { readFileSync } from "node:fs";
import { createServer, type Server } from "node:https";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { LanConfig } from "@/constants/transport";
import { MemoryLogSink } from "@/features/logging";
import { manualServerInfo } from "@/features/models";
import { describeError, isTransportError } from "@/features/transport/errors";
import { LanChannel } from "../lan-channel";
import { HttpsServerClient } from "../server-client";

const key = readFileSync(new URL("./fixtures/server-key.pem", import.meta.url));
const cert = readFileSync(new URL("./fixtures/server-cert.pem", import.meta.url));
const FINGERPRINT = new X509Certificate(cert).fingerprint256.replace(/:/g, "").toLowerCase();

let server: Server;
let port = 0;

beforeAll(async () => {
  server = createServer({ key, cert }, (req, res) => {
    if (req.url === LanConfig.STATUS_PATH) {
      res.writeHead(200);
      res.end("ok");
      return;
    }
    res.writeHead(204);
    res.end();
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address && typeof address === "object") port = address.port;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
});

/** Connect a channel to the local TLS server and report the outcome. */
async function connectPinned(fingerprint: string) {
  const log = new MemoryLogSink();
  const info = manualServerInfo("127.0.0.1", fingerprint, port);
  const client = new HttpsServerClient({ server: info, log });
  const channel = new LanChannel({ server: info, client, log });
  try {
    await channel.connect();
    return { outcome: "connected", state: channel.getConnectionState() };
  } catch (error) {
    return {
      outcome: isTransportError(error) ? error.code : describeError(error),
      state: channel.getConnectionState(),
    };
  } finally {
    channel.disconnect();
    await client.close();
  }
}

describe("certificate pinning over TLS", () => {
  it("connects without a fingerprint", async () => {
    expect((await connectPinned("")).outcome).toBe("connected");
  });

  it("connects when the fingerprint matches the server certificate", async () => {
    expect((await connectPinned(FINGERPRINT)).outcome).toBe("connected");
  });

  it("matches an uppercase fingerprint", async () => {
    expect((await connectPinned(FINGERPRINT.toUpperCase())).outcome).toBe("connected");
  });

  it("refuses a server whose certificate has another fingerprint", async () => {
    const { outcome, state } = await connectPinned("00".repeat(32));
    expect(outcome).toBe("CERTIFICATE_MISMATCH");
    expect(state).toEqual({
      status: "error",
      message: "Server certificate does not match expected fingerprint",
    });
  });
});
