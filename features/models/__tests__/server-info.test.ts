import { describe, it, expect } from "vitest";
import {
  baseUrl,
  createServerInfo,
  manualServerInfo,
  parsePaths,
  parseServerInfo,
  sameServer,
  serverKey,
} from "../server-info";

function server(overrides: Partial<Parameters<typeof createServerInfo>[0]> = {}) {
  return createServerInfo({
    name: "relay",
    host: "10.0.0.2",
    port: 8080,
    certFingerprint: "",
    version: "1.0",
    paths: ["/submit"],
    ...overrides,
  });
}

describe("sameServer", () => {
  it("treats equal host and port as the same server regardless of metadata", () => {
    const a = server({ name: "a", version: "1.0", certFingerprint: "aa" });
    const b = server({ name: "b", version: "2.0", certFingerprint: "bb", paths: [] });
    expect(sameServer(a, b)).toBe(true);
    expect(serverKey(a)).toBe(serverKey(b));
  });
  it("distinguishes ports", () => {
    expect(sameServer(server(), server({ port: 8443 }))).toBe(false);
  });
  it("distinguishes hosts", () => {
    expect(sameServer(server(), server({ host: "10.0.0.3" }))).toBe(false);
  });
});

describe("createServerInfo", () => {
  it("freezes the record and its paths", () => {
    const s = server();
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.paths)).toBe(true);
  });
});

describe("manualServerInfo", () => {
  it("builds a usable record for a typed address", () => {
    const s = manualServerInfo("192.168.1.50", "");
    expect(s).toEqual({
      name: "Manual Server",
      host: "192.168.1.50",
      port: 8080,
      certFingerprint: "",
      version: "unknown",
      paths: ["/submit", "/status", "/request"],
    });
  });
  it("trims whitespace from host and fingerprint", () => {
    const s = manualServerInfo("  relay.local ", " AB12 ");
    expect(s.host).toBe("relay.local");
    expect(s.certFingerprint).toBe("AB12");
  });
});

describe("parsePaths", () => {
  it("splits on comma-space", () => {
    expect(parsePaths("/submit, /request, /status")).toEqual([
      "/submit",
      "/request",
      "/status",
    ]);
  });
  it("returns empty list for missing value", () => {
    expect(parsePaths(undefined)).toEqual([]);
    expect(parsePaths("")).toEqual([]);
  });
});

describe("baseUrl", () => {
  it("uses https with the port", () => {
    expect(baseUrl(server())).toBe("https://10.0.0.2:8080");
  });
  it("brackets bare IPv6 hosts", () => {
    expect(baseUrl({ host: "fe80::1", port: 8080 })).toBe("https://[fe80::1]:8080");
  });
  it("keeps already bracketed IPv6 hosts", () => {
    expect(baseUrl({ host: "[fe80::1]", port: 8080 })).toBe("https://[fe80::1]:8080");
  });
});

describe("parseServerInfo", () => {
  it("round-trips a serialized record", () => {
    const s = server({ paths: ["/submit", "/status"] });
    const parsed = parseServerInfo(JSON.parse(JSON.stringify(s)));
    expect(parsed).toEqual(s);
  });
  it("rejects records with missing fields", () => {
    expect(parseServerInfo({ host: "10.0.0.2", port: 8080 })).toBeNull();
    expect(parseServerInfo("nope")).toBeNull();
    expect(parseServerInfo(null)).toBeNull();
  });
});
