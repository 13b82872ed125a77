import { describe, it, expect } from "vitest";
import { chunkFrame, frameForWrite, isLocationRequestSignal } from "../ble-framing";
import { createLocationPayload, createPosition, encodeLocationPayload } from "@/features/models";
import { concatBytes } from "./fake-central";

const text = (s: string) => new TextEncoder().encode(s);

describe("frameForWrite", () => {
  it("appends a single newline to the serialized payload", () => {
    const payload = createLocationPayload(
      createPosition({ latitude: 51.5, longitude: -0.12, accuracy: 8 }),
    );
    const frame = frameForWrite(payload);
    const json = encodeLocationPayload(payload);
    expect(new TextDecoder().decode(frame)).toBe(`${json}\n`);
    expect(frame[frame.length - 1]).toBe(0x0a);
  });
});

describe("chunkFrame", () => {
  it("splits into chunks no larger than the limit that rebuild the input", () => {
    const bytes = Uint8Array.from({ length: 47 }, (_, i) => i);
    const chunks = chunkFrame(bytes, 20);
    expect(chunks.map((c) => c.length)).toEqual([20, 20, 7]);
    expect(concatBytes(chunks)).toEqual(bytes);
  });
  it("returns one chunk when the frame fits", () => {
    expect(chunkFrame(text("hi\n"), 185)).toHaveLength(1);
  });
  it("returns no chunks for empty input", () => {
    expect(chunkFrame(new Uint8Array(0), 20)).toEqual([]);
  });
  it("treats a non-positive limit as one byte", () => {
    expect(chunkFrame(text("abc"), 0)).toHaveLength(3);
  });
});

describe("isLocationRequestSignal", () => {
  it("matches 'request' case-insensitively anywhere in the text", () => {
    expect(isLocationRequestSignal(text("REQUEST"))).toBe(true);
    expect(isLocationRequestSignal(text("location_request:42"))).toBe(true);
  });
  it("matches the exact sentinel", () => {
    expect(isLocationRequestSignal(text("GPS?"))).toBe(true);
  });
  it("ignores the sentinel in another case or with extra text", () => {
    expect(isLocationRequestSignal(text("gps?"))).toBe(false);
    expect(isLocationRequestSignal(text("GPS? "))).toBe(false);
  });
  it("ignores unrelated notifications", () => {
    expect(isLocationRequestSignal(text("ack"))).toBe(false);
  });
});
