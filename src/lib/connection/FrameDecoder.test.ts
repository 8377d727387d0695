import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { FrameDecoder, type DecodeStep } from "./FrameDecoder";
import {
  concatBytes,
  encodeBinaryFloat32,
  encodeBinaryFloat64,
  encodeFrame,
  encodeFramed,
} from "./FrameEncoder";
import type { SensorRecord } from "./SensorFormat";

const text = (s: string) => new TextEncoder().encode(s);
const now = () => 42;

function recordOf(step: DecodeStep): SensorRecord {
  if (step.kind !== "record") {
    throw new Error(`expected a record, got ${step.kind}`);
  }
  return step.record;
}

describe("FrameDecoder", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("AsciiQuaternion", () => {
    it("decodes one line into a quaternion record", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text("1.0,0.0,0.0,0.0\n"));
      expect(recordOf(decoder.next())).toEqual({
        type: "quaternion",
        w: 1,
        x: 0,
        y: 0,
        z: 0,
        timestamp: 42,
      });
      expect(decoder.next().kind).toBe("need-more");
    });

    it("waits for the terminator across chunks", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text("0.5,0.5,"));
      expect(decoder.next()).toEqual({ kind: "need-more" });
      decoder.push(text("0.5,-0.5\n"));
      const record = recordOf(decoder.next());
      expect(record).toMatchObject({ w: 0.5, x: 0.5, y: 0.5, z: -0.5 });
    });

    it("drops a line with too few fields and keeps going", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text("1.0,0.0\n0,1,0,0\n"));
      const step = decoder.next();
      expect(step).toEqual({
        kind: "malformed",
        error: {
          kind: "MalformedRecord",
          message: 'expected 4 fields, got 2: "1.0,0.0"',
        },
      });
      expect(recordOf(decoder.next())).toMatchObject({ w: 0, x: 1 });
      expect(decoder.getStats()).toMatchObject({ records: 1, malformed: 1 });
    });

    it("rejects non-numeric fields", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text("1,0,abc,0\n1,0,0,0x1\n1,0,0,NaN\n"));
      expect([...decoder.records()]).toEqual([]);
      expect(decoder.getStats().malformed).toBe(3);
    });

    it("accepts exponents, signs and whitespace around fields", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text(" 1e0 , -0 , +0.0 , .0 \n"));
      expect(recordOf(decoder.next())).toMatchObject({ w: 1, y: 0, z: 0 });
    });

    it("handles \\r\\n, bare \\r and blank lines", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", { now });
      decoder.push(text("1,0,0,0\r\n\n0,1,0,0\r0,0,1,0\r"));
      decoder.push(text("\n0,0,0,1\n"));
      const ws = [...decoder.records()].map((r) =>
        r.type === "quaternion" ? [r.w, r.x, r.y, r.z] : [],
      );
      expect(ws).toEqual([
        [1, 0, 0, 0],
        [0, 1, 0, 0],
        [0, 0, 1, 0],
        [0, 0, 0, 1],
      ]);
      expect(decoder.getStats().malformed).toBe(0);
    });

    it("discards an unterminated line longer than maxLineLength", () => {
      const decoder = new FrameDecoder("AsciiQuaternion", {
        now,
        maxLineLength: 10,
      });
      decoder.push(text("12345678901"));
      const step = decoder.next();
      expect(step.kind).toBe("malformed");
      expect(decoder.pending).toBe(0);
      decoder.push(text("1,0,0,0\n"));
      expect(recordOf(decoder.next())).toMatchObject({ w: 1 });
    });
  });

  describe("AsciiSixAxis", () => {
    it("decodes accel then gyro", () => {
      const decoder = new FrameDecoder("AsciiSixAxis", { now });
      decoder.push(text("0,0,9.81,1,2,3\n"));
      expect(recordOf(decoder.next())).toEqual({
        type: "six-axis",
        accel: [0, 0, 9.81],
        gyro: [1, 2, 3],
        timestamp: 42,
      });
    });

    it("requires exactly six fields", () => {
      const decoder = new FrameDecoder("AsciiSixAxis", { now });
      decoder.push(text("1,0,0,0\n0,0,9.81,0,0,0,7\n"));
      expect([...decoder.records()]).toEqual([]);
      expect(decoder.getStats().malformed).toBe(2);
    });
  });

  describe("binary quaternions", () => {
    it("decodes float32 w,x,y,z little-endian", () => {
      const decoder = new FrameDecoder("BinaryFloat32Quaternion", { now });
      const bytes = encodeBinaryFloat32({ w: 0.5, x: -0.5, y: 0.25, z: 0.75 });
      decoder.push(bytes.subarray(0, 10));
      expect(decoder.next().kind).toBe("need-more");
      decoder.push(bytes.subarray(10));
      expect(recordOf(decoder.next())).toMatchObject({
        w: 0.5,
        x: -0.5,
        y: 0.25,
        z: 0.75,
      });
    });

    it("decodes float64 records back to back", () => {
      const decoder = new FrameDecoder("BinaryFloat64Quaternion", { now });
      decoder.push(
        concatBytes(
          encodeBinaryFloat64({ w: 0.1, x: 0.2, y: 0.3, z: 0.4 }),
          encodeBinaryFloat64({ w: 1, x: 0, y: 0, z: 0 }),
        ),
      );
      const records = [...decoder.records()];
      expect(records).toHaveLength(2);
      expect(records[0]).toMatchObject({ w: 0.1, x: 0.2, y: 0.3, z: 0.4 });
      expect(decoder.pending).toBe(0);
    });
  });

  describe("FramedCustomQuaternion", () => {
    const identity = { w: 1, x: 0, y: 0, z: 0 };

    it("lays out header 55 AA, float32 payload and sum16 checksum", () => {
      const frame = encodeFramed(identity);
      expect(Array.from(frame)).toEqual([
        0x55, 0xaa, 0x00, 0x00, 0x80, 0x3f, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
        0xbe, 0x01,
      ]);
    });

    it("decodes a valid frame", () => {
      const decoder = new FrameDecoder("FramedCustomQuaternion", { now });
      decoder.push(encodeFramed(identity));
      expect(recordOf(decoder.next())).toEqual({
        type: "quaternion",
        ...identity,
        timestamp: 42,
      });
    });

    it("skips garbage before the header one byte at a time", () => {
      const decoder = new FrameDecoder("FramedCustomQuaternion", { now });
      decoder.push(concatBytes(new Uint8Array([0x00, 0x55, 0x00]), encodeFramed(identity)));
      expect(recordOf(decoder.next())).toMatchObject(identity);
      expect(decoder.getStats().skippedBytes).toBe(3);
    });

    it("reports a checksum mismatch and resynchronizes on the next frame", () => {
      const decoder = new FrameDecoder("FramedCustomQuaternion", { now });
      const bad = encodeFramed(identity);
      bad[18] = 0x00;
      decoder.push(concatBytes(bad, encodeFramed({ w: 0, x: 1, y: 0, z: 0 })));

      expect(decoder.next()).toEqual({
        kind: "checksum-mismatch",
        error: {
          kind: "ChecksumMismatch",
          message: "expected=0x0100 computed=0x01be",
        },
      });
      expect(recordOf(decoder.next())).toMatchObject({ w: 0, x: 1 });
      expect(decoder.getStats()).toMatchObject({
        records: 1,
        checksumMismatches: 1,
        skippedBytes: 19,
      });
    });

    it("waits for the rest of a split frame", () => {
      const decoder = new FrameDecoder("FramedCustomQuaternion", { now });
      const frame = encodeFramed(identity);
      decoder.push(frame.subarray(0, 7));
      expect(decoder.next().kind).toBe("need-more");
      decoder.push(frame.subarray(7));
      expect(decoder.next().kind).toBe("record");
    });

    it("honours the configured checksum policy", () => {
      const xor = new FrameDecoder("FramedCustomQuaternion", { now, checksum: "xor8" });
      xor.push(encodeFramed(identity, "xor8"));
      expect(xor.next().kind).toBe("record");

      const none = new FrameDecoder("FramedCustomQuaternion", { now, checksum: "none" });
      none.push(encodeFrame("FramedCustomQuaternion", identity, "none"));
      expect(none.next().kind).toBe("record");
    });
  });

  it("reset() discards partial input but keeps statistics", () => {
    const decoder = new FrameDecoder("AsciiQuaternion", { now });
    decoder.push(text("1,0,0,0\n0.5,0"));
    expect(decoder.next().kind).toBe("record");
    decoder.reset();
    expect(decoder.pending).toBe(0);
    decoder.push(text(".5,0.5,0.5\n"));
    // ".5,0.5,0.5" has three fields: the old prefix is gone
    expect(decoder.next().kind).toBe("malformed");
    expect(decoder.getStats().records).toBe(1);
  });

  it("counts input buffer overflow", () => {
    const decoder = new FrameDecoder("BinaryFloat32Quaternion", { now, bufferSize: 16 });
    decoder.push(new Uint8Array(20));
    expect(decoder.getStats().overflowBytes).toBe(4);
    expect(console.warn).toHaveBeenCalled();
  });

  it("tracks received bytes and free buffer space", () => {
    const decoder = new FrameDecoder("BinaryFloat32Quaternion", { now, bufferSize: 32 });
    expect(decoder.freeSpace).toBe(32);
    decoder.push(concatBytes(encodeBinaryFloat32({ w: 1, x: 0, y: 0, z: 0 }), new Uint8Array(4)));
    expect(decoder.freeSpace).toBe(12);
    expect(decoder.next().kind).toBe("record");
    expect(decoder.freeSpace).toBe(28);
    expect(decoder.getStats().bytesReceived).toBe(20);
  });
});

describe("encodeFrame", () => {
  it("formats ASCII quaternions with shortest round-trip numbers", () => {
    const bytes = encodeFrame("AsciiQuaternion", { w: 1, x: 0, y: -0.25, z: 0.5 });
    expect(new TextDecoder().decode(bytes)).toBe("1,0,-0.25,0.5\n");
  });

  it("formats 6-axis samples as accel then gyro", () => {
    const bytes = encodeFrame("AsciiSixAxis", { accel: [0, 0, 9.81], gyro: [1, 2, 3] });
    expect(new TextDecoder().decode(bytes)).toBe("0,0,9.81,1,2,3\n");
  });
});
