import { describe, it, expect } from "vitest";
import { RingBuffer } from "./RingBuffer";

const bytes = (...b: number[]) => new Uint8Array(b);

describe("RingBuffer", () => {
  it("reads back what was written, in order", () => {
    const ring = new RingBuffer(8);
    ring.write(bytes(1, 2, 3));
    ring.write(bytes(4, 5));
    expect(ring.length).toBe(5);
    expect(Array.from(ring.read(4))).toEqual([1, 2, 3, 4]);
    expect(ring.length).toBe(1);
  });

  it("wraps around the end of the backing array", () => {
    const ring = new RingBuffer(4);
    ring.write(bytes(1, 2, 3));
    ring.skip(2);
    ring.write(bytes(4, 5, 6));
    expect(Array.from(ring.peek(0, 4))).toEqual([3, 4, 5, 6]);
    expect(ring.peekByte(3)).toBe(6);
  });

  it("discards the oldest bytes on overflow and reports them once", () => {
    const ring = new RingBuffer(4);
    ring.write(bytes(1, 2, 3));
    ring.write(bytes(4, 5, 6));
    expect(Array.from(ring.read(ring.length))).toEqual([3, 4, 5, 6]);
    expect(ring.drainOverflowStats()).toEqual({ events: 1, bytes: 2 });
    expect(ring.drainOverflowStats()).toEqual({ events: 0, bytes: 0 });
  });

  it("keeps only the newest bytes of an oversize chunk", () => {
    const ring = new RingBuffer(4);
    ring.write(bytes(9));
    ring.write(bytes(1, 2, 3, 4, 5, 6));
    expect(Array.from(ring.read(4))).toEqual([3, 4, 5, 6]);
    expect(ring.drainOverflowStats().bytes).toBe(3);
  });

  it("finds the first matching byte from an offset", () => {
    const ring = new RingBuffer(8);
    ring.write(bytes(0x0a, 7, 0x0a));
    expect(ring.findIndex((b) => b === 0x0a)).toBe(0);
    expect(ring.findIndex((b) => b === 0x0a, 1)).toBe(2);
    expect(ring.findIndex((b) => b === 0xff)).toBe(-1);
  });

  it("skip never consumes more than is buffered", () => {
    const ring = new RingBuffer(8);
    ring.write(bytes(1, 2));
    ring.skip(10);
    expect(ring.length).toBe(0);
  });

  it("rejects a non-positive size", () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
  });
});
