import { describe, it, expect } from "vitest";
import { OrientationChannel } from "./OrientationChannel";
import { IDENTITY, quat } from "../math/quaternion";

describe("OrientationChannel", () => {
  it("hands a slow reader only the latest of many publishes", () => {
    const channel = new OrientationChannel(1);
    const reader = channel.createReader();
    for (let i = 0; i < 100; i++) {
      channel.publish(quat(1, 0, 0, 0), i);
    }
    const sample = reader.poll();
    expect(sample?.sequence).toBe(100);
    expect(sample?.timestamp).toBe(99);
    expect(reader.poll()).toBeUndefined();
    expect(reader.missedCount).toBe(99);
    expect(channel.getStats()).toEqual({
      capacity: 1,
      retained: 1,
      published: 100,
      overwritten: 99,
      readers: 1,
    });
  });

  it("returns undefined when nothing has been published", () => {
    const channel = new OrientationChannel();
    expect(channel.latest()).toBeUndefined();
    expect(channel.createReader().poll()).toBeUndefined();
  });

  it("drains retained samples oldest first", () => {
    const channel = new OrientationChannel(4);
    const reader = channel.createReader();
    for (let i = 1; i <= 6; i++) channel.publish(IDENTITY, i);
    expect(reader.drain().map((s) => s.timestamp)).toEqual([3, 4, 5, 6]);
    expect(reader.drain()).toEqual([]);
    channel.publish(IDENTITY, 7);
    expect(reader.drain().map((s) => s.timestamp)).toEqual([7]);
  });

  it("keeps an independent cursor per reader", () => {
    const channel = new OrientationChannel();
    const fast = channel.createReader();
    const slow = channel.createReader();
    channel.publish(IDENTITY, 1);
    expect(fast.poll()?.timestamp).toBe(1);
    channel.publish(IDENTITY, 2);
    expect(fast.poll()?.timestamp).toBe(2);
    expect(slow.poll()?.timestamp).toBe(2);
    expect(slow.lastSequence).toBe(2);
  });

  it("stops counting a reader once it is released", () => {
    const channel = new OrientationChannel();
    const kept = channel.createReader();
    const done = channel.createReader();
    expect(channel.getStats().readers).toBe(2);
    done.release();
    done.release();
    expect(channel.getStats().readers).toBe(1);
    channel.publish(IDENTITY, 1);
    expect(kept.poll()?.timestamp).toBe(1);
  });

  it("publishes frozen samples", () => {
    const channel = new OrientationChannel();
    const sample = channel.publish(quat(0, 1, 0, 0), 5);
    expect(Object.isFrozen(sample)).toBe(true);
    expect(Object.isFrozen(sample.quaternion)).toBe(true);
  });

  it("waitForNext resolves on publish", async () => {
    const channel = new OrientationChannel();
    const reader = channel.createReader();
    const pending = reader.waitForNext(1000);
    channel.publish(IDENTITY, 3);
    const sample = await pending;
    expect(sample?.timestamp).toBe(3);
  });

  it("waitForNext returns an unseen sample immediately", async () => {
    const channel = new OrientationChannel();
    const reader = channel.createReader();
    channel.publish(IDENTITY, 8);
    expect((await reader.waitForNext(0))?.timestamp).toBe(8);
  });

  it("waitForNext gives up after the timeout", async () => {
    const channel = new OrientationChannel();
    const reader = channel.createReader();
    expect(await reader.waitForNext(5)).toBeUndefined();
  });

  it("close() releases pending waits", async () => {
    const channel = new OrientationChannel();
    const reader = channel.createReader();
    const pending = reader.waitForNext(10_000);
    channel.close();
    expect(await pending).toBeUndefined();
    expect(await reader.waitForNext(10_000)).toBeUndefined();
  });

  it("rejects a capacity below one", () => {
    expect(() => new OrientationChannel(0)).toThrow(RangeError);
    expect(() => new OrientationChannel(1.5)).toThrow(RangeError);
  });
});
