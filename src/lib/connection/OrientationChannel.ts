/**
 * OrientationChannel - rate decoupling between the ingestion role and
 * consumers (render loops, plotters, loggers).
 *
 * PURPOSE:
 * 1. Bounded: a fixed ring of the most recent samples, never grows.
 * 2. Overwrite-oldest: a slow consumer only ever loses old values.
 * 3. Non-blocking: polling with nothing new returns undefined; waiting is
 *    opt-in and always bounded by a timeout.
 *
 * Capacity 1 is "latest wins". Each reader keeps its own cursor, so several
 * consumers can draw at independent cadences.
 *
 * Samples are frozen before they are stored: a reader sees a complete
 * published value or nothing.
 */

import { channelLog } from "../logger";
import type { Quaternion } from "../math/quaternion";
import type { OrientationSample } from "./SensorFormat";

export interface ChannelStats {
  capacity: number;
  retained: number;
  published: number;
  /** Samples pushed out of the ring before any reader could be sure to see them */
  overwritten: number;
  readers: number;
}

type Waiter = () => void;

export class OrientationChannel {
  private readonly slots: (OrientationSample | undefined)[];
  private readonly capacity: number;
  private head = 0; // next write position
  private count = 0;
  private sequence = 0;
  private overwritten = 0;
  private closed = false;
  private readerCount = 0;
  private waiters = new Set<Waiter>();

  constructor(capacity = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be an integer >= 1, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<OrientationSample | undefined>(capacity).fill(undefined);
  }

  publish(quaternion: Quaternion, timestamp: number): OrientationSample {
    const sample: OrientationSample = Object.freeze({
      quaternion,
      timestamp,
      sequence: ++this.sequence,
    });

    if (this.count === this.capacity) {
      this.overwritten++;
    } else {
      this.count++;
    }
    this.slots[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;

    if (this.waiters.size > 0) {
      const pending = [...this.waiters];
      this.waiters.clear();
      for (const wake of pending) wake();
    }
    return sample;
  }

  latest(): OrientationSample | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head - 1 + this.capacity) % this.capacity];
  }

  /** Retained samples, oldest first */
  retained(): OrientationSample[] {
    const out: OrientationSample[] = [];
    const start = (this.head - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const s = this.slots[(start + i) % this.capacity];
      if (s) out.push(s);
    }
    return out;
  }

  createReader(): ChannelReader {
    this.readerCount++;
    return new ChannelReader(this);
  }

  /** @internal used by ChannelReader.release */
  releaseReader(): void {
    if (this.readerCount > 0) this.readerCount--;
  }

  /** Wake every pending wait; later waits resolve immediately. */
  close(): void {
    this.closed = true;
    channelLog.debug(
      `Closed after ${this.sequence} samples (${this.overwritten} overwritten, ${this.waiters.size} waiting)`,
    );
    const pending = [...this.waiters];
    this.waiters.clear();
    for (const wake of pending) wake();
  }

  /** Re-open after close() for a new ingestion session. Retained values stay. */
  reopen(): void {
    this.closed = false;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** @internal used by ChannelReader */
  addWaiter(waiter: Waiter): () => void {
    this.waiters.add(waiter);
    return () => this.waiters.delete(waiter);
  }

  getStats(): ChannelStats {
    return {
      capacity: this.capacity,
      retained: this.count,
      published: this.sequence,
      overwritten: this.overwritten,
      readers: this.readerCount,
    };
  }
}

export class ChannelReader {
  private cursor = 0;
  private missed = 0;
  private released = false;

  constructor(private readonly channel: OrientationChannel) {}

  /** Latest sample not yet seen by this reader, or undefined */
  poll(): OrientationSample | undefined {
    const latest = this.channel.latest();
    if (!latest || latest.sequence <= this.cursor) return undefined;
    this.missed += latest.sequence - this.cursor - 1;
    this.cursor = latest.sequence;
    return latest;
  }

  /** All retained samples not yet seen, oldest first */
  drain(): OrientationSample[] {
    const fresh = this.channel
      .retained()
      .filter((s) => s.sequence > this.cursor);
    if (fresh.length > 0) {
      this.missed += fresh[0].sequence - this.cursor - 1;
      this.cursor = fresh[fresh.length - 1].sequence;
    }
    return fresh;
  }

  /**
   * Resolve with the next unseen sample, or undefined after `timeoutMs`
   * or when the channel closes.
   */
  waitForNext(timeoutMs: number): Promise<OrientationSample | undefined> {
    const ready = this.poll();
    if (ready || this.channel.isClosed) return Promise.resolve(ready);

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const remove = this.channel.addWaiter(() => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(this.poll());
      });
      timer = setTimeout(() => {
        remove();
        resolve(undefined);
      }, Math.max(0, timeoutMs));
    });
  }

  /** Published samples this reader never observed */
  get missedCount(): number {
    return this.missed;
  }

  get lastSequence(): number {
    return this.cursor;
  }

  /** Stop counting this reader as attached. Idempotent. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.channel.releaseReader();
  }
}
