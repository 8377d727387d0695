/**
 * AttitudePipeline - the ingestion role.
 *
 * bytes → FrameDecoder → (ComplementaryFilter | validator) → ResetOffset
 *       → OrientationChannel → consumers
 *
 * A single task owns every stage, so records are processed strictly in
 * arrival order. Consumers never touch this state: they read the channel
 * through their own ChannelReader, or subscribe to the status store.
 *
 * reset(), clearReset() and recalibrate() may be called from anywhere; they
 * are queued and applied between records, never in the middle of one.
 */

import type { ByteReadResult, ByteSource } from "../connection/ByteSource";
import { FrameDecoder, type DecoderStats } from "../connection/FrameDecoder";
import {
  OrientationChannel,
  type ChannelReader,
  type ChannelStats,
} from "../connection/OrientationChannel";
import type {
  OrientationSample,
  SensorRecord,
} from "../connection/SensorFormat";
import {
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "../config";
import { SensorDisconnectedError } from "../errors";
import {
  ComplementaryFilter,
  type FilterDiagnostics,
} from "../fusion/ComplementaryFilter";
import { createRateLimiter, pipelineLog } from "../logger";
import type { Quaternion } from "../math/quaternion";
import { validateQuaternion } from "../math/quaternionValidator";
import { ResetOffset } from "../math/resetOffset";
import {
  createPipelineStore,
  type PipelineSnapshot,
  type PipelineStore,
  type PipelineThroughput,
} from "../../store/pipelineStore";

export interface AttitudePipelineOptions {
  /** Arrival clock in seconds (decoder timestamps) */
  now?: () => number;
  /** Injected store, e.g. shared with a UI */
  store?: PipelineStore;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PipelineStats {
  decoder: DecoderStats;
  channel: ChannelStats;
  filter: FilterDiagnostics | null;
  invalidQuaternions: number;
  resetCount: number;
  throughput: PipelineThroughput;
  /** Published / (decoded + malformed + checksum mismatches), 0 before any input */
  successRate: number;
}

interface StatsWindow {
  start: number;
  bytes: number;
  records: number;
}

type ControlMessage =
  | { type: "reset" }
  | { type: "clear-reset" }
  | { type: "recalibrate" };

const STATS_WINDOW_S = 5;
const ERROR_LOG_INTERVAL_MS = 2000;

function successRate(decoder: DecoderStats, channel: ChannelStats): number {
  const total = decoder.records + decoder.malformed + decoder.checksumMismatches;
  return total === 0 ? 0 : channel.published / total;
}

/** Resolves after `ms`, or early when the signal aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Resolves with the read result, or null if the signal aborts first. */
function readOrAbort(
  source: ByteSource,
  signal?: AbortSignal,
): Promise<ByteReadResult | null> {
  if (signal?.aborted) return Promise.resolve(null);
  const read = source.read();
  if (!signal) return read;
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<null>((resolve) => {
    onAbort = () => resolve(null);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([read, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  });
}

export class AttitudePipeline {
  readonly config: PipelineConfig;
  readonly store: PipelineStore;

  private readonly decoder: FrameDecoder;
  private readonly filter: ComplementaryFilter | null;
  private readonly offset = new ResetOffset();
  private readonly channel: OrientationChannel;

  private control: ControlMessage[] = [];
  private pendingReset = false;
  private running = false;

  private invalidQuaternions = 0;
  private insufficientData = 0;
  private disconnects = 0;
  private lastError: string | null = null;

  private readonly clock: () => number;
  private statsWindow: StatsWindow | null = null;
  private throughput: PipelineThroughput = { bytesPerSecond: 0, recordsPerSecond: 0 };

  private readonly shouldLogInvalid = createRateLimiter(ERROR_LOG_INTERVAL_MS);

  constructor(config?: PipelineConfigInput, options: AttitudePipelineOptions = {}) {
    this.config = resolvePipelineConfig(config);
    this.store = options.store ?? createPipelineStore();

    this.clock = options.now ?? (() => performance.now() / 1000);
    this.decoder = new FrameDecoder(this.config.format, {
      checksum: this.config.decoder.checksum,
      maxLineLength: this.config.decoder.maxLineLength,
      now: this.clock,
    });
    this.filter =
      this.config.format === "AsciiSixAxis"
        ? new ComplementaryFilter(this.config.filter, this.config.validator)
        : null;
    this.channel = new OrientationChannel(this.config.channel.capacity);

    this.syncStore();
  }

  // ─── Consumer side ───

  createReader(): ChannelReader {
    return this.channel.createReader();
  }

  latest(): OrientationSample | undefined {
    return this.channel.latest();
  }

  // ─── Control (queued) ───

  /** The next computed orientation becomes the reference (published as identity). */
  reset(): void {
    this.control.push({ type: "reset" });
  }

  clearReset(): void {
    this.control.push({ type: "clear-reset" });
  }

  /** Re-estimate gyro bias over the next calibration window. 6-axis only. */
  recalibrate(): void {
    this.control.push({ type: "recalibrate" });
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ─── Ingestion ───

  /**
   * Read from `source` until the signal aborts (clean stop) or the source
   * ends or fails (rejects with SensorDisconnectedError).
   */
  async run(source: ByteSource, options: RunOptions = {}): Promise<void> {
    if (this.running) {
      throw new Error("AttitudePipeline is already running");
    }
    const { signal } = options;
    this.running = true;
    this.channel.reopen();
    this.store.getState().setStatus("running");
    pipelineLog.info(`Ingestion started (${this.config.format})`);

    try {
      while (!signal?.aborted) {
        let result: ByteReadResult | null;
        try {
          result = await readOrAbort(source, signal);
        } catch (error) {
          throw this.disconnected("Byte source read failed", error);
        }
        if (result === null || signal?.aborted) break;
        if (result.done) {
          throw this.disconnected("Byte source ended");
        }
        if (result.value && result.value.length > 0) {
          this.ingest(result.value);
        } else {
          await sleep(this.config.idleDelayMs, signal);
        }
      }
      await this.stopped(source);
    } finally {
      this.running = false;
    }
  }

  /**
   * Decode and process one chunk synchronously. Chunks larger than the
   * decoder's free space are fed in slices with a decode pass after each,
   * so no complete record is pushed out of the input buffer.
   */
  ingest(chunk: Uint8Array): void {
    if (!this.statsWindow) this.statsWindow = this.windowStart(this.clock());

    let offset = 0;
    while (offset < chunk.length) {
      const remaining = chunk.length - offset;
      // A full buffer that cannot be decoded (line longer than the buffer)
      // takes the whole remainder and overflows
      const room = this.decoder.freeSpace;
      const take = room > 0 ? Math.min(room, remaining) : remaining;
      this.decoder.push(chunk.subarray(offset, offset + take));
      offset += take;
      this.decodeAvailable();
    }
    // Control sent while no complete record was available
    this.applyControl();

    this.updateThroughput();
    this.syncStore();
  }

  getStats(): PipelineStats {
    const decoder = this.decoder.getStats();
    const channel = this.channel.getStats();
    return {
      decoder,
      channel,
      filter: this.filter ? this.filter.getDiagnostics() : null,
      invalidQuaternions: this.invalidQuaternions,
      resetCount: this.offset.getResetCount(),
      throughput: { ...this.throughput },
      successRate: successRate(decoder, channel),
    };
  }

  private decodeAvailable(): void {
    for (;;) {
      const step = this.decoder.next();
      if (step.kind === "need-more") return;
      if (step.kind === "record") {
        this.process(step.record);
      } else {
        this.lastError = `${step.error.kind}: ${step.error.message}`;
      }
    }
  }

  private windowStart(start: number): StatsWindow {
    const d = this.decoder.getStats();
    return { start, bytes: d.bytesReceived, records: d.records };
  }

  private updateThroughput(): void {
    const window = this.statsWindow;
    if (!window) return;
    const t = this.clock();
    const elapsed = t - window.start;
    if (elapsed < STATS_WINDOW_S) return;

    const d = this.decoder.getStats();
    this.throughput = {
      bytesPerSecond: (d.bytesReceived - window.bytes) / elapsed,
      recordsPerSecond: (d.records - window.records) / elapsed,
    };
    this.statsWindow = { start: t, bytes: d.bytesReceived, records: d.records };

    const c = this.channel.getStats();
    pipelineLog.debug(
      `rx=${this.throughput.bytesPerSecond.toFixed(0)} B/s records=${this.throughput.recordsPerSecond.toFixed(1)}/s ` +
        `published=${c.published} overwritten=${c.overwritten} malformed=${d.malformed} ` +
        `checksum=${d.checksumMismatches} invalid=${this.invalidQuaternions}`,
    );
  }

  private process(record: SensorRecord): void {
    this.applyControl();

    let q: Quaternion;
    if (record.type === "quaternion") {
      const result = validateQuaternion(
        record.w,
        record.x,
        record.y,
        record.z,
        this.config.validator,
      );
      if (!result.ok) {
        this.invalid(result.error.message);
        return;
      }
      q = result.quaternion;
    } else if (this.filter) {
      const step = this.filter.update(record);
      if (step.status === "rejected") {
        this.invalid(step.error.message);
        return;
      }
      q = step.quaternion;
    } else {
      return;
    }

    if (this.pendingReset) {
      this.offset.reset(q);
      this.pendingReset = false;
    }
    this.channel.publish(this.offset.apply(q), record.timestamp);
  }

  private applyControl(): void {
    if (this.control.length === 0) return;
    const messages = this.control;
    this.control = [];
    for (const msg of messages) {
      switch (msg.type) {
        case "reset":
          this.pendingReset = true;
          break;
        case "clear-reset":
          this.pendingReset = false;
          this.offset.clear();
          break;
        case "recalibrate":
          if (this.filter) {
            this.filter.recalibrate();
          } else {
            pipelineLog.debug(`recalibrate ignored: ${this.config.format} has no filter`);
          }
          break;
      }
    }
  }

  private invalid(message: string): void {
    this.invalidQuaternions++;
    this.lastError = `InvalidQuaternion: ${message}`;
    if (this.shouldLogInvalid()) {
      pipelineLog.warn(
        `Invalid quaternion dropped (count=${this.invalidQuaternions}): ${message}`,
      );
    }
  }

  private disconnected(message: string, cause?: unknown): SensorDisconnectedError {
    if (this.decoder.pending > 0) {
      // A partial record can never complete now
      this.insufficientData++;
      this.decoder.reset();
    }
    this.disconnects++;
    this.lastError = `SensorDisconnected: ${message}`;
    this.syncStore();
    this.store.getState().setStatus("disconnected");
    this.channel.close();
    pipelineLog.error(message, cause ?? "");
    return new SensorDisconnectedError(message, { cause });
  }

  private async stopped(source: ByteSource): Promise<void> {
    this.decoder.reset();
    this.channel.close();
    this.syncStore();
    this.store.getState().setStatus("stopped");
    const stats = this.getStats();
    pipelineLog.log(
      "info",
      "Ingestion stopped",
      {
        records: stats.decoder.records,
        published: stats.channel.published,
        successRate: stats.successRate,
      },
      { force: true },
    );
    if (source.cancel) {
      try {
        await source.cancel("stopped");
      } catch (error) {
        pipelineLog.warn("Byte source cancel error:", error);
      }
    }
  }

  private syncStore(): void {
    const d = this.decoder.getStats();
    const c = this.channel.getStats();
    const diag = this.filter?.getDiagnostics();
    const snapshot: PipelineSnapshot = {
      counters: {
        bytesReceived: d.bytesReceived,
        records: d.records,
        published: c.published,
        overwritten: c.overwritten,
        errors: {
          InsufficientData: this.insufficientData,
          MalformedRecord: d.malformed,
          ChecksumMismatch: d.checksumMismatches,
          InvalidQuaternion: this.invalidQuaternions,
          SensorDisconnected: this.disconnects,
        },
      },
      throughput: this.throughput,
      successRate: successRate(d, c),
      resetCount: this.offset.getResetCount(),
      calibrating: diag?.calibrating ?? false,
      calibrationProgress: diag?.calibrationProgress ?? 0,
      bias: diag?.bias ?? { x: 0, y: 0, z: 0 },
      lastError: this.lastError,
    };
    this.store.getState().applySnapshot(snapshot);
  }
}
