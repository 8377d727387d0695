/**
 * FrameDecoder - turns an arbitrary serial byte stream into sensor records.
 *
 * PROTOCOL SPECIFICATION: see SensorFormat.ts for the five wire layouts.
 *
 * Every call to next() does exactly one of:
 *   - yields one record
 *   - reports "need-more" (not an error: wait for the next chunk)
 *   - reports a recoverable malformed record / checksum mismatch, after
 *     having consumed at least one byte, so repeated calls always progress
 *
 * One decode function per format, selected once at construction.
 */

import type { RecordError } from "../errors";
import { createRateLimiter, decoderLog } from "../logger";
import { resolveChecksum, type ChecksumFunction, type ChecksumPolicy } from "./checksum";
import { RingBuffer } from "./RingBuffer";
import {
  FLOAT32_RECORD_SIZE,
  FLOAT64_RECORD_SIZE,
  FRAME_HEADER_SIZE,
  FRAME_PAYLOAD_SIZE,
  FRAME_SIZE,
  type SensorFormat,
  type SensorRecord,
} from "./SensorFormat";

export type DecodeStep =
  | { kind: "record"; record: SensorRecord }
  | { kind: "need-more" }
  | { kind: "malformed"; error: RecordError }
  | { kind: "checksum-mismatch"; error: RecordError };

export interface FrameDecoderOptions {
  /** Framed format only (default "sum16") */
  checksum: ChecksumPolicy;
  /** ASCII formats: bytes buffered without a terminator before the line is dropped */
  maxLineLength: number;
  bufferSize: number;
  /** Arrival clock in seconds */
  now: () => number;
}

export interface DecoderStats {
  /** Bytes handed to push() */
  bytesReceived: number;
  records: number;
  malformed: number;
  checksumMismatches: number;
  /** Bytes dropped while hunting for a frame header */
  skippedBytes: number;
  overflowBytes: number;
}

const DEFAULT_OPTIONS: FrameDecoderOptions = {
  checksum: "sum16",
  maxLineLength: 1000,
  bufferSize: 16384,
  now: () => performance.now() / 1000,
};

const LF = 0x0a;
const CR = 0x0d;
const HEADER_LO = 0x55;
const HEADER_HI = 0xaa;

// Plain decimal with optional exponent. Rejects "", "0x10", "Infinity", "nan".
const NUMERIC_FIELD = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

interface DecoderState {
  ring: RingBuffer;
  options: FrameDecoderOptions;
  checksum: ChecksumFunction | null;
  stats: DecoderStats;
}

type FormatDecoder = (state: DecoderState) => DecodeStep;

const NEED_MORE: DecodeStep = { kind: "need-more" };

function malformed(message: string): DecodeStep {
  return { kind: "malformed", error: { kind: "MalformedRecord", message } };
}

// ============================================================================
// ASCII
// ============================================================================

function bytesToText(bytes: Uint8Array): string {
  let text = "";
  for (let i = 0; i < bytes.length; i++) {
    text += String.fromCharCode(bytes[i]);
  }
  return text;
}

/**
 * Consume the next non-blank line. Accepts \n, \r\n and bare \r.
 */
function takeLine(state: DecoderState): string | DecodeStep {
  const { ring, options } = state;
  for (;;) {
    const end = ring.findIndex((b) => b === LF || b === CR);
    if (end === -1) {
      if (ring.length > options.maxLineLength) {
        const dropped = ring.length;
        ring.skip(dropped);
        return malformed(
          `no line terminator within ${options.maxLineLength} bytes (dropped ${dropped})`,
        );
      }
      return NEED_MORE;
    }

    const text = bytesToText(ring.read(end)).trim();
    const terminator = ring.peekByte(0);
    ring.skip(1);
    // A \n still in flight after \r arrives as a blank line next time
    if (terminator === CR && ring.length > 0 && ring.peekByte(0) === LF) {
      ring.skip(1);
    }
    if (text.length > 0) return text;
  }
}

function parseFields(line: string, expected: number): number[] | string {
  const parts = line.split(",");
  if (parts.length !== expected) {
    return `expected ${expected} fields, got ${parts.length}: "${line.slice(0, 80)}"`;
  }
  const values: number[] = [];
  for (const part of parts) {
    const field = part.trim();
    if (!NUMERIC_FIELD.test(field)) {
      return `non-numeric field "${field.slice(0, 20)}" in "${line.slice(0, 80)}"`;
    }
    values.push(Number(field));
  }
  return values;
}

function decodeAsciiQuaternion(state: DecoderState): DecodeStep {
  const line = takeLine(state);
  if (typeof line !== "string") return line;
  const fields = parseFields(line, 4);
  if (typeof fields === "string") return malformed(fields);
  const [w, x, y, z] = fields;
  return {
    kind: "record",
    record: { type: "quaternion", w, x, y, z, timestamp: state.options.now() },
  };
}

function decodeAsciiSixAxis(state: DecoderState): DecodeStep {
  const line = takeLine(state);
  if (typeof line !== "string") return line;
  const fields = parseFields(line, 6);
  if (typeof fields === "string") return malformed(fields);
  const [ax, ay, az, gx, gy, gz] = fields;
  return {
    kind: "record",
    record: {
      type: "six-axis",
      accel: [ax, ay, az],
      gyro: [gx, gy, gz],
      timestamp: state.options.now(),
    },
  };
}

// ============================================================================
// FIXED-WIDTH BINARY
// ============================================================================

function decodeBinaryFloat32(state: DecoderState): DecodeStep {
  if (state.ring.length < FLOAT32_RECORD_SIZE) return NEED_MORE;
  const bytes = state.ring.read(FLOAT32_RECORD_SIZE);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    kind: "record",
    record: {
      type: "quaternion",
      w: view.getFloat32(0, true),
      x: view.getFloat32(4, true),
      y: view.getFloat32(8, true),
      z: view.getFloat32(12, true),
      timestamp: state.options.now(),
    },
  };
}

function decodeBinaryFloat64(state: DecoderState): DecodeStep {
  if (state.ring.length < FLOAT64_RECORD_SIZE) return NEED_MORE;
  const bytes = state.ring.read(FLOAT64_RECORD_SIZE);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    kind: "record",
    record: {
      type: "quaternion",
      w: view.getFloat64(0, true),
      x: view.getFloat64(8, true),
      y: view.getFloat64(16, true),
      z: view.getFloat64(24, true),
      timestamp: state.options.now(),
    },
  };
}

// ============================================================================
// FRAMED CUSTOM (0xAA55 header + payload + checksum)
// ============================================================================

function decodeFramed(state: DecoderState): DecodeStep {
  const { ring } = state;
  for (;;) {
    if (ring.length < FRAME_HEADER_SIZE) return NEED_MORE;
    if (ring.peekByte(0) !== HEADER_LO || ring.peekByte(1) !== HEADER_HI) {
      ring.skip(1);
      state.stats.skippedBytes++;
      continue;
    }
    if (ring.length < FRAME_SIZE) return NEED_MORE;

    const frame = ring.peek(0, FRAME_SIZE);
    const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
    const checked = FRAME_HEADER_SIZE + FRAME_PAYLOAD_SIZE;

    if (state.checksum) {
      const expected = view.getUint16(checked, true);
      const computed = state.checksum(frame.subarray(0, checked)) & 0xffff;
      if (computed !== expected) {
        // Drop only the header's first byte: the real frame may start inside
        ring.skip(1);
        return {
          kind: "checksum-mismatch",
          error: {
            kind: "ChecksumMismatch",
            message: `expected=0x${expected.toString(16).padStart(4, "0")} computed=0x${computed.toString(16).padStart(4, "0")}`,
          },
        };
      }
    }

    ring.skip(FRAME_SIZE);
    return {
      kind: "record",
      record: {
        type: "quaternion",
        w: view.getFloat32(2, true),
        x: view.getFloat32(6, true),
        y: view.getFloat32(10, true),
        z: view.getFloat32(14, true),
        timestamp: state.options.now(),
      },
    };
  }
}

const DECODERS: Record<SensorFormat, FormatDecoder> = {
  AsciiQuaternion: decodeAsciiQuaternion,
  AsciiSixAxis: decodeAsciiSixAxis,
  BinaryFloat32Quaternion: decodeBinaryFloat32,
  BinaryFloat64Quaternion: decodeBinaryFloat64,
  FramedCustomQuaternion: decodeFramed,
};

function emptyStats(): DecoderStats {
  return {
    bytesReceived: 0,
    records: 0,
    malformed: 0,
    checksumMismatches: 0,
    skippedBytes: 0,
    overflowBytes: 0,
  };
}

export class FrameDecoder {
  readonly format: SensorFormat;
  private readonly state: DecoderState;
  private readonly decodeNext: FormatDecoder;
  private readonly shouldLogMalformed = createRateLimiter(2000);
  private readonly shouldLogChecksum = createRateLimiter(2000);

  constructor(format: SensorFormat, options?: Partial<FrameDecoderOptions>) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.format = format;
    this.decodeNext = DECODERS[format];
    this.state = {
      ring: new RingBuffer(resolved.bufferSize),
      options: resolved,
      checksum: resolveChecksum(resolved.checksum),
      stats: emptyStats(),
    };
  }

  /**
   * Append newly arrived bytes. A chunk larger than `freeSpace` pushes the
   * oldest buffered bytes out; callers that must not lose data push at most
   * `freeSpace` bytes between decode passes.
   */
  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.state.stats.bytesReceived += chunk.length;
    this.state.ring.write(chunk);
    const overflow = this.state.ring.drainOverflowStats();
    if (overflow.bytes > 0) {
      this.state.stats.overflowBytes += overflow.bytes;
      decoderLog.warn(
        `Input buffer overflow: dropped ${overflow.bytes} oldest bytes (${this.format})`,
      );
    }
  }

  next(): DecodeStep {
    const step = this.decodeNext(this.state);
    const { stats } = this.state;
    switch (step.kind) {
      case "record":
        stats.records++;
        break;
      case "malformed":
        stats.malformed++;
        if (this.shouldLogMalformed()) {
          decoderLog.warn(
            `Malformed record dropped (count=${stats.malformed}): ${step.error.message}`,
          );
        }
        break;
      case "checksum-mismatch":
        stats.checksumMismatches++;
        if (this.shouldLogChecksum()) {
          decoderLog.warn(
            `Checksum mismatch (count=${stats.checksumMismatches}): ${step.error.message}`,
          );
        }
        break;
      case "need-more":
        break;
    }
    return step;
  }

  /**
   * Lazily yields every record currently decodable, skipping recoverable
   * errors, and stops at "need-more".
   */
  *records(): Generator<SensorRecord, void, undefined> {
    for (;;) {
      const step = this.next();
      if (step.kind === "need-more") return;
      if (step.kind === "record") yield step.record;
    }
  }

  /** Bytes buffered but not yet consumed */
  get pending(): number {
    return this.state.ring.length;
  }

  /** Bytes that can be pushed without overwriting buffered input */
  get freeSpace(): number {
    return this.state.ring.size - this.state.ring.length;
  }

  /** Discard partial frames (new session / cancellation). Stats are kept. */
  reset(): void {
    this.state.ring.clear();
  }

  getStats(): DecoderStats {
    return { ...this.state.stats };
  }
}
