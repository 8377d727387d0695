/**
 * Wire encoders, the inverse of FrameDecoder. Used to replay recorded
 * orientation data and to build synthetic streams.
 */

import { resolveChecksum, type ChecksumPolicy } from "./checksum";
import {
  FLOAT32_RECORD_SIZE,
  FLOAT64_RECORD_SIZE,
  FRAME_HEADER,
  FRAME_HEADER_SIZE,
  FRAME_PAYLOAD_SIZE,
  FRAME_SIZE,
  type QuaternionRecord,
  type SensorFormat,
  type SixAxisSample,
} from "./SensorFormat";

type QuaternionComponents = Pick<QuaternionRecord, "w" | "x" | "y" | "z">;
type SixAxisComponents = Pick<SixAxisSample, "accel" | "gyro">;

const encoder = new TextEncoder();

export function encodeAsciiQuaternion(q: QuaternionComponents): Uint8Array {
  return encoder.encode(`${q.w},${q.x},${q.y},${q.z}\n`);
}

export function encodeAsciiSixAxis(s: SixAxisComponents): Uint8Array {
  return encoder.encode(`${[...s.accel, ...s.gyro].join(",")}\n`);
}

export function encodeBinaryFloat32(q: QuaternionComponents): Uint8Array {
  const out = new Uint8Array(FLOAT32_RECORD_SIZE);
  const view = new DataView(out.buffer);
  view.setFloat32(0, q.w, true);
  view.setFloat32(4, q.x, true);
  view.setFloat32(8, q.y, true);
  view.setFloat32(12, q.z, true);
  return out;
}

export function encodeBinaryFloat64(q: QuaternionComponents): Uint8Array {
  const out = new Uint8Array(FLOAT64_RECORD_SIZE);
  const view = new DataView(out.buffer);
  view.setFloat64(0, q.w, true);
  view.setFloat64(8, q.x, true);
  view.setFloat64(16, q.y, true);
  view.setFloat64(24, q.z, true);
  return out;
}

export function encodeFramed(
  q: QuaternionComponents,
  checksum: ChecksumPolicy = "sum16",
): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  const view = new DataView(out.buffer);
  view.setUint16(0, FRAME_HEADER, true);
  view.setFloat32(2, q.w, true);
  view.setFloat32(6, q.x, true);
  view.setFloat32(10, q.y, true);
  view.setFloat32(14, q.z, true);
  const fn = resolveChecksum(checksum);
  const checked = FRAME_HEADER_SIZE + FRAME_PAYLOAD_SIZE;
  view.setUint16(checked, fn ? fn(out.subarray(0, checked)) & 0xffff : 0, true);
  return out;
}

/** Encode one record in the given wire format. */
export function encodeFrame(
  format: "AsciiSixAxis",
  record: SixAxisComponents,
): Uint8Array;
export function encodeFrame(
  format: Exclude<SensorFormat, "AsciiSixAxis">,
  record: QuaternionComponents,
  checksum?: ChecksumPolicy,
): Uint8Array;
export function encodeFrame(
  format: SensorFormat,
  record: QuaternionComponents | SixAxisComponents,
  checksum: ChecksumPolicy = "sum16",
): Uint8Array {
  if ("accel" in record) {
    if (format !== "AsciiSixAxis") {
      throw new TypeError(`${format} carries quaternions, not 6-axis samples`);
    }
    return encodeAsciiSixAxis(record);
  }
  switch (format) {
    case "AsciiQuaternion":
      return encodeAsciiQuaternion(record);
    case "BinaryFloat32Quaternion":
      return encodeBinaryFloat32(record);
    case "BinaryFloat64Quaternion":
      return encodeBinaryFloat64(record);
    case "FramedCustomQuaternion":
      return encodeFramed(record, checksum);
    case "AsciiSixAxis":
      throw new TypeError("AsciiSixAxis needs accel and gyro");
  }
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
