import type { Quaternion } from "../math/quaternion";

/**
 * Serial record formats. Fixed per decoder instance; never switched mid-stream.
 *
 * - AsciiQuaternion:          "w,x,y,z\n"
 * - AsciiSixAxis:             "ax,ay,az,gx,gy,gz\n"  (m/s², deg/s)
 * - BinaryFloat32Quaternion:  4 × float32 LE (w,x,y,z) = 16 bytes
 * - BinaryFloat64Quaternion:  4 × float64 LE (w,x,y,z) = 32 bytes
 * - FramedCustomQuaternion:   [55 AA][4 × float32 LE][checksum uint16 LE] = 20 bytes
 */
export type SensorFormat =
  | "AsciiQuaternion"
  | "AsciiSixAxis"
  | "BinaryFloat32Quaternion"
  | "BinaryFloat64Quaternion"
  | "FramedCustomQuaternion";

export const SENSOR_FORMATS: readonly SensorFormat[] = [
  "AsciiQuaternion",
  "AsciiSixAxis",
  "BinaryFloat32Quaternion",
  "BinaryFloat64Quaternion",
  "FramedCustomQuaternion",
];

export function isSensorFormat(value: string): value is SensorFormat {
  return SENSOR_FORMATS.some((format) => format === value);
}

// Framed custom format layout
export const FRAME_HEADER = 0xaa55; // read as uint16 LE → wire bytes 0x55, 0xAA
export const FRAME_HEADER_SIZE = 2;
export const FRAME_PAYLOAD_SIZE = 16;
export const FRAME_CHECKSUM_SIZE = 2;
export const FRAME_SIZE =
  FRAME_HEADER_SIZE + FRAME_PAYLOAD_SIZE + FRAME_CHECKSUM_SIZE;

export const FLOAT32_RECORD_SIZE = 16;
export const FLOAT64_RECORD_SIZE = 32;

/**
 * Raw components as decoded. Not yet validated or normalized.
 */
export interface QuaternionRecord {
  type: "quaternion";
  w: number;
  x: number;
  y: number;
  z: number;
  /** Arrival time, seconds */
  timestamp: number;
}

export interface SixAxisSample {
  type: "six-axis";
  /** Accelerometer [x, y, z] in m/s² */
  accel: readonly [number, number, number];
  /** Gyroscope [x, y, z] in deg/s */
  gyro: readonly [number, number, number];
  /** Arrival time, seconds */
  timestamp: number;
}

export type SensorRecord = QuaternionRecord | SixAxisSample;

/** Validated, offset-applied output handed to consumers. */
export interface OrientationSample {
  readonly quaternion: Quaternion;
  /** Seconds (arrival time of the record that produced it) */
  readonly timestamp: number;
  /** Monotonic publish counter, starts at 1 */
  readonly sequence: number;
}
