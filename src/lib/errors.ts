/**
 * Pipeline error kinds.
 *
 * Every kind except SensorDisconnected is local to one record: it is counted,
 * logged (rate-limited) and decoding continues with the next byte or sample.
 */

export type PipelineErrorKind =
  | "InsufficientData"
  | "MalformedRecord"
  | "ChecksumMismatch"
  | "InvalidQuaternion"
  | "SensorDisconnected";

export type RecoverableErrorKind = Exclude<
  PipelineErrorKind,
  "SensorDisconnected"
>;

export interface RecordError {
  kind: RecoverableErrorKind;
  message: string;
}

/**
 * Raised by the ingestion role when the byte source ends or fails.
 * The last published orientation stays readable on the channel.
 */
export class SensorDisconnectedError extends Error {
  readonly kind = "SensorDisconnected" as const;

  constructor(message = "Sensor disconnected", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SensorDisconnectedError";
  }
}

/** Thrown by resolvePipelineConfig for out-of-range settings. */
export class ConfigError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = "ConfigError";
  }
}
