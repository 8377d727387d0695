/**
 * Pipeline configuration: defaults plus range checks.
 *
 * Callers pass a partial; anything omitted comes from DEFAULT_PIPELINE_CONFIG.
 */

import { ConfigError } from "./errors";
import type { ChecksumPolicy } from "./connection/checksum";
import { isSensorFormat, type SensorFormat } from "./connection/SensorFormat";
import {
  DEFAULT_FILTER_PARAMS,
  type ComplementaryFilterParams,
} from "./fusion/ComplementaryFilter";
import {
  DEFAULT_VALIDATOR_PARAMS,
  type ValidatorParams,
} from "./math/quaternionValidator";

export interface DecoderConfig {
  checksum: ChecksumPolicy;
  maxLineLength: number;
}

export interface ChannelConfig {
  capacity: number;
}

export interface PipelineConfig {
  format: SensorFormat;
  filter: ComplementaryFilterParams;
  validator: ValidatorParams;
  channel: ChannelConfig;
  decoder: DecoderConfig;
  /** Sleep between empty reads, ms */
  idleDelayMs: number;
}

export interface PipelineConfigInput {
  format?: SensorFormat;
  filter?: Partial<ComplementaryFilterParams>;
  validator?: Partial<ValidatorParams>;
  channel?: Partial<ChannelConfig>;
  decoder?: Partial<DecoderConfig>;
  idleDelayMs?: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  format: "AsciiQuaternion",
  filter: DEFAULT_FILTER_PARAMS,
  validator: DEFAULT_VALIDATOR_PARAMS,
  channel: { capacity: 1 },
  decoder: { checksum: "sum16", maxLineLength: 1000 },
  idleDelayMs: 5,
};

const CHECKSUM_NAMES: readonly string[] = ["sum16", "xor8", "xor16", "none"];

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `must be a finite number > 0, got ${value}`);
  }
}

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(field, `must be an integer >= ${min}, got ${value}`);
  }
}

export function resolvePipelineConfig(
  input: PipelineConfigInput = {},
): PipelineConfig {
  const config: PipelineConfig = {
    format: input.format ?? DEFAULT_PIPELINE_CONFIG.format,
    filter: { ...DEFAULT_PIPELINE_CONFIG.filter, ...input.filter },
    validator: { ...DEFAULT_PIPELINE_CONFIG.validator, ...input.validator },
    channel: { ...DEFAULT_PIPELINE_CONFIG.channel, ...input.channel },
    decoder: { ...DEFAULT_PIPELINE_CONFIG.decoder, ...input.decoder },
    idleDelayMs: input.idleDelayMs ?? DEFAULT_PIPELINE_CONFIG.idleDelayMs,
  };

  if (!isSensorFormat(config.format)) {
    throw new ConfigError("format", `unknown sensor format "${config.format}"`);
  }

  const { filter, validator, channel, decoder } = config;
  if (!(filter.alpha > 0 && filter.alpha < 1)) {
    throw new ConfigError("filter.alpha", `must be in (0, 1), got ${filter.alpha}`);
  }
  requireInteger("filter.calibrationSamples", filter.calibrationSamples, 1);
  requirePositive("filter.accelTolerance", filter.accelTolerance);
  requirePositive("filter.gravity", filter.gravity);
  requirePositive("filter.maxDt", filter.maxDt);

  requirePositive("validator.maxNormDeviation", validator.maxNormDeviation);
  if (validator.maxNormDeviation >= 1) {
    // A band reaching down to zero norm would accept the degenerate quaternion
    throw new ConfigError(
      "validator.maxNormDeviation",
      `must be < 1, got ${validator.maxNormDeviation}`,
    );
  }
  requirePositive("validator.epsilon", validator.epsilon);

  requireInteger("channel.capacity", channel.capacity, 1);
  requireInteger("decoder.maxLineLength", decoder.maxLineLength, 1);
  if (
    typeof decoder.checksum === "string" &&
    !CHECKSUM_NAMES.includes(decoder.checksum)
  ) {
    throw new ConfigError(
      "decoder.checksum",
      `unknown checksum policy "${decoder.checksum}"`,
    );
  }

  if (!Number.isFinite(config.idleDelayMs) || config.idleDelayMs < 0) {
    throw new ConfigError(
      "idleDelayMs",
      `must be a finite number >= 0, got ${config.idleDelayMs}`,
    );
  }

  return config;
}
