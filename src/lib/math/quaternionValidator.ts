/**
 * Quaternion validation and normalization.
 *
 * Small norm deviations (sensor quantization, float32 rounding) are absorbed
 * by normalizing. Anything further than `maxNormDeviation` from unit norm is
 * treated as corrupt data and rejected instead of being silently rescaled.
 */

import type { RecordError } from "../errors";
import { quat, type Quaternion } from "./quaternion";

export interface ValidatorParams {
  /** Hard rejection band: accepted norms lie in [1 - δ, 1 + δ] */
  maxNormDeviation: number;
  /** Post-normalization tolerance on |q| */
  epsilon: number;
}

export const DEFAULT_VALIDATOR_PARAMS: ValidatorParams = {
  maxNormDeviation: 0.5,
  epsilon: 1e-3,
};

export type ValidationResult =
  | { ok: true; quaternion: Quaternion; norm: number }
  | { ok: false; error: RecordError };

function reject(message: string): ValidationResult {
  return { ok: false, error: { kind: "InvalidQuaternion", message } };
}

/**
 * Pure: same input → same output, no shared state.
 */
export function validateQuaternion(
  w: number,
  x: number,
  y: number,
  z: number,
  params: ValidatorParams = DEFAULT_VALIDATOR_PARAMS,
): ValidationResult {
  if (
    !Number.isFinite(w) ||
    !Number.isFinite(x) ||
    !Number.isFinite(y) ||
    !Number.isFinite(z)
  ) {
    return reject(`non-finite component (${w}, ${x}, ${y}, ${z})`);
  }

  const n = Math.sqrt(w * w + x * x + y * y + z * z);
  if (n === 0) {
    return reject("zero norm");
  }
  if (
    n < 1 - params.maxNormDeviation ||
    n > 1 + params.maxNormDeviation
  ) {
    return reject(
      `norm ${n.toFixed(4)} outside [${1 - params.maxNormDeviation}, ${1 + params.maxNormDeviation}]`,
    );
  }

  const q = quat(w / n, x / n, y / n, z / n);
  const check = Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
  if (Math.abs(check - 1) > params.epsilon) {
    return reject(`normalization residual ${Math.abs(check - 1)}`);
  }
  return { ok: true, quaternion: q, norm: n };
}

export function validate(
  q: Quaternion,
  params: ValidatorParams = DEFAULT_VALIDATOR_PARAMS,
): ValidationResult {
  return validateQuaternion(q.w, q.x, q.y, q.z, params);
}
