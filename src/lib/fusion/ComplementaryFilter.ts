import * as THREE from "three";
import type { RecordError } from "../errors";
import { filterLog } from "../logger";
import {
  fromThree,
  IDENTITY,
  type Quaternion,
} from "../math/quaternion";
import {
  DEFAULT_VALIDATOR_PARAMS,
  validateQuaternion,
  type ValidatorParams,
} from "../math/quaternionValidator";
import type { SixAxisSample } from "../connection/SensorFormat";

/**
 * Complementary Filter: 6-Axis IMU Fusion
 *
 * Produces orientation from accelerometer + gyroscope (no magnetometer).
 *
 * Architecture:
 *   1. Stationary gyro bias calibration (first N samples, identity output)
 *   2. Bias-corrected gyro integration: q_gyro = q ⊗ Δq(ω·dt)
 *   3. Gravity tilt (roll/pitch) from the accelerometer, only when |a| is
 *      inside the gravity band; otherwise pure gyro integration
 *   4. Blend: q = normalize(α·q_gyro + (1-α)·q_accel)
 *   5. Validation/normalization before the state is stored
 *
 * Yaw is unobservable from gravity. The accel reference carries the gyro
 * yaw, so only roll and pitch are corrected; yaw drifts with residual bias.
 *
 * Zero inner-loop allocations via object pooling.
 */

export interface ComplementaryFilterParams {
  /** Gyro weight in (0, 1) */
  alpha: number;
  /** Stationary samples used to estimate gyro bias */
  calibrationSamples: number;
  /** Accepted |a| band as a fraction of gravity (0.1 = ±10%) */
  accelTolerance: number;
  /** m/s² */
  gravity: number;
  /** Upper bound on the integration step, seconds */
  maxDt: number;
  /** Start from the calibration window's mean tilt instead of identity */
  alignOnCalibration: boolean;
}

export const DEFAULT_FILTER_PARAMS: ComplementaryFilterParams = {
  alpha: 0.98,
  calibrationSamples: 100,
  accelTolerance: 0.1,
  gravity: 9.81,
  maxDt: 0.5,
  alignOnCalibration: true,
};

export type FilterStep =
  | { status: "calibrating"; quaternion: Quaternion; progress: number }
  | { status: "fused"; quaternion: Quaternion; accelUsed: boolean }
  | { status: "rejected"; error: RecordError };

export interface FilterDiagnostics {
  updateCount: number;
  accelSkippedCount: number;
  rejectedCount: number;
  /** deg/s */
  bias: { x: number; y: number; z: number };
  calibrating: boolean;
  calibrationProgress: number;
  alpha: number;
}

// ─── PHYSICAL CONSTANTS ───
const DEG2RAD = Math.PI / 180;

// ─── DIAGNOSTIC LOG INTERVAL ───
const DIAG_INTERVAL = 1000; // updates

export class ComplementaryFilter {
  // ─── State ───
  private quat = new THREE.Quaternion(0, 0, 0, 1);
  private bias = new THREE.Vector3(0, 0, 0); // deg/s
  private lastTimestamp: number | null = null;

  // ─── Calibration ───
  private calibrating = true;
  private hasCalibrated = false;
  private calibrationCount = 0;
  private gyroAccum = new THREE.Vector3();
  private accelAccum = new THREE.Vector3();

  // ─── Config ───
  private params: ComplementaryFilterParams;
  private readonly validatorParams: ValidatorParams;

  // ─── Diagnostics ───
  private _updateCount = 0;
  private _accelSkipped = 0;
  private _rejected = 0;

  // ─── Object pool (zero allocations in hot loop) ───
  private _gyroStep = new THREE.Vector3();
  private _quatStep = new THREE.Quaternion();
  private _gyroQuat = new THREE.Quaternion();
  private _accelQuat = new THREE.Quaternion();
  private _euler = new THREE.Euler(0, 0, 0, "ZYX");

  constructor(
    params?: Partial<ComplementaryFilterParams>,
    validatorParams: ValidatorParams = DEFAULT_VALIDATOR_PARAMS,
  ) {
    this.params = { ...DEFAULT_FILTER_PARAMS, ...params };
    this.validatorParams = validatorParams;
    ComplementaryFilter.assertAlpha(this.params.alpha);
    if (
      !Number.isInteger(this.params.calibrationSamples) ||
      this.params.calibrationSamples < 1
    ) {
      throw new RangeError(
        `calibrationSamples must be an integer >= 1, got ${this.params.calibrationSamples}`,
      );
    }
  }

  /**
   * Consume one sample in arrival order.
   * Gyro in deg/s, accel in m/s², timestamp in seconds.
   */
  update(sample: SixAxisSample): FilterStep {
    const [ax, ay, az] = sample.accel;
    const [gx, gy, gz] = sample.gyro;
    if (
      !Number.isFinite(ax) ||
      !Number.isFinite(ay) ||
      !Number.isFinite(az) ||
      !Number.isFinite(gx) ||
      !Number.isFinite(gy) ||
      !Number.isFinite(gz)
    ) {
      this._rejected++;
      return {
        status: "rejected",
        error: { kind: "InvalidQuaternion", message: "non-finite 6-axis input" },
      };
    }

    // Committed only once the sample is consumed; a rejected update leaves no trace
    const dt = this.computeDt(sample.timestamp);

    // ── STAGE 1: CALIBRATION ──
    if (this.calibrating) {
      this.commitTimestamp(sample.timestamp);
      return this.accumulateCalibration(gx, gy, gz, ax, ay, az);
    }

    // ── STAGE 2: GYRO INTEGRATION ──
    this._gyroStep.set(
      (gx - this.bias.x) * DEG2RAD,
      (gy - this.bias.y) * DEG2RAD,
      (gz - this.bias.z) * DEG2RAD,
    );
    this._gyroQuat.copy(this.quat);
    const angle = this._gyroStep.length() * dt;
    if (angle > 0) {
      this._gyroStep.normalize();
      this._quatStep.setFromAxisAngle(this._gyroStep, angle);
      this._gyroQuat.multiply(this._quatStep);
    }

    // ── STAGE 3: ACCEL TILT ──
    const accelUsed = this.accelTilt(ax, ay, az, this._gyroQuat);

    // ── STAGE 4: BLEND ──
    let w = this._gyroQuat.w;
    let x = this._gyroQuat.x;
    let y = this._gyroQuat.y;
    let z = this._gyroQuat.z;
    if (accelUsed) {
      const a = this._accelQuat;
      // q and -q are the same rotation; blend on the same hemisphere
      const sign = this._gyroQuat.dot(a) < 0 ? -1 : 1;
      const alpha = this.params.alpha;
      w = alpha * w + (1 - alpha) * sign * a.w;
      x = alpha * x + (1 - alpha) * sign * a.x;
      y = alpha * y + (1 - alpha) * sign * a.y;
      z = alpha * z + (1 - alpha) * sign * a.z;
    } else {
      this._accelSkipped++;
    }

    // ── STAGE 5: VALIDATE + STORE ──
    const result = validateQuaternion(w, x, y, z, this.validatorParams);
    if (!result.ok) {
      this._rejected++;
      return { status: "rejected", error: result.error };
    }
    const q = result.quaternion;
    this.quat.set(q.x, q.y, q.z, q.w);
    this.commitTimestamp(sample.timestamp);
    this._updateCount++;

    if (this._updateCount % DIAG_INTERVAL === 0) {
      filterLog.debug(
        `updates=${this._updateCount} accelSkipped=${this._accelSkipped} rejected=${this._rejected}`,
      );
    }

    return { status: "fused", quaternion: q, accelUsed };
  }

  /**
   * Restart bias estimation. The orientation estimate is kept and held
   * (not integrated) until the new bias is ready.
   */
  recalibrate(): void {
    this.calibrating = true;
    this.calibrationCount = 0;
    this.gyroAccum.set(0, 0, 0);
    this.accelAccum.set(0, 0, 0);
    filterLog.info("Recalibration requested, keep the sensor still");
  }

  setAlpha(alpha: number): void {
    ComplementaryFilter.assertAlpha(alpha);
    this.params = { ...this.params, alpha };
    filterLog.info(`alpha set to ${alpha}`);
  }

  getQuaternion(): Quaternion {
    return fromThree(this.quat);
  }

  /** deg/s */
  getBias(): { x: number; y: number; z: number } {
    return { x: this.bias.x, y: this.bias.y, z: this.bias.z };
  }

  isCalibrating(): boolean {
    return this.calibrating;
  }

  getDiagnostics(): FilterDiagnostics {
    return {
      updateCount: this._updateCount,
      accelSkippedCount: this._accelSkipped,
      rejectedCount: this._rejected,
      bias: this.getBias(),
      calibrating: this.calibrating,
      calibrationProgress:
        this.calibrationCount / this.params.calibrationSamples,
      alpha: this.params.alpha,
    };
  }

  private computeDt(timestamp: number): number {
    const last = this.lastTimestamp;
    if (!Number.isFinite(timestamp) || last === null) return 0;
    const dt = timestamp - last;
    if (dt <= 0) return 0;
    return Math.min(dt, this.params.maxDt);
  }

  private commitTimestamp(timestamp: number): void {
    if (Number.isFinite(timestamp)) this.lastTimestamp = timestamp;
  }

  private accumulateCalibration(
    gx: number,
    gy: number,
    gz: number,
    ax: number,
    ay: number,
    az: number,
  ): FilterStep {
    this.gyroAccum.x += gx;
    this.gyroAccum.y += gy;
    this.gyroAccum.z += gz;
    this.accelAccum.x += ax;
    this.accelAccum.y += ay;
    this.accelAccum.z += az;
    this.calibrationCount++;

    const n = this.params.calibrationSamples;
    // Initial calibration shows identity; a recalibration holds the estimate
    const output = this.hasCalibrated ? fromThree(this.quat) : IDENTITY;

    if (this.calibrationCount >= n) {
      this.bias.copy(this.gyroAccum).divideScalar(this.calibrationCount);
      if (!this.hasCalibrated && this.params.alignOnCalibration) {
        const mean = this.accelAccum.divideScalar(this.calibrationCount);
        if (this.accelTilt(mean.x, mean.y, mean.z, this.quat)) {
          this.quat.copy(this._accelQuat);
        }
      }
      this.calibrating = false;
      this.hasCalibrated = true;
      filterLog.info(
        `Gyro calibration complete: bias x=${this.bias.x.toFixed(3)} y=${this.bias.y.toFixed(3)} z=${this.bias.z.toFixed(3)} deg/s`,
      );
    }

    return {
      status: "calibrating",
      quaternion: output,
      progress: Math.min(1, this.calibrationCount / n),
    };
  }

  /**
   * Fill _accelQuat with the gravity tilt (roll, pitch) and the yaw of
   * `yawSource`. Returns false when |a| is outside the gravity band.
   */
  private accelTilt(
    ax: number,
    ay: number,
    az: number,
    yawSource: THREE.Quaternion,
  ): boolean {
    const mag = Math.sqrt(ax * ax + ay * ay + az * az);
    const g = this.params.gravity;
    if (mag === 0 || Math.abs(mag - g) > this.params.accelTolerance * g) {
      return false;
    }
    const roll = Math.atan2(ay, az);
    const pitch = Math.atan2(-ax, Math.sqrt(ay * ay + az * az));
    this._euler.setFromQuaternion(yawSource, "ZYX");
    const yaw = this._euler.z;
    this._euler.set(roll, pitch, yaw, "ZYX");
    this._accelQuat.setFromEuler(this._euler);
    return true;
  }

  private static assertAlpha(alpha: number): void {
    if (!(alpha > 0 && alpha < 1)) {
      throw new RangeError(`alpha must be in (0, 1), got ${alpha}`);
    }
  }
}
