/**
 * Reset Offset (display reference)
 * ================================
 *
 * THE CONVENTION:
 *   output = reference⁻¹ × current
 *   where reference = orientation captured at the reset event
 *
 * The inverse is applied on the LEFT (world frame), the same way a heading
 * reference is removed: the pose at reset time maps to the identity and later
 * rotations are expressed relative to it.
 *
 * This never touches filter or decoder state. Clearing or resetting again is
 * always safe.
 *
 * @module resetOffset
 */

import * as THREE from "three";
import { offsetLog } from "../logger";
import {
  angleBetween,
  conjugate,
  fromThree,
  IDENTITY,
  multiply,
  toThree,
  type Quaternion,
} from "./quaternion";

/**
 * Compute the offset to store for a reset at this orientation.
 * For a unit quaternion the inverse is the conjugate.
 */
export function computeResetOffset(reference: Quaternion): Quaternion {
  return conjugate(reference);
}

/**
 * Apply a stored offset (from computeResetOffset) to an orientation.
 *
 * IMPORTANT: offset × current, NOT current × offset.
 */
export function applyResetOffset(
  current: Quaternion,
  offset: Quaternion,
): Quaternion {
  return multiply(offset, current);
}

/**
 * In-place variant for hot loops that already hold THREE instances.
 * Overwrites `current`.
 */
export function applyResetOffsetInPlace(
  current: THREE.Quaternion,
  offset: THREE.Quaternion,
): THREE.Quaternion {
  return current.premultiply(offset);
}

/**
 * True if offset × reference ≈ identity (< 0.06°).
 */
export function validateResetOffset(
  reference: Quaternion,
  offset: Quaternion,
): boolean {
  return angleBetween(applyResetOffset(reference, offset), IDENTITY) < 0.001;
}

/**
 * Owned reset state for one pipeline. Holds the conjugate of the reference
 * so apply() is a single multiplication.
 */
export class ResetOffset {
  private reference: Quaternion | null = null;
  private offset: Quaternion | null = null;
  private _offsetThree = new THREE.Quaternion();
  private _work = new THREE.Quaternion();
  private resetCount = 0;

  reset(current: Quaternion): void {
    this.reference = current;
    this.offset = computeResetOffset(current);
    toThree(this.offset, this._offsetThree);
    this.resetCount++;
    offsetLog.debug(
      `Reset #${this.resetCount}: reference w=${current.w.toFixed(3)} x=${current.x.toFixed(3)} y=${current.y.toFixed(3)} z=${current.z.toFixed(3)}`,
    );
  }

  clear(): void {
    if (this.reference) offsetLog.debug("Reset reference cleared");
    this.reference = null;
    this.offset = null;
  }

  /** Returns q unchanged when no reference is set. */
  apply(q: Quaternion): Quaternion {
    if (!this.offset) return q;
    toThree(q, this._work);
    applyResetOffsetInPlace(this._work, this._offsetThree);
    return fromThree(this._work);
  }

  getReference(): Quaternion | null {
    return this.reference;
  }

  isActive(): boolean {
    return this.reference !== null;
  }

  getResetCount(): number {
    return this.resetCount;
  }
}
