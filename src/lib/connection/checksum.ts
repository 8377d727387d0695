/**
 * Checksum policies for the framed custom format.
 *
 * The checksum covers header + payload (18 bytes) and is stored as a
 * little-endian uint16 right after the payload. Which algorithm the firmware
 * uses varies between builds, so the policy is selected per decoder.
 */

export type ChecksumFunction = (bytes: Uint8Array) => number;

export type ChecksumPolicy = "sum16" | "xor8" | "xor16" | "none" | ChecksumFunction;

/** Byte sum truncated to 16 bits. */
export function sum16(bytes: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < bytes.length; i++) {
    sum = (sum + bytes[i]) & 0xffff;
  }
  return sum;
}

/** XOR of all bytes (upper byte always zero). */
export function xor8(bytes: Uint8Array): number {
  let acc = 0;
  for (let i = 0; i < bytes.length; i++) {
    acc ^= bytes[i];
  }
  return acc;
}

/** XOR of little-endian 16-bit words; a trailing odd byte is the low byte. */
export function xor16(bytes: Uint8Array): number {
  let acc = 0;
  for (let i = 0; i < bytes.length; i += 2) {
    const lo = bytes[i];
    const hi = i + 1 < bytes.length ? bytes[i + 1] : 0;
    acc ^= lo | (hi << 8);
  }
  return acc & 0xffff;
}

/**
 * Returns null for "none": frames are accepted on header alone.
 */
export function resolveChecksum(
  policy: ChecksumPolicy,
): ChecksumFunction | null {
  if (typeof policy === "function") return policy;
  switch (policy) {
    case "sum16":
      return sum16;
    case "xor8":
      return xor8;
    case "xor16":
      return xor16;
    case "none":
      return null;
  }
}
