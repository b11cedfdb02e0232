import { Box3, Vector3 } from "three";
import type { Vec3Like, Vec3Tuple } from "./types.js";

export const VERTEX_COUNT = 8;

export function toVector3(value: Vec3Like | Vec3Tuple): Vector3 {
  if (isVec3Tuple(value)) {
    return new Vector3(value[0], value[1], value[2]);
  }
  return new Vector3(value.x, value.y, value.z);
}

function isVec3Tuple(value: Vec3Like | Vec3Tuple): value is Vec3Tuple {
  return Array.isArray(value);
}

export function createBox(minimum: Vec3Like | Vec3Tuple, maximum: Vec3Like | Vec3Tuple): Box3 {
  return new Box3(toVector3(minimum), toVector3(maximum));
}

export function cubeAt(minimum: Vec3Like, size: number): Box3 {
  return new Box3(
    new Vector3(minimum.x, minimum.y, minimum.z),
    new Vector3(minimum.x + size, minimum.y + size, minimum.z + size)
  );
}

export function boxLongestSide(box: Box3): number {
  return Math.max(box.max.x - box.min.x, box.max.y - box.min.y, box.max.z - box.min.z);
}

/**
 * Corner of the box selected by the low three bits of `index`:
 * bit 0 picks the maximum x, bit 1 the maximum y, bit 2 the maximum z.
 */
export function boxVertex(box: Box3, index: number): Vector3 {
  return new Vector3(
    index & 1 ? box.max.x : box.min.x,
    index & 2 ? box.max.y : box.min.y,
    index & 4 ? box.max.z : box.min.z
  );
}

/**
 * Fraction of `box`'s volume covered by `region`. Zero (never negative) when
 * the two only touch or do not meet at all.
 */
export function overlapFraction(box: Box3, region: Box3): number {
  const sx = Math.min(box.max.x, region.max.x) - Math.max(box.min.x, region.min.x);
  const sy = Math.min(box.max.y, region.max.y) - Math.max(box.min.y, region.min.y);
  const sz = Math.min(box.max.z, region.max.z) - Math.max(box.min.z, region.min.z);
  if (sx <= 0 || sy <= 0 || sz <= 0) {
    return 0;
  }
  const volume = (box.max.x - box.min.x) * (box.max.y - box.min.y) * (box.max.z - box.min.z);
  return (sx * sy * sz) / volume;
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isFinite(value) && value > 0 && Number.isInteger(Math.log2(value));
}

export function assertPowerOfTwo(value: number, what: string): void {
  if (!isPowerOfTwo(value)) {
    throw new Error(`${what} must be a power of two, got ${value}`);
  }
}

export function assertFiniteBox(box: Box3, what: string): void {
  const coords = [box.min.x, box.min.y, box.min.z, box.max.x, box.max.y, box.max.z];
  if (!coords.every((c) => Number.isFinite(c))) {
    throw new Error(`${what} has non-finite coordinates: ${JSON.stringify({ min: box.min, max: box.max })}`);
  }
}

/** C-style rounding: halves go away from zero. */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}
