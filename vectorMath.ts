import { clamp } from './utils';

export type Vec3 = { x: number; y: number; z: number };
export type Quat = { x: number; y: number; z: number; w: number };

export const EPSILON = 1e-6;

export const vec3 = (x = 0, y = 0, z = 0): Vec3 => ({ x, y, z });
export const addVec = (a: Vec3, b: Vec3): Vec3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z });
export const subVec = (a: Vec3, b: Vec3): Vec3 => ({ x: a.x - b.x, y: a.y - b.y, z: a.z - b.z });
export const scaleVec = (v: Vec3, s: number): Vec3 => ({ x: v.x * s, y: v.y * s, z: v.z * s });
export const dotVec = (a: Vec3, b: Vec3): number => a.x * b.x + a.y * b.y + a.z * b.z;
export const crossVec = (a: Vec3, b: Vec3): Vec3 => ({
  x: a.y * b.z - a.z * b.y,
  y: a.z * b.x - a.x * b.z,
  z: a.x * b.y - a.y * b.x,
});
export const lengthVec = (v: Vec3): number => Math.hypot(v.x, v.y, v.z);
export const distanceVec = (a: Vec3, b: Vec3): number => lengthVec(subVec(a, b));

/** Returns null for vectors too short to carry a direction. */
export const normalizeVec = (v: Vec3, minLength = EPSILON): Vec3 | null => {
  const len = lengthVec(v);
  if (!Number.isFinite(len) || len < minLength) {
    return null;
  }
  return scaleVec(v, 1 / len);
};

/** Unsigned angle between two directions, radians. Zero-length input yields 0. */
export const angleBetween = (a: Vec3, b: Vec3): number => {
  const denominator = lengthVec(a) * lengthVec(b);
  if (denominator === 0) return 0;
  return Math.acos(clamp(dotVec(a, b) / denominator, -1, 1));
};

export const IDENTITY_QUAT: Readonly<Quat> = Object.freeze({ x: 0, y: 0, z: 0, w: 1 });

export const normalizeQuat = (q: Quat): Quat => {
  const len = Math.hypot(q.x, q.y, q.z, q.w);
  if (len < EPSILON) {
    return { ...IDENTITY_QUAT };
  }
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
};

export const multiplyQuat = (a: Quat, b: Quat): Quat => ({
  x: a.x * b.w + a.w * b.x + a.y * b.z - a.z * b.y,
  y: a.y * b.w + a.w * b.y + a.z * b.x - a.x * b.z,
  z: a.z * b.w + a.w * b.z + a.x * b.y - a.y * b.x,
  w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
});

export const quatFromAxisAngle = (axis: Vec3, angle: number): Quat => {
  const unit = normalizeVec(axis);
  if (!unit) {
    return { ...IDENTITY_QUAT };
  }
  const s = Math.sin(angle / 2);
  return { x: unit.x * s, y: unit.y * s, z: unit.z * s, w: Math.cos(angle / 2) };
};

export const rotateVec = (v: Vec3, q: Quat): Vec3 => {
  const ix = q.w * v.x + q.y * v.z - q.z * v.y;
  const iy = q.w * v.y + q.z * v.x - q.x * v.z;
  const iz = q.w * v.z + q.x * v.y - q.y * v.x;
  const iw = -q.x * v.x - q.y * v.y - q.z * v.z;
  return {
    x: ix * q.w + iw * -q.x + iy * -q.z - iz * -q.y,
    y: iy * q.w + iw * -q.y + iz * -q.x - ix * -q.z,
    z: iz * q.w + iw * -q.z + ix * -q.y - iy * -q.x,
  };
};

/** q and -q encode the same rotation; pick the one with w >= 0. */
export const canonicalQuat = (q: Quat): Quat => {
  const flip = q.w < 0 || (q.w === 0 && (q.x < 0 || (q.x === 0 && (q.y < 0 || (q.y === 0 && q.z < 0)))));
  return flip ? { x: -q.x, y: -q.y, z: -q.z, w: -q.w } : { ...q };
};

export const quatAngle = (a: Quat, b: Quat): number => {
  const d = Math.abs(a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w);
  return 2 * Math.acos(clamp(d, -1, 1));
};

/**
 * Builds the rotation whose columns are the given orthonormal axes
 * (x, y, z), i.e. the orientation of a bone frame.
 */
export const quatFromBasis = (xAxis: Vec3, yAxis: Vec3, zAxis: Vec3): Quat => {
  const m00 = xAxis.x, m01 = yAxis.x, m02 = zAxis.x;
  const m10 = xAxis.y, m11 = yAxis.y, m12 = zAxis.y;
  const m20 = xAxis.z, m21 = yAxis.z, m22 = zAxis.z;
  const trace = m00 + m11 + m22;

  if (trace > 0) {
    const s = 0.5 / Math.sqrt(trace + 1);
    return normalizeQuat({ w: 0.25 / s, x: (m21 - m12) * s, y: (m02 - m20) * s, z: (m10 - m01) * s });
  }
  if (m00 > m11 && m00 > m22) {
    const s = 2 * Math.sqrt(1 + m00 - m11 - m22);
    return normalizeQuat({ w: (m21 - m12) / s, x: 0.25 * s, y: (m01 + m10) / s, z: (m02 + m20) / s });
  }
  if (m11 > m22) {
    const s = 2 * Math.sqrt(1 + m11 - m00 - m22);
    return normalizeQuat({ w: (m02 - m20) / s, x: (m01 + m10) / s, y: 0.25 * s, z: (m12 + m21) / s });
  }
  const s = 2 * Math.sqrt(1 + m22 - m00 - m11);
  return normalizeQuat({ w: (m10 - m01) / s, x: (m02 + m20) / s, y: (m12 + m21) / s, z: 0.25 * s });
};
