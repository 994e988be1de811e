import type { ActuatorAngles, SafeRange } from '../hardware/hardware.types.js';
import type { Point2D } from '../vision/vision.types.js';
import { type CalibrationMap, cross, sub } from './calibration.js';

export type MappingResult = {
  angles: ActuatorAngles;
  wasClamped: boolean;
};

const EPSILON = 1e-12;

/**
 * Camera point to actuator angles over a four-corner bilinear patch. The target
 * is located inside the quadrilateral as fractional (s, t), clamped to the unit
 * square, and each angle is blended with the same weights. No extrapolation.
 */
export class KinematicsMapper {
  private readonly safeRange: SafeRange;
  private readonly restAngles: ActuatorAngles;

  constructor(params: { safeRange: SafeRange; restAngles: ActuatorAngles }) {
    this.safeRange = params.safeRange;
    this.restAngles = params.restAngles;
  }

  map(target: Point2D, calibration: CalibrationMap | null): MappingResult {
    if (!calibration || !Number.isFinite(target.u) || !Number.isFinite(target.v)) {
      return { angles: this.restAngles, wasClamped: true };
    }

    const raw = inverseBilinear(target, calibration);
    const s = clamp01(raw.s);
    const t = clamp01(raw.t);
    const fractionClamped = s !== raw.s || t !== raw.t;

    const safe = clampToSafeRange([blend(calibration, 0, s, t), blend(calibration, 1, s, t)], this.safeRange);
    return {
      angles: safe.angles,
      wasClamped: fractionClamped || safe.wasClamped
    };
  }
}

export function clampToSafeRange(angles: ActuatorAngles, range: SafeRange): MappingResult {
  const a1 = clamp(angles[0], range.a1[0], range.a1[1]);
  const a2 = clamp(angles[1], range.a2[0], range.a2[1]);
  return { angles: [a1, a2], wasClamped: a1 !== angles[0] || a2 !== angles[1] };
}

/**
 * Solves p = a + s*e + t*f + s*t*g for (s, t), with a..d the corners in
 * TL, TR, BR, BL order. Out-of-patch points can have no real root or roots far
 * outside the square; the root nearest the unit square is kept.
 */
export function inverseBilinear(p: Point2D, map: CalibrationMap): { s: number; t: number } {
  const a = map.topLeft.camera_point;
  const b = map.topRight.camera_point;
  const c = map.bottomRight.camera_point;
  const d = map.bottomLeft.camera_point;

  const e = sub(b, a);
  const f = sub(d, a);
  const g = { u: a.u - b.u + c.u - d.u, v: a.v - b.v + c.v - d.v };
  const h = sub(p, a);

  const k2 = cross(g, f);
  const k1 = cross(e, f) + cross(h, g);
  const k0 = cross(h, e);

  const candidates: number[] = [];
  if (Math.abs(k2) < EPSILON) {
    candidates.push(-k0 / k1);
  } else {
    const discriminant = Math.max(0, k1 * k1 - 4 * k0 * k2);
    const root = Math.sqrt(discriminant);
    candidates.push((-k1 - root) / (2 * k2), (-k1 + root) / (2 * k2));
  }

  let best = { s: Number.NaN, t: Number.NaN };
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const t of candidates) {
    if (!Number.isFinite(t)) continue;
    const s = solveS(h, e, f, g, t);
    if (!Number.isFinite(s)) continue;
    const distance = outsideDistance(s) + outsideDistance(t);
    if (distance < bestDistance) {
      best = { s, t };
      bestDistance = distance;
    }
  }
  return Number.isFinite(best.s) ? best : { s: 0.5, t: 0.5 };
}

function solveS(h: Point2D, e: Point2D, f: Point2D, g: Point2D, t: number): number {
  const du = e.u + g.u * t;
  const dv = e.v + g.v * t;
  return Math.abs(du) >= Math.abs(dv) ? (h.u - f.u * t) / du : (h.v - f.v * t) / dv;
}

function blend(map: CalibrationMap, axis: 0 | 1, s: number, t: number): number {
  const tl = map.topLeft.actuator_angles[axis];
  const tr = map.topRight.actuator_angles[axis];
  const br = map.bottomRight.actuator_angles[axis];
  const bl = map.bottomLeft.actuator_angles[axis];
  return (1 - s) * (1 - t) * tl + s * (1 - t) * tr + s * t * br + (1 - s) * t * bl;
}

function outsideDistance(value: number): number {
  if (value < 0) return -value;
  if (value > 1) return value - 1;
  return 0;
}

function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
