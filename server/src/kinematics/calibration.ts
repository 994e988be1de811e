import type { ActuatorAngles } from '../hardware/hardware.types.js';
import type { Point2D } from '../vision/vision.types.js';

export type CalibrationCorner = {
  camera_point: Point2D;
  actuator_angles: ActuatorAngles;
};

/** Corners ordered around the quadrilateral: top-left, top-right, bottom-right, bottom-left. */
export type CalibrationMap = {
  topLeft: CalibrationCorner;
  topRight: CalibrationCorner;
  bottomRight: CalibrationCorner;
  bottomLeft: CalibrationCorner;
};

export type CalibrationCheck =
  | { ok: true; map: CalibrationMap }
  | { ok: false; reason: string };

const EPSILON = 1e-9;

/**
 * Orders four samples by where their camera points sit relative to each other
 * and checks that they bound a strictly convex quadrilateral.
 */
export function buildCalibrationMap(corners: readonly CalibrationCorner[]): CalibrationCheck {
  if (corners.length !== 4) {
    return { ok: false, reason: `expected 4 corners, got ${corners.length}` };
  }
  const finite = corners.every(
    (corner) =>
      Number.isFinite(corner.camera_point.u) &&
      Number.isFinite(corner.camera_point.v) &&
      Number.isFinite(corner.actuator_angles[0]) &&
      Number.isFinite(corner.actuator_angles[1])
  );
  if (!finite) {
    return { ok: false, reason: 'non-finite coordinate' };
  }

  const byRow = [...corners].sort((a, b) => a.camera_point.v - b.camera_point.v);
  const [topLeft, topRight] = byRow.slice(0, 2).sort((a, b) => a.camera_point.u - b.camera_point.u);
  const [bottomLeft, bottomRight] = byRow.slice(2).sort((a, b) => a.camera_point.u - b.camera_point.u);
  const map: CalibrationMap = { topLeft, topRight, bottomRight, bottomLeft };

  if (!isStrictlyConvex(map)) {
    return { ok: false, reason: 'corners do not form a convex quadrilateral' };
  }
  return { ok: true, map };
}

export function orderedCorners(map: CalibrationMap): CalibrationCorner[] {
  return [map.topLeft, map.topRight, map.bottomRight, map.bottomLeft];
}

export function cross(a: Point2D, b: Point2D): number {
  return a.u * b.v - a.v * b.u;
}

export function sub(a: Point2D, b: Point2D): Point2D {
  return { u: a.u - b.u, v: a.v - b.v };
}

function isStrictlyConvex(map: CalibrationMap): boolean {
  const points = orderedCorners(map).map((corner) => corner.camera_point);
  let sign = 0;
  for (let i = 0; i < points.length; i += 1) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    const c = points[(i + 2) % points.length];
    const turn = cross(sub(b, a), sub(c, b));
    // Collinear triples (including repeated points) make the patch degenerate.
    if (Math.abs(turn) < EPSILON) return false;
    const current = Math.sign(turn);
    if (sign === 0) {
      sign = current;
    } else if (current !== sign) {
      return false;
    }
  }
  return true;
}
