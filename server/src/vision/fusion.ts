import type {
  BoundingBox,
  ClassThresholds,
  Detection,
  DetectionClass,
  Observation,
  Point2D
} from './vision.types.js';

// Fraction of the object box height, from its top edge, used as the aim point
// when no face is visible.
const HEAD_REGION_FRACTION = 0.2;

export function fuse(detections: readonly Detection[], thresholds: ClassThresholds): Observation {
  const object = pickBest(detections, 'OBJECT', thresholds.OBJECT);
  const hand = pickBest(detections, 'HAND', thresholds.HAND);
  const face = pickBest(detections, 'FACE', thresholds.FACE);

  const overlapping = Boolean(object && hand && intersects(hand.box, object.box));

  let target: Point2D | undefined;
  if (face) {
    target = boxCenter(face.box);
  } else if (object) {
    target = headRegion(object.box);
  }

  return { object, hand, face, overlapping, target };
}

export function isValidBox(box: BoundingBox): boolean {
  const values = [box.x_min, box.y_min, box.x_max, box.y_max];
  if (!values.every(Number.isFinite)) return false;
  return box.x_min < box.x_max && box.y_min < box.y_max;
}

/** True only for a positive-area intersection; shared edges do not count. */
export function intersects(a: BoundingBox, b: BoundingBox): boolean {
  const width = Math.min(a.x_max, b.x_max) - Math.max(a.x_min, b.x_min);
  const height = Math.min(a.y_max, b.y_max) - Math.max(a.y_min, b.y_min);
  return width > 0 && height > 0;
}

export function boxCenter(box: BoundingBox): Point2D {
  return {
    u: (box.x_min + box.x_max) / 2,
    v: (box.y_min + box.y_max) / 2
  };
}

function headRegion(box: BoundingBox): Point2D {
  return {
    u: (box.x_min + box.x_max) / 2,
    v: box.y_min + (box.y_max - box.y_min) * HEAD_REGION_FRACTION
  };
}

function pickBest(
  detections: readonly Detection[],
  cls: DetectionClass,
  threshold: number
): Detection | undefined {
  let best: Detection | undefined;
  for (const detection of detections) {
    if (detection.class !== cls) continue;
    if (detection.confidence < threshold) continue;
    if (!isValidBox(detection.box)) continue;
    if (!best || detection.confidence > best.confidence) {
      best = detection;
    }
  }
  return best;
}
