export const DetectionClasses = ['OBJECT', 'HAND', 'FACE'] as const;

export type DetectionClass = (typeof DetectionClasses)[number];

// Normalized frame coordinates, origin top-left.
export type BoundingBox = {
  x_min: number;
  y_min: number;
  x_max: number;
  y_max: number;
};

export type Detection = {
  readonly box: BoundingBox;
  readonly confidence: number; // 0..1
  readonly class: DetectionClass;
};

export type Point2D = {
  u: number;
  v: number;
};

export type Observation = {
  object?: Detection;
  hand?: Detection;
  face?: Detection;
  overlapping: boolean;
  target?: Point2D;
};

export type ClassThresholds = Record<DetectionClass, number>;
