import type { Detector } from './detector.js';
import type { Detection } from './vision.types.js';

const PHONE: Detection = {
  class: 'OBJECT',
  confidence: 0.91,
  box: { x_min: 0.42, y_min: 0.55, x_max: 0.58, y_max: 0.8 }
};

const HAND_ON_PHONE: Detection = {
  class: 'HAND',
  confidence: 0.88,
  box: { x_min: 0.45, y_min: 0.6, x_max: 0.62, y_max: 0.85 }
};

const HAND_AWAY: Detection = {
  class: 'HAND',
  confidence: 0.86,
  box: { x_min: 0.05, y_min: 0.6, x_max: 0.2, y_max: 0.85 }
};

const FACE: Detection = {
  class: 'FACE',
  confidence: 0.8,
  box: { x_min: 0.4, y_min: 0.1, x_max: 0.56, y_max: 0.32 }
};

type Phase = { frames: number; detections: Detection[] };

const SCRIPT: Phase[] = [
  { frames: 20, detections: [PHONE] },
  { frames: 10, detections: [PHONE, HAND_AWAY] },
  { frames: 15, detections: [PHONE, HAND_ON_PHONE, FACE] },
  { frames: 5, detections: [] },
  { frames: 15, detections: [PHONE, HAND_ON_PHONE] }
];

/** Replays a fixed desk scene on a loop, for running without a camera. */
export class MockDetector implements Detector {
  private frame = 0;
  private readonly total = SCRIPT.reduce((sum, phase) => sum + phase.frames, 0);

  async poll(): Promise<Detection[]> {
    let index = this.frame % this.total;
    this.frame += 1;
    for (const phase of SCRIPT) {
      if (index < phase.frames) return phase.detections;
      index -= phase.frames;
    }
    return [];
  }
}
