import type { Detector } from './detector.js';
import type { Detection } from './vision.types.js';

type PushedFrame = {
  detections: Detection[];
  receivedAt: number;
  id: string;
};

/**
 * Detector fed by an external vision process posting to /detections. The loop
 * sees the latest frame until it is older than `maxAgeMs`, then an empty one.
 */
export class PushDetector implements Detector {
  private latest: PushedFrame | null = null;
  private counter = 0;
  private readonly maxAgeMs: number;
  private readonly now: () => number;

  constructor(params: { maxAgeMs: number; now?: () => number }) {
    this.maxAgeMs = params.maxAgeMs;
    this.now = params.now ?? Date.now;
  }

  push(detections: Detection[]): string {
    const receivedAt = this.now();
    const id = `${receivedAt}-${this.counter++}`;
    this.latest = { detections, receivedAt, id };
    return id;
  }

  async poll(): Promise<Detection[]> {
    if (!this.latest) return [];
    if (this.now() - this.latest.receivedAt > this.maxAgeMs) return [];
    return this.latest.detections;
  }
}
