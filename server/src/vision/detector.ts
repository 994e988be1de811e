import type { Detection } from './vision.types.js';

/**
 * Source of per-frame detections. An empty list is a legitimate
 * "nothing seen" frame; throwing is reserved for hard failures.
 */
export interface Detector {
  poll(): Promise<Detection[]>;
}
