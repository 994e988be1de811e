import pino from 'pino';
import type { ActuatorAngles, Hardware } from '../src/hardware/hardware.types.js';
import type { BoundingBox, Detection, DetectionClass } from '../src/vision/vision.types.js';

export const silentLogger = pino({ level: 'silent' });

export function box(x_min: number, y_min: number, x_max: number, y_max: number): BoundingBox {
  return { x_min, y_min, x_max, y_max };
}

export function detection(cls: DetectionClass, b: BoundingBox, confidence = 0.9): Detection {
  return { class: cls, box: b, confidence };
}

type Call = { kind: 'angles'; angles: ActuatorAngles } | { kind: 'dispenser'; on: boolean };

/**
 * Records every call and reports the resulting state. `failOn` makes a call
 * reject; `hangOn` makes it never settle; `delayMs` makes every call take that
 * long before it applies.
 */
export class FakeHardware implements Hardware {
  angles: ActuatorAngles;
  dispenserOn = false;
  readonly calls: Call[] = [];
  failOn: ((call: Call) => boolean) | null = null;
  hangOn: ((call: Call) => boolean) | null = null;
  delayMs = 0;

  constructor(initial: ActuatorAngles = [90, 90]) {
    this.angles = initial;
  }

  async setAngles(angles: ActuatorAngles): Promise<void> {
    const call: Call = { kind: 'angles', angles };
    this.calls.push(call);
    await this.gate(call);
    this.angles = angles;
  }

  async setDispenser(on: boolean): Promise<void> {
    const call: Call = { kind: 'dispenser', on };
    this.calls.push(call);
    await this.gate(call);
    this.dispenserOn = on;
  }

  private async gate(call: Call): Promise<void> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.hangOn?.(call)) {
      await new Promise<never>(() => {});
    }
    if (this.failOn?.(call)) {
      throw new Error(`fake ${call.kind} failure`);
    }
  }
}

export const instantSleep = async (_ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    throw new Error('aborted');
  }
};
