import type { Logger } from '../logger.js';
import type { ActuatorAngles, Hardware } from './hardware.types.js';
import { sleep } from './timeouts.js';

export type HardwareState = {
  angles: ActuatorAngles;
  dispenserOn: boolean;
};

/**
 * Stand-in driver for running without a servo board. A move that changes the
 * angles takes `moveMs`; repeating the current state returns immediately.
 */
export class SimulatedHardware implements Hardware {
  private angles: ActuatorAngles;
  private dispenserOn = false;
  private readonly moveMs: number;
  private readonly log: Logger;

  constructor(params: { initialAngles: ActuatorAngles; moveMs: number; logger: Logger }) {
    this.angles = params.initialAngles;
    this.moveMs = params.moveMs;
    this.log = params.logger.child({ component: 'hardware' });
  }

  async setAngles(angles: ActuatorAngles): Promise<void> {
    if (angles[0] === this.angles[0] && angles[1] === this.angles[1]) return;
    if (this.moveMs > 0) {
      await sleep(this.moveMs);
    }
    this.angles = [angles[0], angles[1]];
    this.log.debug({ angles: this.angles }, 'moved');
  }

  async setDispenser(on: boolean): Promise<void> {
    if (on === this.dispenserOn) return;
    this.dispenserOn = on;
    this.log.debug({ on }, 'dispenser');
  }

  getState(): HardwareState {
    return { angles: this.angles, dispenserOn: this.dispenserOn };
  }
}
