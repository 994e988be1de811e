import type { Observation, Point2D } from '../vision/vision.types.js';

export type TriggerState =
  | { kind: 'IDLE' }
  | { kind: 'ARMED' }
  | { kind: 'TRIGGERED' }
  | { kind: 'COOLDOWN'; until: number };

export type TriggerStateName = TriggerState['kind'];

export type Decision = {
  shouldTrigger: boolean;
  target?: Point2D;
  state: TriggerStateName;
};

export type TriggerSnapshot = {
  state: TriggerStateName;
  consecutive: number;
  cooldownRemainingMs: number;
};

export type TriggerOptions = {
  minConsecutive: number;
  cooldownMs: number;
};

type TriggerEvent =
  | { type: 'observe'; qualifying: boolean; now: number }
  | { type: 'dispatched'; now: number };

/**
 * Debounce + cooldown gate. A trigger is emitted only on the ARMED -> TRIGGERED
 * edge, and COOLDOWN admits no other edge until its deadline has passed.
 */
export class TriggerStateMachine {
  private readonly options: TriggerOptions;
  private state: TriggerState = { kind: 'IDLE' };
  private consecutive = 0;

  constructor(options: TriggerOptions) {
    if (!Number.isInteger(options.minConsecutive) || options.minConsecutive < 1) {
      throw new Error('minConsecutive must be a positive integer');
    }
    this.options = { ...options };
  }

  step(observation: Observation, dndActive: boolean, now: number): Decision {
    const qualifying = observation.overlapping && dndActive;
    const previous = this.state;
    this.transition({ type: 'observe', qualifying, now });
    const shouldTrigger = previous.kind !== 'TRIGGERED' && this.state.kind === 'TRIGGERED';
    return {
      shouldTrigger,
      target: shouldTrigger ? observation.target : undefined,
      state: this.state.kind
    };
  }

  /** Actuation has been handed to the sequencer; the cooldown starts now. */
  markDispatched(now: number): void {
    this.transition({ type: 'dispatched', now });
  }

  getState(): TriggerStateName {
    return this.state.kind;
  }

  snapshot(now: number): TriggerSnapshot {
    const cooldownRemainingMs =
      this.state.kind === 'COOLDOWN' ? Math.max(0, this.state.until - now) : 0;
    return { state: this.state.kind, consecutive: this.consecutive, cooldownRemainingMs };
  }

  private transition(event: TriggerEvent): void {
    if (event.type === 'dispatched') {
      if (this.state.kind !== 'TRIGGERED') {
        throw new Error(`markDispatched called in state ${this.state.kind}`);
      }
      this.state = { kind: 'COOLDOWN', until: event.now + this.options.cooldownMs };
      return;
    }

    if (this.state.kind === 'COOLDOWN' && event.now >= this.state.until) {
      this.state = { kind: 'IDLE' };
    }

    this.consecutive = event.qualifying ? this.consecutive + 1 : 0;

    switch (this.state.kind) {
      case 'COOLDOWN':
      case 'TRIGGERED':
        // Muted: counting continues, edges do not.
        return;
      case 'ARMED':
        if (!event.qualifying) {
          this.state = { kind: 'IDLE' };
          this.consecutive = 0;
          return;
        }
        this.fire();
        return;
      case 'IDLE':
        if (this.consecutive >= this.options.minConsecutive) {
          this.state = { kind: 'ARMED' };
          // The observation that completed the run is still qualifying.
          this.fire();
        }
        return;
    }
  }

  private fire(): void {
    this.state = { kind: 'TRIGGERED' };
    this.consecutive = 0;
  }
}
