/** [a1, a2] in degrees: a1 pans, a2 tilts. */
export type ActuatorAngles = readonly [number, number];

export type SafeRange = {
  a1: readonly [number, number];
  a2: readonly [number, number];
};

export type SprayCommand = {
  target: ActuatorAngles;
  durationMs: number;
};

/**
 * Aiming mechanism plus dispenser. Both calls must tolerate being repeated with
 * the state already in place.
 */
export interface Hardware {
  setAngles(angles: ActuatorAngles): Promise<void>;
  setDispenser(on: boolean): Promise<void>;
}

export type ActuationStep = 'aim' | 'settle' | 'dispense' | 'release' | 'rest' | 'jog';

export type ActuationErrorCode = 'timeout' | 'hardware_failure' | 'aborted' | 'busy';

export class ActuationError extends Error {
  readonly step: ActuationStep;
  readonly code: ActuationErrorCode;

  constructor(step: ActuationStep, code: ActuationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActuationError';
    this.step = step;
    this.code = code;
  }
}

export type ActuationResult = { ok: true } | { ok: false; error: ActuationError };
