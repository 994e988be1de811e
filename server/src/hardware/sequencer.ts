import type { Logger } from '../logger.js';
import {
  ActuationError,
  type ActuationResult,
  type ActuationStep,
  type ActuatorAngles,
  type Hardware,
  type SprayCommand
} from './hardware.types.js';
import { AbortedError, sleep as defaultSleep, type Sleep, TimeoutError, withTimeout } from './timeouts.js';

export type SequencerOptions = {
  hardware: Hardware;
  restAngles: ActuatorAngles;
  settleMs: number;
  stepTimeoutMs: number;
  logger: Logger;
  sleep?: Sleep;
};

// A hardware call that outlived its step timeout and may still land.
type PendingCall = {
  step: ActuationStep;
  settled: Promise<void>;
};

/**
 * Aim, settle, dispense, then always release the dispenser and return to rest.
 * Hardware calls are never abandoned mid-flight: an abort is honoured between
 * steps and during waits, and a call that timed out is waited for before the
 * rest move. If it lands even later, release and rest are sent again.
 */
export class ActuationSequencer {
  private readonly hardware: Hardware;
  private readonly restAngles: ActuatorAngles;
  private readonly settleMs: number;
  private readonly stepTimeoutMs: number;
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private running = false;
  private generation = 0;
  private pending: PendingCall | null = null;

  constructor(options: SequencerOptions) {
    this.hardware = options.hardware;
    this.restAngles = options.restAngles;
    this.settleMs = options.settleMs;
    this.stepTimeoutMs = options.stepTimeoutMs;
    this.log = options.logger.child({ component: 'sequencer' });
    this.sleep = options.sleep ?? defaultSleep;
  }

  isRunning(): boolean {
    return this.running;
  }

  async execute(cmd: SprayCommand, signal?: AbortSignal): Promise<ActuationResult> {
    if (this.running) {
      return {
        ok: false,
        error: new ActuationError('aim', 'busy', 'Actuation already in progress')
      };
    }
    this.running = true;
    this.generation += 1;
    this.log.info({ target: cmd.target, durationMs: cmd.durationMs }, 'spray sequence start');

    let failure: ActuationError | null = null;
    try {
      await this.hardwareStep('aim', () => this.hardware.setAngles(cmd.target), signal);
      await this.waitStep('settle', this.settleMs, signal);
      await this.hardwareStep('dispense', () => this.hardware.setDispenser(true), signal);
      await this.waitStep('dispense', cmd.durationMs, signal);
    } catch (error) {
      failure = toActuationError(error);
      this.log.warn({ step: failure.step, code: failure.code, error: failure.message }, 'spray sequence interrupted');
    }

    const released = await this.park();
    this.running = false;

    failure = failure ?? released;
    if (failure) {
      return { ok: false, error: failure };
    }
    this.log.info('spray sequence completed');
    return { ok: true };
  }

  /** Moves straight to `angles` outside any sequence, for finding calibration corners. */
  async jog(angles: ActuatorAngles): Promise<ActuationResult> {
    if (this.running) {
      return {
        ok: false,
        error: new ActuationError('jog', 'busy', 'Actuation already in progress')
      };
    }
    this.running = true;
    this.generation += 1;
    try {
      await this.hardwareStep('jog', () => this.hardware.setAngles(angles));
      this.log.info({ angles }, 'jogged');
      return { ok: true };
    } catch (error) {
      const failure = toActuationError(error);
      this.log.warn({ code: failure.code, error: failure.message }, 'jog failed');
      return { ok: false, error: failure };
    } finally {
      this.running = false;
    }
  }

  /**
   * Dispenser off, then rest. Both run even if the first fails; the first
   * failure is returned.
   */
  async park(): Promise<ActuationError | null> {
    const late = await this.settlePending();

    let failure: ActuationError | null = null;
    try {
      await this.hardwareStep('release', () => this.hardware.setDispenser(false));
    } catch (error) {
      failure = toActuationError(error);
      this.log.error({ error: failure.message }, 'dispenser release failed');
    }
    try {
      await this.hardwareStep('rest', () => this.hardware.setAngles(this.restAngles));
    } catch (error) {
      const restFailure = toActuationError(error);
      this.log.error({ error: restFailure.message }, 'return to rest failed');
      failure = failure ?? restFailure;
    }

    if (late) {
      this.parkAfter(late, this.generation);
    }
    return failure;
  }

  private async hardwareStep(step: ActuationStep, work: () => Promise<void>, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ActuationError(step, 'aborted', `${step} skipped: shutdown requested`);
    }
    const call = work();
    const settled = call.then(
      () => undefined,
      () => undefined
    );
    this.pending = { step, settled };
    try {
      await withTimeout(call, this.stepTimeoutMs, step);
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        this.pending = null;
      }
      throw classify(step, error);
    }
    this.pending = null;
    if (signal?.aborted) {
      throw new ActuationError(step, 'aborted', `${step} interrupted: shutdown requested`);
    }
  }

  private async waitStep(step: ActuationStep, ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      throw classify(step, error);
    }
  }

  /** Gives a timed-out call one more step timeout to land; returns it if it still has not. */
  private async settlePending(): Promise<PendingCall | null> {
    const pending = this.pending;
    if (!pending) return null;
    this.pending = null;
    try {
      await withTimeout(pending.settled, this.stepTimeoutMs, `${pending.step} (pending)`);
      return null;
    } catch (error) {
      this.log.warn(
        { step: pending.step, error: error instanceof Error ? error.message : String(error) },
        'hardware call still pending; parking around it'
      );
      return pending;
    }
  }

  private parkAfter(late: PendingCall, generation: number): void {
    late.settled
      .then(async () => {
        if (this.running || generation !== this.generation) return;
        this.log.warn({ step: late.step }, 'late hardware call landed; parking again');
        await this.hardware.setDispenser(false);
        await this.hardware.setAngles(this.restAngles);
      })
      .catch((error: unknown) => {
        this.log.error({ error }, 'park after late hardware call failed');
      });
  }
}

function classify(step: ActuationStep, error: unknown): ActuationError {
  if (error instanceof ActuationError) return error;
  if (error instanceof TimeoutError) {
    return new ActuationError(step, 'timeout', error.message, { cause: error });
  }
  if (error instanceof AbortedError) {
    return new ActuationError(step, 'aborted', error.message, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ActuationError(step, 'hardware_failure', message, { cause: error });
}

function toActuationError(error: unknown): ActuationError {
  return error instanceof ActuationError ? error : classify('aim', error);
}
