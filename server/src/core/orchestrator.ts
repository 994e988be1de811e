import type { DndReader } from '../control/dnd.js';
import type { ActuationResult, ActuatorAngles } from '../hardware/hardware.types.js';
import type { ActuationSequencer } from '../hardware/sequencer.js';
import { withTimeout } from '../hardware/timeouts.js';
import type { CalibrationStore } from '../kinematics/calibration_store.js';
import type { KinematicsMapper } from '../kinematics/mapper.js';
import type { Logger } from '../logger.js';
import type { TriggerStateMachine, TriggerStateName } from '../trigger/state_machine.js';
import type { Detector } from '../vision/detector.js';
import { fuse } from '../vision/fusion.js';
import type { ClassThresholds, Detection, Point2D } from '../vision/vision.types.js';

export type StateEvent = {
  type: 'state';
  state: TriggerStateName;
  consecutive: number;
  ts_ms: number;
};

export type ActuationEvent = {
  type: 'actuation';
  ok: boolean;
  target: Point2D;
  angles: ActuatorAngles;
  was_clamped: boolean;
  error?: string;
  ts_ms: number;
};

export type OrchestratorEmitters = {
  state: (message: StateEvent) => void;
  actuation: (message: ActuationEvent) => void;
};

export type TickReport = {
  dndActive: boolean;
  overlapping: boolean;
  state: TriggerStateName;
  actuation?: ActuationEvent;
};

export type OrchestratorOptions = {
  detector: Detector;
  dnd: DndReader;
  fsm: TriggerStateMachine;
  mapper: KinematicsMapper;
  calibration: Pick<CalibrationStore, 'get'>;
  sequencer: ActuationSequencer;
  thresholds: ClassThresholds;
  tickIntervalMs: number;
  detectorTimeoutMs: number;
  dispenseMs: number;
  logger: Logger;
  emitters?: OrchestratorEmitters;
  now?: () => number;
};

const noopEmitters: OrchestratorEmitters = {
  state: () => {},
  actuation: () => {}
};

/**
 * Fixed-rate loop: DND -> detections -> fusion -> trigger -> aim -> spray.
 * Ticks never overlap; an actuation holds the loop until it has released.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private readonly log: Logger;
  private readonly now: () => number;
  private emitters: OrchestratorEmitters;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private lastState: TriggerStateName;
  private lastActuation: ActuationEvent | null = null;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.log = options.logger.child({ component: 'orchestrator' });
    this.now = options.now ?? Date.now;
    this.emitters = options.emitters ?? noopEmitters;
    this.lastState = options.fsm.getState();
  }

  setEmitters(emitters: OrchestratorEmitters) {
    this.emitters = emitters;
  }

  isRunning(): boolean {
    return this.running;
  }

  getLastActuation(): ActuationEvent | null {
    return this.lastActuation;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    this.log.info({ intervalMs: this.options.tickIntervalMs }, 'control loop started');

    const loop = () => {
      if (!this.running) return;
      const startedAt = this.now();
      this.inFlight = this.tick()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.log.error({ error }, 'tick failed');
        })
        .finally(() => {
          this.inFlight = null;
          if (!this.running) return;
          const elapsed = this.now() - startedAt;
          const delay = Math.max(0, this.options.tickIntervalMs - elapsed);
          this.timer = setTimeout(loop, delay);
        });
    };

    this.timer = setTimeout(loop, 0);
  }

  /**
   * Stops scheduling ticks. An actuation in progress is told to abort and this
   * resolves once its release steps are done.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abort?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    this.abort = null;
    this.log.info('control loop stopped');
  }

  async tick(): Promise<TickReport> {
    const { fsm } = this.options;
    const dndActive = await this.options.dnd.isActive(this.now());
    const detections = await this.pollDetections();
    const observation = fuse(detections, this.options.thresholds);
    const decision = fsm.step(observation, dndActive, this.now());
    this.emitStateChange();

    const report: TickReport = {
      dndActive,
      overlapping: observation.overlapping,
      state: decision.state
    };

    if (!decision.shouldTrigger) {
      return report;
    }

    if (!decision.target) {
      // Overlap implies an object, which always yields a target; guard anyway.
      this.log.warn('trigger without target; consuming cooldown without spraying');
      fsm.markDispatched(this.now());
      this.emitStateChange();
      report.state = fsm.getState();
      return report;
    }

    const mapping = this.options.mapper.map(decision.target, this.options.calibration.get());
    if (mapping.wasClamped) {
      this.log.warn({ target: decision.target, angles: mapping.angles }, 'aim clamped');
    }
    this.log.warn({ target: decision.target, angles: mapping.angles }, 'triggering spray sequence');

    fsm.markDispatched(this.now());
    this.emitStateChange();

    const result = await this.options.sequencer.execute(
      { target: mapping.angles, durationMs: this.options.dispenseMs },
      this.abort?.signal
    );

    const event = buildActuationEvent(result, decision.target, mapping.angles, mapping.wasClamped, this.now());
    if (!result.ok) {
      this.log.error(
        { step: result.error.step, code: result.error.code, error: result.error.message },
        'spray sequence failed'
      );
    }
    this.lastActuation = event;
    this.emitters.actuation(event);

    report.state = fsm.getState();
    report.actuation = event;
    return report;
  }

  private async pollDetections(): Promise<Detection[]> {
    try {
      return await withTimeout(this.options.detector.poll(), this.options.detectorTimeoutMs, 'detector poll');
    } catch (error) {
      this.log.warn({ error: error instanceof Error ? error.message : String(error) }, 'detector poll failed; empty frame');
      return [];
    }
  }

  private emitStateChange() {
    const snapshot = this.options.fsm.snapshot(this.now());
    if (snapshot.state === this.lastState) return;
    this.log.info({ from: this.lastState, to: snapshot.state }, 'trigger state changed');
    this.lastState = snapshot.state;
    this.emitters.state({
      type: 'state',
      state: snapshot.state,
      consecutive: snapshot.consecutive,
      ts_ms: this.now()
    });
  }
}

function buildActuationEvent(
  result: ActuationResult,
  target: Point2D,
  angles: ActuatorAngles,
  wasClamped: boolean,
  now: number
): ActuationEvent {
  const event: ActuationEvent = {
    type: 'actuation',
    ok: result.ok,
    target,
    angles,
    was_clamped: wasClamped,
    ts_ms: now
  };
  if (!result.ok) {
    event.error = `${result.error.step}:${result.error.code}`;
  }
  return event;
}
