import { describe, expect, it, vi } from 'vitest';
import { DndCell, DndReader } from '../src/control/dnd.js';
import { Orchestrator, type ActuationEvent, type StateEvent } from '../src/core/orchestrator.js';
import { ActuationSequencer } from '../src/hardware/sequencer.js';
import { sleep, type Sleep } from '../src/hardware/timeouts.js';
import { buildCalibrationMap, type CalibrationMap } from '../src/kinematics/calibration.js';
import { KinematicsMapper } from '../src/kinematics/mapper.js';
import { TriggerStateMachine } from '../src/trigger/state_machine.js';
import type { Detector } from '../src/vision/detector.js';
import type { Detection } from '../src/vision/vision.types.js';
import { box, detection, FakeHardware, instantSleep, silentLogger } from './helpers.js';

const handling: Detection[] = [
  detection('OBJECT', box(0.2, 0.2, 0.6, 0.6)),
  detection('HAND', box(0.5, 0.5, 0.7, 0.7)),
  detection('FACE', box(0.3, 0.1, 0.5, 0.3))
];

function axisAligned(): CalibrationMap {
  const check = buildCalibrationMap([
    { camera_point: { u: 0, v: 0 }, actuator_angles: [60, 120] },
    { camera_point: { u: 1, v: 0 }, actuator_angles: [120, 120] },
    { camera_point: { u: 1, v: 1 }, actuator_angles: [120, 80] },
    { camera_point: { u: 0, v: 1 }, actuator_angles: [60, 80] }
  ]);
  if (!check.ok) throw new Error(check.reason);
  return check.map;
}

class ScriptedDetector implements Detector {
  frame: Detection[] = handling;
  polls = 0;
  failing = false;

  async poll(): Promise<Detection[]> {
    this.polls += 1;
    if (this.failing) throw new Error('camera unplugged');
    return this.frame;
  }
}

type SetupOptions = {
  dnd?: boolean;
  calibration?: CalibrationMap | null;
  detector?: Detector;
  tickIntervalMs?: number;
  stepTimeoutMs?: number;
  sleep?: Sleep;
};

function setup(options: SetupOptions = {}) {
  let clock = 0;
  const hardware = new FakeHardware([90, 150]);
  const detector = options.detector ?? new ScriptedDetector();
  const fsm = new TriggerStateMachine({ minConsecutive: 3, cooldownMs: 10_000 });
  const states: StateEvent[] = [];
  const actuations: ActuationEvent[] = [];
  const calibration = options.calibration === undefined ? axisAligned() : options.calibration;

  const orchestrator = new Orchestrator({
    detector,
    dnd: new DndReader({
      source: new DndCell({ initial: options.dnd ?? true, now: () => clock }),
      staleMs: 2_000,
      logger: silentLogger
    }),
    fsm,
    mapper: new KinematicsMapper({ safeRange: { a1: [0, 180], a2: [0, 180] }, restAngles: [90, 150] }),
    calibration: { get: () => calibration },
    sequencer: new ActuationSequencer({
      hardware,
      restAngles: [90, 150],
      settleMs: 300,
      stepTimeoutMs: options.stepTimeoutMs ?? 50,
      logger: silentLogger,
      sleep: options.sleep ?? instantSleep
    }),
    thresholds: { OBJECT: 0.5, HAND: 0.5, FACE: 0.5 },
    tickIntervalMs: options.tickIntervalMs ?? 200,
    detectorTimeoutMs: 30,
    dispenseMs: 400,
    logger: silentLogger,
    emitters: {
      state: (event) => states.push(event),
      actuation: (event) => actuations.push(event)
    },
    now: () => clock
  });

  const advance = (ms: number) => {
    clock += ms;
  };

  return { orchestrator, hardware, fsm, states, actuations, advance };
}

describe('Orchestrator', () => {
  it('sprays once at the face after three overlapping frames, then cools down', async () => {
    const { orchestrator, hardware, fsm, states, actuations, advance } = setup();

    const first = await orchestrator.tick();
    advance(200);
    const second = await orchestrator.tick();
    expect(first).toEqual({ dndActive: true, overlapping: true, state: 'IDLE' });
    expect(second.state).toBe('IDLE');
    expect(hardware.calls).toEqual([]);

    advance(200);
    const third = await orchestrator.tick();
    expect(third.state).toBe('COOLDOWN');
    expect(third.actuation?.ok).toBe(true);

    expect(hardware.calls).toHaveLength(4);
    const aim = hardware.calls[0];
    expect(aim.kind).toBe('angles');
    if (aim.kind === 'angles') {
      expect(aim.angles[0]).toBeCloseTo(84, 6);
      expect(aim.angles[1]).toBeCloseTo(112, 6);
    }
    expect(hardware.calls.slice(1)).toEqual([
      { kind: 'dispenser', on: true },
      { kind: 'dispenser', on: false },
      { kind: 'angles', angles: [90, 150] }
    ]);
    expect(hardware.dispenserOn).toBe(false);

    advance(200);
    const fourth = await orchestrator.tick();
    expect(fourth.state).toBe('COOLDOWN');
    expect(fourth.actuation).toBeUndefined();
    expect(hardware.calls).toHaveLength(4);

    expect(states.map((event) => event.state)).toEqual(['TRIGGERED', 'COOLDOWN']);
    expect(actuations).toHaveLength(1);
    expect(actuations[0].target.u).toBeCloseTo(0.4, 9);
    expect(actuations[0].target.v).toBeCloseTo(0.2, 9);
    expect(actuations[0].was_clamped).toBe(false);
    expect(actuations[0].ts_ms).toBe(400);
    expect(orchestrator.getLastActuation()).toBe(actuations[0]);
    expect(fsm.snapshot(600).cooldownRemainingMs).toBe(9_800);
  });

  it('never sprays while DND is off', async () => {
    const { orchestrator, hardware, advance } = setup({ dnd: false });
    for (let i = 0; i < 6; i += 1) {
      const report = await orchestrator.tick();
      expect(report).toEqual({ dndActive: false, overlapping: true, state: 'IDLE' });
      advance(200);
    }
    expect(hardware.calls).toEqual([]);
  });

  it('aims at rest when there is no calibration', async () => {
    const { orchestrator, hardware, actuations } = setup({ calibration: null });
    await orchestrator.tick();
    await orchestrator.tick();
    await orchestrator.tick();

    expect(hardware.calls[0]).toEqual({ kind: 'angles', angles: [90, 150] });
    expect(actuations[0].was_clamped).toBe(true);
    expect(actuations[0].ok).toBe(true);
  });

  it('reports a failed sequence and still enters cooldown', async () => {
    const { orchestrator, hardware, actuations } = setup();
    hardware.failOn = (call) => call.kind === 'angles' && call.angles[0] !== 90;

    await orchestrator.tick();
    await orchestrator.tick();
    const report = await orchestrator.tick();

    expect(report.state).toBe('COOLDOWN');
    expect(actuations[0].ok).toBe(false);
    expect(actuations[0].error).toBe('aim:hardware_failure');
    expect(hardware.dispenserOn).toBe(false);
    expect(hardware.angles).toEqual([90, 150]);
  });

  it('treats a failing detector as an empty frame', async () => {
    const detector = new ScriptedDetector();
    detector.failing = true;
    const { orchestrator } = setup({ detector });

    await expect(orchestrator.tick()).resolves.toEqual({ dndActive: true, overlapping: false, state: 'IDLE' });
  });

  it('treats a detector that never answers as an empty frame', async () => {
    const detector: Detector = { poll: () => new Promise<Detection[]>(() => {}) };
    const { orchestrator } = setup({ detector });

    const report = await orchestrator.tick();
    expect(report.overlapping).toBe(false);
  });

  it('resets the run when the overlap breaks', async () => {
    const detector = new ScriptedDetector();
    const { orchestrator, hardware } = setup({ detector });

    await orchestrator.tick();
    await orchestrator.tick();
    detector.frame = [handling[0], handling[2]];
    await orchestrator.tick();
    detector.frame = handling;
    await orchestrator.tick();
    await orchestrator.tick();

    expect(hardware.calls).toEqual([]);
  });

  it('runs the loop until stopped', async () => {
    const detector = new ScriptedDetector();
    detector.frame = [];
    const { orchestrator } = setup({ detector, tickIntervalMs: 5 });

    orchestrator.start();
    expect(orchestrator.isRunning()).toBe(true);
    await vi.waitFor(() => expect(detector.polls).toBeGreaterThanOrEqual(3));
    await orchestrator.stop();
    expect(orchestrator.isRunning()).toBe(false);

    const polls = detector.polls;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(detector.polls).toBe(polls);
  });

  it('finishes the aim in progress and parks before stop resolves', async () => {
    const { orchestrator, hardware } = setup({ tickIntervalMs: 5, stepTimeoutMs: 1_000 });
    hardware.delayMs = 100;

    orchestrator.start();
    await vi.waitFor(() => expect(hardware.calls).toHaveLength(1), { interval: 2 });
    expect(hardware.angles).toEqual([90, 150]);
    await orchestrator.stop();

    expect(hardware.calls.map((call) => call.kind)).toEqual(['angles', 'dispenser', 'angles']);
    expect(hardware.calls[2]).toEqual({ kind: 'angles', angles: [90, 150] });
    expect(hardware.dispenserOn).toBe(false);
    expect(hardware.angles).toEqual([90, 150]);
    expect(orchestrator.getLastActuation()?.error).toBe('aim:aborted');
  });

  it('cuts the dispense short and parks before stop resolves', async () => {
    const { orchestrator, hardware } = setup({ tickIntervalMs: 5, stepTimeoutMs: 1_000, sleep });
    hardware.delayMs = 10;

    orchestrator.start();
    await vi.waitFor(() => expect(hardware.dispenserOn).toBe(true), { interval: 5 });
    await orchestrator.stop();

    expect(hardware.calls.slice(1)).toEqual([
      { kind: 'dispenser', on: true },
      { kind: 'dispenser', on: false },
      { kind: 'angles', angles: [90, 150] }
    ]);
    expect(hardware.dispenserOn).toBe(false);
    expect(hardware.angles).toEqual([90, 150]);
    expect(orchestrator.getLastActuation()?.error).toBe('dispense:aborted');
  });
});
