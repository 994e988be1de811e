import { loadEnv } from './load_env.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { handleShutdownSignals } from './shutdown.js';
import { DndCell, DndReader, RemoteDndSource, type DndSource } from './control/dnd.js';
import { Orchestrator } from './core/orchestrator.js';
import { ActuationSequencer } from './hardware/sequencer.js';
import { SimulatedHardware } from './hardware/simulated.js';
import { buildControlPlane } from './http/control_plane.js';
import { CalibrationStore } from './kinematics/calibration_store.js';
import { KinematicsMapper } from './kinematics/mapper.js';
import { TriggerStateMachine } from './trigger/state_machine.js';
import type { Detector } from './vision/detector.js';
import { MockDetector } from './vision/mock_detector.js';
import { PushDetector } from './vision/push_detector.js';
import { createEventHub } from './ws/hub.js';

async function boot() {
  const envPath = loadEnv();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info({ envPath }, 'configuration loaded');

  const calibration = new CalibrationStore(config.calibrationPath, logger);
  await calibration.load();

  const hardware = new SimulatedHardware({
    initialAngles: config.restAngles,
    moveMs: config.simMoveMs,
    logger
  });
  const sequencer = new ActuationSequencer({
    hardware,
    restAngles: config.restAngles,
    settleMs: config.settleMs,
    stepTimeoutMs: config.stepTimeoutMs,
    logger
  });
  const parked = await sequencer.park();
  if (parked) {
    logger.warn({ error: parked.message }, 'could not park hardware at boot');
  }

  const pushDetector = config.detectorMode === 'push' ? new PushDetector({ maxAgeMs: config.frameMaxAgeMs }) : null;
  const detector: Detector = pushDetector ?? new MockDetector();

  const dndCell = new DndCell();
  const dndSource: DndSource =
    config.dnd.source === 'remote'
      ? new RemoteDndSource(config.dnd.remoteUrl, Math.max(50, config.tickIntervalMs))
      : dndCell;

  const fsm = new TriggerStateMachine({
    minConsecutive: config.minConsecutive,
    cooldownMs: config.cooldownMs
  });

  const orchestrator = new Orchestrator({
    detector,
    dnd: new DndReader({ source: dndSource, staleMs: config.dnd.staleMs, logger }),
    fsm,
    mapper: new KinematicsMapper({ safeRange: config.safeRange, restAngles: config.restAngles }),
    calibration,
    sequencer,
    thresholds: config.thresholds,
    tickIntervalMs: config.tickIntervalMs,
    detectorTimeoutMs: config.detectorTimeoutMs,
    dispenseMs: config.dispenseMs,
    logger
  });

  const app = await buildControlPlane({
    logger,
    dnd: dndCell,
    fsm,
    orchestrator,
    calibration,
    sequencer,
    safeRange: config.safeRange,
    pushDetector,
    docs: config.docsEnabled
  });

  const hub = createEventHub({ server: app.server, path: config.wsPath, logger });
  orchestrator.setEmitters({ state: hub.state, actuation: hub.actuation });

  await app.listen({ port: config.port, host: config.host });
  orchestrator.start();
  logger.info(
    { detector: config.detectorMode, dnd: config.dnd.source, calibrated: calibration.get() !== null },
    'phone free desk running'
  );

  handleShutdownSignals({
    logger,
    run: async (signal) => {
      logger.info({ signal }, 'shutting down');
      await orchestrator.stop();
      const failure = await sequencer.park();
      if (failure) {
        logger.error({ error: failure.message }, 'park at shutdown failed');
      }
      await hub.close();
      await app.close();
      logger.info('shutdown complete');
    }
  });
}

boot().catch((error) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
