import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { DndCell } from '../control/dnd.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { SafeRange } from '../hardware/hardware.types.js';
import type { ActuationSequencer } from '../hardware/sequencer.js';
import { orderedCorners } from '../kinematics/calibration.js';
import { CalibrationError, type CalibrationStore } from '../kinematics/calibration_store.js';
import { clampToSafeRange } from '../kinematics/mapper.js';
import type { Logger } from '../logger.js';
import type { TriggerStateMachine } from '../trigger/state_machine.js';
import type { PushDetector } from '../vision/push_detector.js';
import { DetectionFrameSchema, JogSchema, PutCalibrationSchema, routeDocs, SetDndSchema } from './schemas.js';

export type ControlPlaneParams = {
  logger: Logger;
  dnd: DndCell;
  fsm: Pick<TriggerStateMachine, 'snapshot'>;
  orchestrator: Pick<Orchestrator, 'getLastActuation' | 'isRunning'>;
  calibration: CalibrationStore;
  sequencer: Pick<ActuationSequencer, 'isRunning' | 'jog'>;
  safeRange: SafeRange;
  pushDetector: PushDetector | null;
  docs: boolean;
  now?: () => number;
};

/** HTTP surface for the DND flag, status, calibration, jogging and pushed detections. */
export async function buildControlPlane(params: ControlPlaneParams) {
  const now = params.now ?? Date.now;
  const app = Fastify({ logger: params.logger, bodyLimit: 256 * 1024 });

  if (params.docs) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: 'Phone Free Desk',
          version: '0.1.0'
        }
      }
    });
    await app.register(swaggerUI, { routePrefix: '/docs' });
  }

  app.get('/health', { schema: routeDocs.health }, async () => ({
    status: 'ok',
    timestamp: new Date(now()).toISOString()
  }));

  app.get('/dnd', { schema: routeDocs.getDnd }, async () => {
    const status = params.dnd.get();
    return { active: status.active, last_updated: new Date(status.lastUpdated).toISOString() };
  });

  app.post('/dnd', { schema: routeDocs.setDnd }, async (request, reply) => {
    const parsed = SetDndSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: 'invalid_payload' });
      return;
    }
    const previous = params.dnd.get().active;
    const status = params.dnd.set(parsed.data.active);
    if (previous !== status.active) {
      request.log.info({ active: status.active }, 'DND status changed');
    }
    reply.send({ active: status.active });
  });

  app.get('/status', { schema: routeDocs.status }, async () => {
    const snapshot = params.fsm.snapshot(now());
    const dnd = params.dnd.get();
    return {
      running: params.orchestrator.isRunning(),
      state: snapshot.state,
      consecutive: snapshot.consecutive,
      cooldown_remaining_ms: snapshot.cooldownRemainingMs,
      dnd: { active: dnd.active, last_updated: new Date(dnd.lastUpdated).toISOString() },
      calibration_valid: params.calibration.get() !== null,
      last_actuation: params.orchestrator.getLastActuation()
    };
  });

  app.get('/calibration', { schema: routeDocs.getCalibration }, async (_, reply) => {
    const map = params.calibration.get();
    if (!map) {
      reply.code(404).send({ error: 'no_calibration' });
      return;
    }
    reply.send({ corners: orderedCorners(map), valid: true });
  });

  app.put('/calibration', { schema: routeDocs.putCalibration }, async (request, reply) => {
    const parsed = PutCalibrationSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: 'invalid_payload' });
      return;
    }
    try {
      const map = await params.calibration.replace(parsed.data.corners);
      reply.send({ corners: orderedCorners(map), valid: true });
    } catch (error) {
      if (error instanceof CalibrationError) {
        reply.code(400).send({ error: error.code, message: error.message });
        return;
      }
      throw error;
    }
  });

  app.post('/actuator', { schema: routeDocs.jog }, async (request, reply) => {
    const parsed = JogSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: 'invalid_payload' });
      return;
    }
    if (params.sequencer.isRunning() || params.fsm.snapshot(now()).state !== 'IDLE') {
      reply.code(409).send({ error: 'actuator_busy' });
      return;
    }
    const { angles, wasClamped } = clampToSafeRange(parsed.data.angles, params.safeRange);
    const result = await params.sequencer.jog(angles);
    if (!result.ok) {
      const status = result.error.code === 'busy' ? 409 : 502;
      reply.code(status).send({ error: status === 409 ? 'actuator_busy' : result.error.code, message: result.error.message });
      return;
    }
    request.log.info({ angles, wasClamped }, 'actuator jogged');
    reply.send({ angles, was_clamped: wasClamped });
  });

  app.post('/detections', { schema: routeDocs.detections }, async (request, reply) => {
    if (!params.pushDetector) {
      reply.code(404).send({ error: 'push_detector_disabled' });
      return;
    }
    const parsed = DetectionFrameSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: 'invalid_payload' });
      return;
    }
    const id = params.pushDetector.push(parsed.data.detections);
    reply.send({ ok: true, id });
  });

  return app;
}
