import { z } from 'zod';
import { CalibrationCornerSchema } from '../kinematics/calibration_store.js';
import { DetectionClasses } from '../vision/vision.types.js';

export const SetDndSchema = z.object({
  active: z.boolean()
});

export const BoundingBoxSchema = z
  .object({
    x_min: z.number().min(0).max(1),
    y_min: z.number().min(0).max(1),
    x_max: z.number().min(0).max(1),
    y_max: z.number().min(0).max(1)
  })
  .refine((box) => box.x_min < box.x_max && box.y_min < box.y_max, {
    message: 'box min must be below max'
  });

export const DetectionSchema = z.object({
  box: BoundingBoxSchema,
  confidence: z.number().min(0).max(1),
  class: z.enum(DetectionClasses)
});

export const DetectionFrameSchema = z.object({
  detections: z.array(DetectionSchema).max(64)
});

export const PutCalibrationSchema = z.object({
  corners: z.array(CalibrationCornerSchema).length(4)
});

export const JogSchema = z.object({
  angles: z.tuple([z.number(), z.number()])
});

// Route docs for the OpenAPI document only. Bodies are checked with the zod
// schemas above, not by Fastify.

const dndResponse = {
  type: 'object',
  properties: {
    active: { type: 'boolean' },
    last_updated: { type: 'string' }
  }
} as const;

export const routeDocs = {
  health: {
    description: 'Liveness check',
    response: {
      200: {
        type: 'object',
        properties: { status: { type: 'string' }, timestamp: { type: 'string' } }
      }
    }
  },
  getDnd: {
    description: 'Current do-not-disturb flag',
    response: { 200: dndResponse }
  },
  setDnd: {
    description: 'Set the do-not-disturb flag (idempotent). Body: { active: boolean }'
  },
  status: {
    description: 'Trigger state, cooldown and last actuation'
  },
  getCalibration: {
    description: 'Active calibration corners'
  },
  putCalibration: {
    description: 'Replace the four calibration corners. Body: { corners: CalibrationCorner[4] }'
  },
  jog: {
    description: 'Move the actuator to the given angles, clamped to the safe range. Refused while a spray is pending. Body: { angles: [a1, a2] }'
  },
  detections: {
    description: 'Latest detections from an external vision process. Body: { detections: Detection[] }'
  }
} as const;
