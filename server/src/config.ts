import { z } from 'zod';
import type { ActuatorAngles, SafeRange } from './hardware/hardware.types.js';
import type { ClassThresholds } from './vision/vision.types.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const confidence = z.coerce.number().min(0).max(1);
const angle = z.coerce.number();
const durationMs = z.coerce.number().int().nonnegative();

const envSchema = z
  .object({
    PORT: z.coerce.number().int().default(8080),
    HOST: z.string().default('0.0.0.0'),
    WS_PATH: z.string().default('/events'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    DOCS_ENABLED: booleanFlag.default('true'),
    TICK_INTERVAL_MS: z.coerce.number().int().positive().default(100),
    MIN_CONSECUTIVE: z.coerce.number().int().min(1).default(3),
    COOLDOWN_MS: durationMs.default(10000),
    DISPENSE_MS: durationMs.default(500),
    SETTLE_MS: durationMs.default(300),
    STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
    THRESHOLD_OBJECT: confidence.default(0.5),
    THRESHOLD_HAND: confidence.default(0.7),
    THRESHOLD_FACE: confidence.default(0.5),
    ANGLE_A1_MIN: angle.default(0),
    ANGLE_A1_MAX: angle.default(180),
    ANGLE_A2_MIN: angle.default(0),
    ANGLE_A2_MAX: angle.default(180),
    REST_A1: angle.default(90),
    REST_A2: angle.default(90),
    CALIBRATION_PATH: z.string().default('./calibration.json'),
    DETECTOR_MODE: z.enum(['push', 'mock']).default('push'),
    FRAME_MAX_AGE_MS: durationMs.default(500),
    DND_SOURCE: z.enum(['local', 'remote']).default('local'),
    DND_REMOTE_URL: z.string().optional().default(''),
    DND_STALE_MS: durationMs.default(30000),
    SIM_MOVE_MS: durationMs.default(200)
  })
  .superRefine((env, ctx) => {
    if (env.ANGLE_A1_MIN >= env.ANGLE_A1_MAX || env.ANGLE_A2_MIN >= env.ANGLE_A2_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'angle range min must be below max' });
    }
    const restInRange =
      env.REST_A1 >= env.ANGLE_A1_MIN &&
      env.REST_A1 <= env.ANGLE_A1_MAX &&
      env.REST_A2 >= env.ANGLE_A2_MIN &&
      env.REST_A2 <= env.ANGLE_A2_MAX;
    if (!restInRange) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rest angles must lie inside the safe range' });
    }
    if (env.DND_SOURCE === 'remote' && !env.DND_REMOTE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DND_REMOTE_URL'],
        message: 'DND_REMOTE_URL is required when DND_SOURCE=remote'
      });
    }
  });

export type AppConfig = {
  port: number;
  host: string;
  wsPath: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  docsEnabled: boolean;
  tickIntervalMs: number;
  minConsecutive: number;
  cooldownMs: number;
  dispenseMs: number;
  settleMs: number;
  stepTimeoutMs: number;
  detectorTimeoutMs: number;
  thresholds: ClassThresholds;
  safeRange: SafeRange;
  restAngles: ActuatorAngles;
  calibrationPath: string;
  detectorMode: 'push' | 'mock';
  frameMaxAgeMs: number;
  dnd: {
    source: 'local' | 'remote';
    remoteUrl: string;
    staleMs: number;
  };
  simMoveMs: number;
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment');
  }

  const env = parsed.data;

  return {
    port: env.PORT,
    host: env.HOST,
    wsPath: env.WS_PATH,
    logLevel: env.LOG_LEVEL,
    docsEnabled: env.DOCS_ENABLED,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    minConsecutive: env.MIN_CONSECUTIVE,
    cooldownMs: env.COOLDOWN_MS,
    dispenseMs: env.DISPENSE_MS,
    settleMs: env.SETTLE_MS,
    stepTimeoutMs: env.STEP_TIMEOUT_MS,
    detectorTimeoutMs: env.DETECTOR_TIMEOUT_MS,
    thresholds: {
      OBJECT: env.THRESHOLD_OBJECT,
      HAND: env.THRESHOLD_HAND,
      FACE: env.THRESHOLD_FACE
    },
    safeRange: {
      a1: [env.ANGLE_A1_MIN, env.ANGLE_A1_MAX],
      a2: [env.ANGLE_A2_MIN, env.ANGLE_A2_MAX]
    },
    restAngles: [env.REST_A1, env.REST_A2],
    calibrationPath: env.CALIBRATION_PATH,
    detectorMode: env.DETECTOR_MODE,
    frameMaxAgeMs: env.FRAME_MAX_AGE_MS,
    dnd: {
      source: env.DND_SOURCE,
      remoteUrl: env.DND_REMOTE_URL,
      staleMs: env.DND_STALE_MS
    },
    simMoveMs: env.SIM_MOVE_MS
  };
}
