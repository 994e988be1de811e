import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import { buildCalibrationMap, type CalibrationCorner, type CalibrationMap, orderedCorners } from './calibration.js';

export const CalibrationCornerSchema = z.object({
  camera_point: z.object({
    u: z.number().min(0).max(1),
    v: z.number().min(0).max(1)
  }),
  actuator_angles: z.tuple([z.number(), z.number()])
});

export const CalibrationFileSchema = z.object({
  corners: z.array(CalibrationCornerSchema).length(4)
});

export type CalibrationFile = z.infer<typeof CalibrationFileSchema>;

export class CalibrationError extends Error {
  readonly code: 'invalid_file' | 'degenerate_calibration';

  constructor(code: CalibrationError['code'], message: string) {
    super(message);
    this.name = 'CalibrationError';
    this.code = code;
  }
}

/**
 * Holds the active calibration and mirrors it to a JSON file. A missing file
 * leaves the map absent; the mapper then aims at rest.
 */
export class CalibrationStore {
  private readonly filePath: string;
  private readonly log: Logger;
  private current: CalibrationMap | null = null;

  constructor(filePath: string, logger: Logger) {
    this.filePath = path.resolve(filePath);
    this.log = logger.child({ component: 'calibration' });
  }

  get(): CalibrationMap | null {
    return this.current;
  }

  async load(): Promise<CalibrationMap | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.log.warn({ path: this.filePath }, 'no calibration file; aiming falls back to rest');
        this.current = null;
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new CalibrationError('invalid_file', `Calibration file is not JSON: ${this.filePath}`);
    }
    const parsed = CalibrationFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CalibrationError('invalid_file', `Calibration file failed validation: ${parsed.error.message}`);
    }

    const check = buildCalibrationMap(parsed.data.corners);
    if (!check.ok) {
      this.log.warn({ path: this.filePath, reason: check.reason }, 'calibration degenerate; aiming falls back to rest');
      this.current = null;
      return null;
    }
    this.current = check.map;
    this.log.info({ path: this.filePath }, 'calibration loaded');
    return check.map;
  }

  /** Validates, applies and persists a new set of corners. */
  async replace(corners: readonly CalibrationCorner[]): Promise<CalibrationMap> {
    const check = buildCalibrationMap(corners);
    if (!check.ok) {
      throw new CalibrationError('degenerate_calibration', check.reason);
    }
    const file: CalibrationFile = {
      corners: orderedCorners(check.map).map((corner) => ({
        camera_point: { ...corner.camera_point },
        actuator_angles: [corner.actuator_angles[0], corner.actuator_angles[1]]
      }))
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify(file, null, 2)}\n`, 'utf8');
    await fs.rename(tmpPath, this.filePath);
    this.current = check.map;
    this.log.info({ path: this.filePath }, 'calibration saved');
    return check.map;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
