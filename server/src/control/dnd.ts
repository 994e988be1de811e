import { z } from 'zod';
import type { Logger } from '../logger.js';

export type DndStatus = {
  readonly active: boolean;
  readonly lastUpdated: number; // epoch ms
};

export interface DndSource {
  read(): Promise<DndStatus>;
}

/**
 * The one value shared between the control plane and the loop. Writes replace
 * the whole snapshot, so a reader never sees a half-applied update.
 */
export class DndCell implements DndSource {
  private status: DndStatus;
  private readonly now: () => number;

  constructor(params: { initial?: boolean; now?: () => number } = {}) {
    this.now = params.now ?? Date.now;
    this.status = Object.freeze({ active: params.initial ?? false, lastUpdated: this.now() });
  }

  get(): DndStatus {
    return this.status;
  }

  set(active: boolean): DndStatus {
    this.status = Object.freeze({ active, lastUpdated: this.now() });
    return this.status;
  }

  async read(): Promise<DndStatus> {
    return this.status;
  }
}

const RemoteDndSchema = z.object({
  active: z.boolean(),
  last_updated: z.string().min(1)
});

/** Reads the flag from another instance's control plane over HTTP. */
export class RemoteDndSource implements DndSource {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, timeoutMs: number) {
    this.url = `${baseUrl.replace(/\/+$/, '')}/dnd`;
    this.timeoutMs = timeoutMs;
  }

  async read(): Promise<DndStatus> {
    const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new Error(`DND request failed: ${response.status}`);
    }
    const parsed = RemoteDndSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('DND response failed validation');
    }
    const lastUpdated = Date.parse(parsed.data.last_updated);
    return {
      active: parsed.data.active,
      lastUpdated: Number.isNaN(lastUpdated) ? 0 : lastUpdated
    };
  }
}

/**
 * Fail-safe view of a DndSource. A failed read reuses the last confirmed value
 * while that confirmation is younger than `staleMs`; after that, or before any
 * successful read, the flag reads as inactive.
 */
export class DndReader {
  private readonly source: DndSource;
  private readonly staleMs: number;
  private readonly log: Logger;
  private lastKnown: DndStatus | null = null;
  private lastConfirmedAt: number | null = null;
  private failing = false;

  constructor(params: { source: DndSource; staleMs: number; logger: Logger }) {
    this.source = params.source;
    this.staleMs = params.staleMs;
    this.log = params.logger.child({ component: 'dnd' });
  }

  async isActive(now: number): Promise<boolean> {
    try {
      const status = await this.source.read();
      this.lastKnown = status;
      this.lastConfirmedAt = now;
      if (this.failing) {
        this.log.info('DND source reachable again');
        this.failing = false;
      }
      return status.active;
    } catch (error) {
      if (!this.failing) {
        this.log.warn({ error: error instanceof Error ? error.message : String(error) }, 'DND read failed');
        this.failing = true;
      }
      if (!this.lastKnown || this.lastConfirmedAt === null) return false;
      if (now - this.lastConfirmedAt > this.staleMs) return false;
      return this.lastKnown.active;
    }
  }

  getLastKnown(): DndStatus | null {
    return this.lastKnown;
  }
}
