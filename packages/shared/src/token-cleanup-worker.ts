import { type SafeLogger } from './logger';

export interface TokenCleanupWorkerOptions {
  /** One cleanup pass; resolves to the number of records removed. */
  cleanup: () => Promise<number>;
  intervalMs: number;
  logger: SafeLogger;
}

export type TokenCleanupWorkerState = 'stopped' | 'running';

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_CLEANUP_INTERVAL_MS = 2 ** 31 - 1;

/**
 * Runs the refresh-token cleanup on a fixed interval. Passes never overlap:
 * a tick that fires while a pass is still in flight is skipped.
 */
export class TokenCleanupWorker {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private shuttingDown = false;

  constructor(private readonly opts: TokenCleanupWorkerOptions) {
    const { intervalMs } = opts;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_CLEANUP_INTERVAL_MS) {
      throw new RangeError(
        `Token cleanup interval must be between 1 and ${MAX_CLEANUP_INTERVAL_MS} ms, got ${intervalMs}`,
      );
    }
  }

  get state(): TokenCleanupWorkerState {
    return this.timer ? 'running' : 'stopped';
  }

  start(): void {
    if (this.timer) return;
    this.shuttingDown = false;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.opts.intervalMs);
    this.opts.logger.info({ intervalMs: this.opts.intervalMs }, 'Token cleanup worker started');
  }

  /**
   * No pass starts once this returns; the promise settles when the pass
   * already running, if any, has finished.
   */
  async stop(): Promise<void> {
    this.shuttingDown = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.opts.logger.info({}, 'Token cleanup worker stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Runs one pass now unless a pass is already in flight. Never rejects. */
  async runOnce(): Promise<void> {
    if (this.inFlight) {
      this.opts.logger.debug({}, 'Token cleanup pass already running, skipping');
      return this.inFlight;
    }
    this.inFlight = this.pass().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async tick(): Promise<void> {
    if (this.shuttingDown || this.inFlight) return;
    await this.runOnce();
  }

  private async pass(): Promise<void> {
    const startedAt = Date.now();
    try {
      const deleted = await this.opts.cleanup();
      this.opts.logger.info(
        { deleted, durationMs: Date.now() - startedAt },
        'Token cleanup pass completed',
      );
    } catch (err) {
      this.opts.logger.error({ err }, 'Token cleanup pass failed');
    }
  }
}
