/**
 * TickScheduler - host-side timer driving the player tick
 *
 * The core keeps no timers of its own. A tick that is still awaiting a
 * track load when the next beat arrives makes that beat a no-op, so ticks
 * never overlap.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('TickScheduler');

export type TickHandler = () => Promise<unknown> | unknown;

export class TickScheduler {
  private interval: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;
  private skipped = 0;

  constructor(
    private readonly onTick: TickHandler,
    private readonly intervalMs = 16
  ) {}

  get running(): boolean {
    return this.interval !== null;
  }

  /** Beats dropped because the previous tick had not finished */
  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.interval) return;

    this.interval = setInterval(() => {
      void this.beat();
    }, this.intervalMs);

    logger.debug({ intervalMs: this.intervalMs }, 'Started');
  }

  stop(): void {
    if (!this.interval) return;

    clearInterval(this.interval);
    this.interval = null;
    logger.debug({ skippedTicks: this.skipped }, 'Stopped');
  }

  private async beat(): Promise<void> {
    if (this.inFlight) {
      this.skipped++;
      return;
    }

    this.inFlight = true;
    try {
      await this.onTick();
    } catch (error) {
      logger.error({ err: error }, 'Tick failed');
    } finally {
      this.inFlight = false;
    }
  }
}
