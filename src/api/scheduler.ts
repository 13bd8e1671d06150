/**
 * Cron-based block scheduler.
 * Advances the block clock on a configurable schedule.
 */

import * as cron from 'node-cron';
import { ManualBlockClock } from '../blockClock';

export interface SchedulerConfig {
  blockCron: string;   // e.g. '*/12 * * * * *' (one block every 12s)
  timezone: string;    // e.g. 'UTC'
}

export class BlockScheduler {
  private blockJob: cron.ScheduledTask | null = null;

  constructor(
    private clock: ManualBlockClock,
    private config: SchedulerConfig
  ) {}

  start(): void {
    if (!cron.validate(this.config.blockCron)) {
      throw new Error(`Scheduler: invalid cron expression "${this.config.blockCron}"`);
    }

    this.blockJob = cron.schedule(this.config.blockCron, () => {
      this.tick();
    }, { timezone: this.config.timezone });

    console.log(`Scheduler: block="${this.config.blockCron}" (${this.config.timezone})`);
  }

  stop(): void {
    this.blockJob?.stop();
    this.blockJob = null;
  }

  get running(): boolean {
    return this.blockJob !== null;
  }

  /** Advance the clock by one block */
  tick(): number {
    return this.clock.advance();
  }
}
