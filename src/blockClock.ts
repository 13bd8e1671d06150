import { BlockClock } from './types';

/**
 * Block clock advanced explicitly, by tests or by the cron scheduler.
 */
export class ManualBlockClock implements BlockClock {
  private height: number;

  constructor(startHeight: number = 1) {
    if (!Number.isSafeInteger(startHeight) || startHeight < 0) {
      throw new Error(`Invalid start height: ${startHeight}`);
    }
    this.height = startHeight;
  }

  currentBlock(): number {
    return this.height;
  }

  advance(blocks: number = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 1) {
      throw new Error(`Cannot advance by ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }

  /**
   * Jump forward to `height`; lower heights leave the clock where it is.
   */
  advanceTo(height: number): number {
    if (!Number.isSafeInteger(height)) {
      throw new Error(`Invalid height: ${height}`);
    }
    this.height = Math.max(this.height, height);
    return this.height;
  }
}
