/** Monotonic block-height oracle supplied by the host. */
export interface Clock {
  blockHeight(): number;
}

/**
 * In-process clock whose height only moves when told to.
 * Stands in for the host chain in tests and simulation mode.
 */
export class ManualClock implements Clock {
  private height: number;

  constructor(genesisHeight = 0) {
    if (!Number.isSafeInteger(genesisHeight) || genesisHeight < 0) {
      throw new RangeError(`Invalid genesis height: ${genesisHeight}`);
    }
    this.height = genesisHeight;
  }

  blockHeight(): number {
    return this.height;
  }

  advance(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot advance by ${blocks} blocks`);
    }
    const next = this.height + blocks;
    if (!Number.isSafeInteger(next)) {
      throw new RangeError(`Cannot advance past block ${Number.MAX_SAFE_INTEGER}`);
    }
    this.height = next;
    return this.height;
  }

  advanceTo(height: number): number {
    if (!Number.isSafeInteger(height) || height < this.height) {
      throw new RangeError(
        `Block height must not move backwards (${this.height} -> ${height})`,
      );
    }
    this.height = height;
    return this.height;
  }
}
