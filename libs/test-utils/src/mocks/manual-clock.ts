import { ExecutionContext } from '@fillway/types';
import { ExecutionEnvironment } from '@fillway/interfaces';

/**
 * Host environment whose time, block height and priority fee only move
 * when a test says so.
 */
export class ManualClock implements ExecutionEnvironment {
  private context: ExecutionContext;

  constructor(initial: Partial<ExecutionContext> = {}) {
    this.context = {
      now: initial.now ?? 1_000n,
      blockNumber: initial.blockNumber ?? 100n,
      priorityFee: initial.priorityFee ?? 0n
    };
  }

  currentContext(): ExecutionContext {
    return { ...this.context };
  }

  setTime(now: bigint): this {
    this.context.now = now;
    return this;
  }

  advance(seconds: bigint): this {
    this.context.now += seconds;
    return this;
  }

  setBlock(blockNumber: bigint): this {
    this.context.blockNumber = blockNumber;
    return this;
  }

  mine(blocks: bigint = 1n): this {
    this.context.blockNumber += blocks;
    return this;
  }

  setPriorityFee(priorityFee: bigint): this {
    this.context.priorityFee = priorityFee;
    return this;
  }
}
