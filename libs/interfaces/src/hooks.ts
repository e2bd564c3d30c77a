import { Address, Hex, OutputToken, ResolvedOrder } from '@fillway/types';

/** Maker-defined fill policy. Must be read-only. */
export interface OrderValidator {
  validate(filler: Address, order: ResolvedOrder): boolean;
}

/** Runs before input collection (pre) or after output distribution (post). */
export interface ExecutionHook {
  execute(filler: Address, order: ResolvedOrder): void;
}

/** Computes protocol fee outputs appended to a resolved order. */
export interface FeeController {
  getFeeOutputs(order: ResolvedOrder): OutputToken[];
}

export interface Filler {
  address: Address;
  /**
   * Invoked once per batch after inputs reach the filler and before outputs
   * are pulled from it. Fillers without a callback pay outputs directly.
   */
  reactorCallback?(orders: readonly ResolvedOrder[], fillerData: Hex): void;
}
