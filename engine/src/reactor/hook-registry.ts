import { HookNotRegisteredError } from '@fillway/errors';
import { ExecutionHook, OrderValidator } from '@fillway/interfaces';
import { Address, Hex, isZeroAddress } from '@fillway/types';

/**
 * Resolves the validation contract and execution hooks an order names by
 * address. The zero address means the order uses none.
 */
export class HookRegistry {
  private readonly validators = new Map<string, OrderValidator>();
  private readonly hooks = new Map<string, ExecutionHook>();

  registerValidator(address: Address, validator: OrderValidator): this {
    this.validators.set(address.toLowerCase(), validator);
    return this;
  }

  registerHook(address: Address, hook: ExecutionHook): this {
    this.hooks.set(address.toLowerCase(), hook);
    return this;
  }

  validatorAt(address: Address, orderHash?: Hex): OrderValidator | undefined {
    return this.lookup(this.validators, 'validator', address, orderHash);
  }

  hookAt(address: Address, orderHash?: Hex): ExecutionHook | undefined {
    return this.lookup(this.hooks, 'execution hook', address, orderHash);
  }

  private lookup<T>(registry: Map<string, T>, kind: string, address: Address, orderHash?: Hex): T | undefined {
    if (isZeroAddress(address)) {
      return undefined;
    }
    const entry = registry.get(address.toLowerCase());
    if (!entry) {
      throw new HookNotRegisteredError(kind, address, orderHash);
    }
    return entry;
  }
}
