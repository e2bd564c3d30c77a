import { ExecutionContext } from '@fillway/types';

/** Authoritative clock and block counter of the host chain. */
export interface ExecutionEnvironment {
  currentContext(): ExecutionContext;
}
