import {
  InvalidSettlementStatusError,
  SettlementAlreadyExistsError,
  SettlementNotFoundError,
  SettlementTerminatedError
} from '@fillway/errors';
import { ActiveSettlement, Address, Hex, SettlementStatus, isTerminalStatus } from '@fillway/types';
import { JournaledMap } from '../state/journaled-map';
import { StateJournal } from '../state/state-journal';

const ALLOWED_TRANSITIONS: Record<SettlementStatus, readonly SettlementStatus[]> = {
  [SettlementStatus.PENDING]: [SettlementStatus.CHALLENGED, SettlementStatus.CANCELLED, SettlementStatus.SUCCESS],
  [SettlementStatus.CHALLENGED]: [SettlementStatus.CANCELLED, SettlementStatus.SUCCESS],
  [SettlementStatus.CANCELLED]: [],
  [SettlementStatus.SUCCESS]: []
};

/** Detached copy, so records handed out can never move the stored state. */
function snapshot(settlement: ActiveSettlement): ActiveSettlement {
  return {
    ...settlement,
    info: { ...settlement.info },
    input: { ...settlement.input },
    fillerCollateral: { ...settlement.fillerCollateral },
    challengerCollateral: { ...settlement.challengerCollateral },
    outputs: settlement.outputs.map((output) => ({ ...output }))
  };
}

export interface TransitionPatch {
  challenger?: Address;
}

/** Settlements keyed by order hash. Status only moves along `ALLOWED_TRANSITIONS`. */
export class SettlementStore {
  private readonly settlements: JournaledMap<string, ActiveSettlement>;

  constructor(journal: StateJournal) {
    this.settlements = new JournaledMap(journal);
  }

  has(orderHash: Hex): boolean {
    return this.settlements.has(orderHash.toLowerCase());
  }

  find(orderHash: Hex): ActiveSettlement | undefined {
    const settlement = this.settlements.get(orderHash.toLowerCase());
    return settlement && snapshot(settlement);
  }

  get(orderHash: Hex): ActiveSettlement {
    const settlement = this.find(orderHash);
    if (!settlement) {
      throw new SettlementNotFoundError(orderHash);
    }
    return settlement;
  }

  create(settlement: ActiveSettlement): void {
    if (this.has(settlement.orderHash)) {
      throw new SettlementAlreadyExistsError(settlement.orderHash);
    }
    this.settlements.set(settlement.orderHash.toLowerCase(), snapshot(settlement));
  }

  /** Throws unless `orderHash` may move to `to`; returns the current record. */
  assertTransition(orderHash: Hex, to: SettlementStatus): ActiveSettlement {
    const settlement = this.get(orderHash);
    if (isTerminalStatus(settlement.status)) {
      throw new SettlementTerminatedError(orderHash, settlement.status);
    }
    if (!ALLOWED_TRANSITIONS[settlement.status].includes(to)) {
      throw new InvalidSettlementStatusError(orderHash, settlement.status, to);
    }
    return settlement;
  }

  transition(orderHash: Hex, to: SettlementStatus, patch: TransitionPatch = {}): ActiveSettlement {
    const current = this.assertTransition(orderHash, to);
    const next: ActiveSettlement = { ...current, ...patch, status: to };
    this.settlements.set(orderHash.toLowerCase(), next);
    return snapshot(next);
  }

  size(): number {
    return this.settlements.size;
  }
}
