import { FeeController } from '@fillway/interfaces';
import { Address, OutputToken, ResolvedOrder } from '@fillway/types';
import { BPS, mulDivDown, sameAddress } from '@fillway/utils';

export interface FeeRule {
  inputToken: Address;
  outputToken: Address;
  bps: bigint;
}

/**
 * Protocol fee per (input token, output token) pair, charged on the sum of
 * an order's outputs in that token. Fees round down.
 */
export class BpsFeeController implements FeeController {
  private readonly rules = new Map<string, bigint>();

  constructor(private readonly recipient: Address, rules: FeeRule[] = []) {
    rules.forEach((rule) => this.setFee(rule.inputToken, rule.outputToken, rule.bps));
  }

  setFee(inputToken: Address, outputToken: Address, bps: bigint): this {
    this.rules.set(this.pairKey(inputToken, outputToken), bps);
    return this;
  }

  feeBps(inputToken: Address, outputToken: Address): bigint {
    return this.rules.get(this.pairKey(inputToken, outputToken)) ?? 0n;
  }

  getFeeOutputs(order: ResolvedOrder): OutputToken[] {
    const fees: OutputToken[] = [];
    for (const output of order.outputs) {
      if (fees.some((fee) => sameAddress(fee.token, output.token))) {
        continue;
      }
      const bps = this.feeBps(order.input.token, output.token);
      if (bps === 0n) {
        continue;
      }
      const total = order.outputs
        .filter((candidate) => sameAddress(candidate.token, output.token))
        .reduce((sum, candidate) => sum + candidate.amount, 0n);
      const amount = mulDivDown(total, bps, BPS);
      if (amount > 0n) {
        fees.push({ token: output.token, amount, recipient: this.recipient });
      }
    }
    return fees;
  }

  private pairKey(inputToken: Address, outputToken: Address): string {
    return `${inputToken.toLowerCase()}:${outputToken.toLowerCase()}`;
  }
}
