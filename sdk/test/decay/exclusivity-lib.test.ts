import { NoExclusiveOverrideError } from '@fillway/errors';
import { ZERO_ADDRESS } from '@fillway/types';
import { TEST_ADDRESSES, TEST_TOKENS } from '@fillway/test-utils';
import { applyExclusivity } from '../../src/decay/exclusivity-lib';

describe('Exclusivity', () => {
  const outputs = [{ token: TEST_TOKENS.tokenOut, amount: 1_000n, recipient: TEST_ADDRESSES.recipient }];
  const terms = { exclusiveFiller: TEST_ADDRESSES.filler, exclusivityEnd: 100n, overrideBps: 100n };

  it('should let the exclusive filler fill at the quoted price', () => {
    expect(applyExclusivity(outputs, terms, 50n, TEST_ADDRESSES.filler)).toEqual(outputs);
  });

  it('should charge other fillers the override, rounded up', () => {
    expect(applyExclusivity(outputs, terms, 50n, TEST_ADDRESSES.otherFiller)[0].amount).toBe(1_010n);
    const odd = [{ ...outputs[0], amount: 1_001n }];
    expect(applyExclusivity(odd, terms, 50n, TEST_ADDRESSES.otherFiller)[0].amount).toBe(1_012n);
  });

  it('should include the last second of the window', () => {
    expect(applyExclusivity(outputs, terms, 100n, TEST_ADDRESSES.otherFiller)[0].amount).toBe(1_010n);
    expect(applyExclusivity(outputs, terms, 101n, TEST_ADDRESSES.otherFiller)).toEqual(outputs);
  });

  it('should treat an unknown filler as a stranger', () => {
    expect(applyExclusivity(outputs, terms, 50n, undefined)[0].amount).toBe(1_010n);
  });

  it('should refuse strangers when there is no override', () => {
    expect(() => applyExclusivity(outputs, { ...terms, overrideBps: 0n }, 50n, TEST_ADDRESSES.otherFiller))
      .toThrow(NoExclusiveOverrideError);
  });

  it('should do nothing without an exclusive filler', () => {
    expect(applyExclusivity(outputs, { ...terms, exclusiveFiller: ZERO_ADDRESS }, 50n, TEST_ADDRESSES.otherFiller))
      .toEqual(outputs);
  });
});
