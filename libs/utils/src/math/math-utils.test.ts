import { BPS, MPS, mulDivDown, mulDivUp, minBigInt, maxBigInt } from './math-utils';

describe('math utils', () => {
  describe('mulDivDown', () => {
    it('should floor the quotient', () => {
      expect(mulDivDown(10n, 3n, 4n)).toBe(7n);
      expect(mulDivDown(1_000n, 25n, BPS)).toBe(2n);
    });

    it('should reject a zero denominator', () => {
      expect(() => mulDivDown(1n, 1n, 0n)).toThrow(RangeError);
    });
  });

  describe('mulDivUp', () => {
    it('should round the quotient up', () => {
      expect(mulDivUp(10n, 3n, 4n)).toBe(8n);
      expect(mulDivUp(1_000n, 25n, BPS)).toBe(3n);
    });

    it('should stay exact when there is no remainder', () => {
      expect(mulDivUp(20n, 2n, 4n)).toBe(10n);
      expect(mulDivUp(0n, 5n, MPS)).toBe(0n);
    });
  });

  it('should pick min and max', () => {
    expect(minBigInt(3n, 5n)).toBe(3n);
    expect(maxBigInt(3n, 5n)).toBe(5n);
  });
});
