import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommanderError } from 'commander';
import { ConfigurationError, MalformedOrderError, UnknownOrderTypeError } from '@fillway/errors';
import { OrderType } from '@fillway/types';
import {
  TEST_ADDRESSES,
  TEST_CHAIN_ID,
  TEST_TOKENS,
  TEST_WALLETS,
  createLimitOrder,
  createSettlementOrder
} from '@fillway/test-utils';
import { CliIo, createProgram, toJson } from '../../src/cli/fillway';
import { hashOrderOf, orderTypeString } from '../../src/encoding/eip712';
import { encodeOrderOf } from '../../src/encoding/order-codec';
import { signOrder } from '../../src/signing/order-signer';

describe('fillway CLI', () => {
  const ONE = 10n ** 18n;
  let dir: string;
  let lines: string[];
  let io: CliIo;

  function writeOrder(name: string, order: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, toJson(order));
    return file;
  }

  function run(...args: string[]): void {
    createProgram(io)
      .configureOutput({ writeErr: () => undefined, writeOut: () => undefined })
      .parse(args, { from: 'user' });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fillway-cli-'));
    lines = [];
    io = { write: (line) => lines.push(line), env: {} };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print the order hash', () => {
    const order = createLimitOrder().build();
    run('hash', 'limit', writeOrder('limit.json', order));
    expect(lines).toEqual([hashOrderOf(OrderType.LIMIT, order)]);
  });

  it('should print the wire encoding', () => {
    const order = createLimitOrder().build();
    run('encode', 'limit', writeOrder('limit.json', order));
    expect(lines).toEqual([encodeOrderOf(OrderType.LIMIT, order)]);
  });

  it('should print the type string of a variant', () => {
    run('types', 'dutch');
    expect(lines).toEqual([orderTypeString(OrderType.DUTCH)]);
  });

  it('should resolve a settlement order at the given time', () => {
    const order = createSettlementOrder().withInput(TEST_TOKENS.tokenIn, ONE, 2n * ONE).build();
    run('resolve', 'settlement', writeOrder('settlement.json', order), '--now', '1500');

    expect(lines).toHaveLength(1);
    const resolved: unknown = JSON.parse(lines[0]);
    expect(resolved).toMatchObject({
      type: 'settlement',
      input: { token: TEST_TOKENS.tokenIn, amount: '1500000000000000000', maxAmount: '2000000000000000000' },
      outputs: [{ amount: '2000000000000000000', chainId: '10' }],
      settlementOracle: TEST_ADDRESSES.oracle,
      fillPeriod: '100'
    });
  });

  it('should require the resolution time', () => {
    const file = writeOrder('settlement.json', createSettlementOrder().build());
    expect(() => run('resolve', 'settlement', file)).toThrow(CommanderError);
  });

  it('should sign with the key from the environment', () => {
    const order = createLimitOrder().build();
    io.env.FILLWAY_PRIVATE_KEY = TEST_WALLETS.maker.privateKey;

    run('sign', 'limit', writeOrder('limit.json', order), '--chain-id', '31337', '--permit', TEST_ADDRESSES.permit);

    const expected = signOrder(
      TEST_WALLETS.maker.signingKey,
      { type: OrderType.LIMIT, order },
      { chainId: TEST_CHAIN_ID, permitAddress: TEST_ADDRESSES.permit }
    );
    expect(lines).toEqual([toJson(expected)]);
  });

  it('should refuse to sign without a key', () => {
    const file = writeOrder('limit.json', createLimitOrder().build());
    expect(() => run('sign', 'limit', file, '--chain-id', '31337', '--permit', TEST_ADDRESSES.permit))
      .toThrow(ConfigurationError);
  });

  it('should reject unknown variants', () => {
    expect(() => run('types', 'barter')).toThrow(UnknownOrderTypeError);
  });

  it('should reject files that do not describe the variant', () => {
    const file = writeOrder('broken.json', { info: { reactor: 'nowhere' } });
    expect(() => run('hash', 'limit', file)).toThrow(MalformedOrderError);
  });
});
