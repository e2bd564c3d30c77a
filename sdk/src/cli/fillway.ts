#!/usr/bin/env node

import * as fs from 'fs';
import pino from 'pino';
import { Command, CommanderError } from 'commander';
import { SigningKey } from 'ethers';
import { ConfigurationError, UnknownOrderTypeError, isProtocolError } from '@fillway/errors';
import { LogLevel } from '@fillway/interfaces';
import { AnyOrder, EMPTY_BYTES, OrderType, ResolvedOrder, isOrderType } from '@fillway/types';
import { createLogger } from '@fillway/utils';
import { hashOrder, orderTypeString } from '../encoding/eip712';
import { encodeOrder, parseAnyOrder } from '../encoding/order-codec';
import { createAuctionResolver } from '../resolver/auction-resolver';
import { SettlementOrderResolver } from '../resolver/settlement-resolver';
import { signOrder } from '../signing/order-signer';

export interface CliIo {
  write(line: string): void;
  env: NodeJS.ProcessEnv;
}

interface ResolveOptions {
  now: string;
  block: string;
  priorityFee: string;
  filler?: string;
}

interface SignOptions {
  chainId: string;
  permit: string;
  keyEnv: string;
}

const DEFAULT_KEY_ENV = 'FILLWAY_PRIVATE_KEY';

export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, field: unknown) => (typeof field === 'bigint' ? field.toString() : field), 2);
}

function readOrder(type: string, file: string): AnyOrder {
  if (!isOrderType(type)) {
    throw new UnknownOrderTypeError(type);
  }
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read order file ${file}`, {
      file,
      reason: error instanceof Error ? error.message : String(error)
    });
  }
  return parseAnyOrder(type, json);
}

function parseBigInt(name: string, value: string): bigint {
  try {
    return BigInt(value);
  } catch {
    throw new ConfigurationError(`Option ${name} must be an integer, got ${value}`, { option: name, value });
  }
}

export function createProgram(io: CliIo = { write: (line) => console.log(line), env: process.env }): Command {
  const program = new Command();

  program
    .name('fillway')
    .description('Hash, encode, resolve and sign Fillway orders')
    .version('1.0.0')
    .exitOverride();

  program
    .command('hash <type> <file>')
    .description('Print the order hash of a JSON order')
    .action((type: string, file: string) => {
      io.write(hashOrder(readOrder(type, file)));
    });

  program
    .command('encode <type> <file>')
    .description('Print the wire encoding of a JSON order')
    .action((type: string, file: string) => {
      io.write(encodeOrder(readOrder(type, file)));
    });

  program
    .command('types <type>')
    .description('Print the EIP-712 type string of an order variant')
    .action((type: string) => {
      if (!isOrderType(type)) {
        throw new UnknownOrderTypeError(type);
      }
      io.write(orderTypeString(type));
    });

  program
    .command('resolve <type> <file>')
    .description('Resolve a JSON order against the given chain state')
    .requiredOption('--now <seconds>', 'Block timestamp')
    .option('--block <number>', 'Block number', '0')
    .option('--priority-fee <wei>', 'Priority fee of the filling transaction', '0')
    .option('--filler <address>', 'Filler address, for exclusivity')
    .action((type: string, file: string, options: ResolveOptions) => {
      const order = readOrder(type, file);
      const signed = { type: order.type, order: encodeOrder(order), sig: EMPTY_BYTES };
      const context = {
        now: parseBigInt('--now', options.now),
        blockNumber: parseBigInt('--block', options.block),
        priorityFee: parseBigInt('--priority-fee', options.priorityFee),
        filler: options.filler
      };
      const resolved: ResolvedOrder = order.type === OrderType.SETTLEMENT
        ? new SettlementOrderResolver().resolve(signed, context)
        : createAuctionResolver(createLogger('fillway-cli', { level: LogLevel.WARN }, pino.destination(2)))
          .resolve(signed, context);
      io.write(toJson(resolved));
    });

  program
    .command('sign <type> <file>')
    .description('Sign a JSON order as its maker; the private key is read from the environment')
    .requiredOption('--chain-id <id>', 'Chain id of the permit domain')
    .requiredOption('--permit <address>', 'Verifying contract of the permit domain')
    .option('--key-env <name>', 'Environment variable holding the private key', DEFAULT_KEY_ENV)
    .action((type: string, file: string, options: SignOptions) => {
      const privateKey = io.env[options.keyEnv];
      if (!privateKey) {
        throw new ConfigurationError(`Environment variable ${options.keyEnv} is not set`, { keyEnv: options.keyEnv });
      }
      const signed = signOrder(new SigningKey(privateKey), readOrder(type, file), {
        chainId: parseBigInt('--chain-id', options.chainId),
        permitAddress: options.permit
      });
      io.write(toJson(signed));
    });

  return program;
}

if (require.main === module) {
  try {
    createProgram().parse(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    console.error(isProtocolError(error) ? `${error.name}: ${error.message}` : error);
    process.exit(1);
  }
}
