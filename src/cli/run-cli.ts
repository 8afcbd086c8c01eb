/**
 * Command-line front end
 *
 *   watch-wallet balance <descriptor> [--change <descriptor>]
 *   watch-wallet receive <descriptor> --index <n>
 *   watch-wallet send <descriptor> [--change <descriptor>] --amount <sats> --dest <address>
 *                     [--fee-rate <sat/vB>] [--no-rbf]
 *   watch-wallet broadcast <descriptor> --psbt <base64> [--change <descriptor>]
 *
 * Shared flags: --network, --electrum, --store, --store-path, --gap-limit,
 * --selector, --verbose
 */

import process from 'node:process';

import { ConfigLoader, type WalletConfigOverrides } from '../config/config-loader.ts';
import { parseElectrumUrl, type WalletConfig } from '../config/wallet-config.ts';
import { dispatch, WatchOnlyWallet } from '../core/watch-only-wallet.ts';
import { errorMessage, ValidationError } from '../errors/index.ts';
import type { Recipient } from '../interfaces/transaction.interface.ts';
import type { WalletCommand, WalletCommandResult } from '../interfaces/command.interface.ts';
import { isSelectorAlgorithm } from '../selectors/selector-factory.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { isWalletNetwork } from '../utils/networks.ts';
import { parseInteger } from '../utils/type-guards.ts';

export const USAGE = `Usage:
  watch-wallet balance <descriptor> [--change <descriptor>]
  watch-wallet receive <descriptor> --index <n>
  watch-wallet send <descriptor> [--change <descriptor>] --amount <sats> --dest <address> [--fee-rate <sat/vB>] [--no-rbf]
  watch-wallet broadcast <descriptor> --psbt <base64> [--change <descriptor>]

Options:
  --network <name>     mainnet, testnet, regtest or signet
  --electrum <url>     ssl://host:port or tcp://host:port
  --store <type>       memory or file
  --store-path <dir>   directory for the file store
  --gap-limit <n>      unused indices that end a branch scan
  --selector <name>    largest-first or branch-and-bound
  --verbose            log sync and build progress`;

const VALUE_FLAGS = new Set([
  'change',
  'index',
  'amount',
  'dest',
  'fee-rate',
  'psbt',
  'network',
  'electrum',
  'store',
  'store-path',
  'gap-limit',
  'selector',
]);
const SWITCH_FLAGS = new Set(['no-rbf', 'verbose', 'help']);
const REPEATABLE_FLAGS = new Set(['amount', 'dest']);

export interface CliInvocation {
  command: WalletCommand;
  overrides: WalletConfigOverrides;
  verbose: boolean;
}

interface ParsedArgs {
  positionals: string[];
  values: Map<string, string[]>;
  switches: Set<string>;
}

function splitArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = arg.slice(2, eq === -1 ? undefined : eq);

    if (SWITCH_FLAGS.has(name)) {
      switches.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new ValidationError(`Unknown option --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new ValidationError(`Option --${name} needs a value`);
    }

    const existing = values.get(name) ?? [];
    if (existing.length > 0 && !REPEATABLE_FLAGS.has(name)) {
      throw new ValidationError(`Option --${name} given more than once`);
    }
    values.set(name, [...existing, value]);
  }

  return { positionals, values, switches };
}

function single(args: ParsedArgs, name: string): string | undefined {
  return args.values.get(name)?.[0];
}

function required(args: ParsedArgs, name: string): string {
  const value = single(args, name);
  if (value === undefined) {
    throw new ValidationError(`Missing --${name}`);
  }
  return value;
}

function integerOption(value: string, name: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    throw new ValidationError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function recipientsFrom(args: ParsedArgs): Recipient[] {
  const destinations = args.values.get('dest') ?? [];
  const amounts = args.values.get('amount') ?? [];
  if (destinations.length === 0) throw new ValidationError('Missing --dest');
  if (amounts.length === 0) throw new ValidationError('Missing --amount');
  if (destinations.length !== amounts.length) {
    throw new ValidationError(`${destinations.length} --dest options but ${amounts.length} --amount options`);
  }
  return destinations.map((address, i) => ({ address, value: integerOption(amounts[i], 'amount') }));
}

function overridesFrom(args: ParsedArgs): WalletConfigOverrides {
  const overrides: WalletConfigOverrides = {};

  const network = single(args, 'network');
  if (network !== undefined) {
    if (!isWalletNetwork(network)) throw new ValidationError(`Unknown network "${network}"`);
    overrides.network = network;
  }

  const electrum = single(args, 'electrum');
  if (electrum !== undefined) {
    const endpoint = parseElectrumUrl(electrum);
    if (!endpoint) throw new ValidationError(`--electrum must be ssl://host:port or tcp://host:port`);
    overrides.electrum = endpoint;
  }

  const store = single(args, 'store');
  const storePath = single(args, 'store-path');
  if (store !== undefined) {
    if (store !== 'memory' && store !== 'file') throw new ValidationError(`--store must be memory or file`);
    overrides.store = { type: store, path: storePath };
  } else if (storePath !== undefined) {
    overrides.store = { type: 'file', path: storePath };
  }

  const gapLimit = single(args, 'gap-limit');
  if (gapLimit !== undefined) overrides.gapLimit = integerOption(gapLimit, 'gap-limit');

  const selector = single(args, 'selector');
  if (selector !== undefined) {
    if (!isSelectorAlgorithm(selector)) throw new ValidationError(`Unknown selector "${selector}"`);
    overrides.selector = selector;
  }

  return overrides;
}

/**
 * Map argv (without node and script) onto a wallet command
 */
export function parseCliArgs(argv: readonly string[]): CliInvocation {
  const args = splitArgs(argv);
  const [kind, descriptor, ...extra] = args.positionals;

  if (kind === undefined) throw new ValidationError('Missing command');
  if (descriptor === undefined) throw new ValidationError(`Missing descriptor for ${kind}`);
  if (extra.length > 0) throw new ValidationError(`Unexpected argument "${extra[0]}"`);

  const changeDescriptor = single(args, 'change');
  let command: WalletCommand;

  switch (kind) {
    case 'balance':
      command = { kind, descriptor, changeDescriptor };
      break;
    case 'receive':
      command = { kind, descriptor, index: integerOption(required(args, 'index'), 'index') };
      break;
    case 'send': {
      const feeRateText = single(args, 'fee-rate');
      const feeRate = feeRateText === undefined ? undefined : Number(feeRateText);
      if (feeRate !== undefined && (!Number.isFinite(feeRate) || feeRate <= 0)) {
        throw new ValidationError(`--fee-rate must be a positive number, got "${feeRateText}"`);
      }
      command = {
        kind,
        descriptor,
        changeDescriptor,
        recipients: recipientsFrom(args),
        feeRate,
        enableRbf: args.switches.has('no-rbf') ? false : undefined,
      };
      break;
    }
    case 'broadcast':
      command = { kind, descriptor, changeDescriptor, psbt: required(args, 'psbt') };
      break;
    default:
      throw new ValidationError(`Unknown command "${kind}"`);
  }

  return { command, overrides: overridesFrom(args), verbose: args.switches.has('verbose') };
}

/**
 * Human-readable lines for a command result
 */
export function formatResult(result: WalletCommandResult): string[] {
  switch (result.kind) {
    case 'balance':
      return [
        `${result.balance.total} sats`,
        `confirmed: ${result.balance.confirmed} sats`,
        `unconfirmed: ${result.balance.unconfirmed} sats`,
        ...result.utxos.map((utxo) =>
          `${utxo.txid}:${utxo.vout} ${utxo.value} sats ${utxo.address} (${utxo.confirmations} confirmations)`
        ),
      ];
    case 'receive':
      return [
        `underived descriptor: ${result.descriptor}`,
        `derived descriptor: ${result.derivedDescriptor}`,
        `index: ${result.index}`,
        `address: ${result.address}`,
      ];
    case 'send':
      return [
        `sent: ${result.sent} sats`,
        `fee: ${result.fee} sats (${result.feeRate} sat/vB, ${result.vsize} vB)`,
        result.change
          ? `change: ${result.change.value} sats to ${result.change.address} (output ${result.change.outputIndex})`
          : 'change: none',
        `unsigned txid: ${result.unsignedTxid}`,
        result.psbt,
      ];
    case 'broadcast':
      return [result.txid];
  }
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  env?: Record<string, string | undefined>;
  cwd?: string;
  createWallet?(config: WalletConfig, logger: Logger): WatchOnlyWallet;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Run one invocation and return the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  if (argv.length === 0 || argv.includes('--help')) {
    io.out(USAGE);
    return argv.length === 0 ? 1 : 0;
  }

  let wallet: WatchOnlyWallet | undefined;
  try {
    const { command, overrides, verbose } = parseCliArgs(argv);
    const config = new ConfigLoader({ env: io.env, cwd: io.cwd }).load(overrides);
    const logger = new ConsoleLogger({ level: verbose ? 'debug' : 'warn', prefix: 'watch-wallet' });

    wallet = io.createWallet ? io.createWallet(config, logger) : WatchOnlyWallet.fromConfig(config, { logger });
    const result = await dispatch(wallet, command);

    for (const line of formatResult(result)) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    io.err(`Error: ${errorMessage(error).replace(/\.$/, '')}.`);
    return 1;
  } finally {
    await wallet?.close();
  }
}
