// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { parseArgs } from 'node:util';

import { HARDENED_OFFSET } from './charset.js';
import { isNetworkName, networks, type Network } from './networks.js';

export const COMMANDS = [
  'derive-key',
  'key-expression',
  'script-expression',
  'derive-script'
] as const;

export type Command = (typeof COMMANDS)[number];

/** Bad command line: unknown flag, missing value, conflicting options. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliConfig =
  | { command: 'help' }
  | {
      command: Command;
      /** Positional values, in order. Ignored when `fromStdin`. */
      inputs: string[];
      fromStdin: boolean;
      network: Network;
      path?: string;
      index?: number;
      checksum?: 'verify' | 'compute';
    };

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  path: { type: 'string' },
  index: { type: 'string' },
  network: { type: 'string' },
  'verify-checksum': { type: 'boolean' },
  'compute-checksum': { type: 'boolean' }
} as const;

/** Which subcommands take each flag. */
const FLAG_COMMANDS: Record<string, readonly Command[]> = {
  path: ['derive-key'],
  index: ['derive-script'],
  'verify-checksum': ['script-expression'],
  'compute-checksum': ['script-expression']
};

function isCommand(name: string): name is Command {
  return COMMANDS.some(command => command === name);
}

function assertSingle(args: readonly string[], flag: string): void {
  const count = args.filter(
    arg => arg === `--${flag}` || arg.startsWith(`--${flag}=`)
  ).length;
  if (count > 1)
    throw new UsageError(
      `Multiple flags '--${flag}' found. A flag with a value can only be given once`
    );
}

function parseIndex(text: string): number {
  if (!/^\d+$/.test(text) || Number(text) >= HARDENED_OFFSET)
    throw new UsageError(
      `Invalid --index ${text}: expected an integer between 0 and ${HARDENED_OFFSET - 1}`
    );
  return Number(text);
}

function parseNetwork(name: string): Network {
  if (!isNetworkName(name))
    throw new UsageError(
      `Unknown network ${name}: expected one of ${Object.keys(networks).join(', ')}`
    );
  return networks[name];
}

function parseFlags(args: readonly string[]) {
  try {
    return parseArgs({
      args: [...args],
      options: OPTIONS,
      allowPositionals: true,
      strict: true
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Reads `descriptors <command> [values...] [-] [flags]`. `--help` anywhere
 * wins over everything else, including unknown flags.
 */
export function parseCliArgs(args: readonly string[]): CliConfig {
  if (args.includes('--help') || args.includes('-h')) return { command: 'help' };

  const { values, positionals } = parseFlags(args);
  ['path', 'index', 'network'].forEach(flag => assertSingle(args, flag));

  const [name, ...rest] = positionals;
  if (name === undefined)
    throw new UsageError('No argument provided. Please specify the sub-command');
  if (!isCommand(name))
    throw new UsageError(
      `Unknown sub-command ${name}: expected one of ${COMMANDS.join(', ')}`
    );
  const command = name;

  for (const [flag, commands] of Object.entries(FLAG_COMMANDS))
    if (flag in values && !commands.includes(command))
      throw new UsageError(`Flag '--${flag}' cannot be used with ${command}`);

  if (values['verify-checksum'] && values['compute-checksum'])
    throw new UsageError(
      "Flags '--verify-checksum' and '--compute-checksum' cannot be combined"
    );

  const fromStdin = rest.includes('-');
  const inputs = rest.filter(value => value !== '-');
  if (!fromStdin && inputs.length === 0)
    throw new UsageError(
      "No input argument provided. Give at least one value or '-' to read from standard input"
    );

  const checksum = values['verify-checksum']
    ? 'verify'
    : values['compute-checksum']
      ? 'compute'
      : undefined;
  return {
    command,
    inputs,
    fromStdin,
    network:
      values.network === undefined
        ? networks.bitcoin
        : parseNetwork(values.network),
    ...(values.path !== undefined ? { path: values.path } : {}),
    ...(values.index !== undefined ? { index: parseIndex(values.index) } : {}),
    ...(checksum ? { checksum } : {})
  };
}

export const HELP_MESSAGE = `\
Output script descriptors (BIP 380)

Usage:
    descriptors derive-key {xpub|xprv} [--path {path}] [--network {name}] [-]
    descriptors key-expression {expr} [--network {name}] [-]
    descriptors script-expression {expr} [--verify-checksum | --compute-checksum] [-]
    descriptors derive-script {descriptor} [--index {n}] [--network {name}] [-]
    descriptors --help

derive-key
    Prints {xpub}:{xprv} for the given extended key, after deriving --path
    when given. {xprv} is empty for extended public keys. A path is a list of
    NUM, NUMh, NUMH or NUM' steps separated by '/', with NUM below 2^31, and
    may start with 'm/' or '/'.

key-expression
    Echoes the key expression back when it parses.

script-expression
    Echoes the descriptor back when it parses and validates.
    --verify-checksum   the checksum is required and OK is printed when it
                        matches.
    --compute-checksum  any given checksum is ignored and SCRIPT#CHECKSUM is
                        printed.
    The two flags cannot be combined.

derive-script
    Prints the scriptPubKey of the descriptor in hex, followed by its address
    when it has one. Ranged descriptors need --index. Multipath descriptors
    print one line per alternative and combo() one line per script.

A single '-' reads values from standard input, one per line, and takes
precedence over values given as arguments. Blank lines are skipped.

--network is one of bitcoin (default), testnet or regtest. LOG_LEVEL=debug
prints diagnostics to stderr.

Exit codes: 0 success, 1 usage, syntax, checksum or key encoding error,
2 semantic error, 3 derivation error. Processing stops at the first value
that fails.`;
