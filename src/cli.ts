// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';

import {
  decodeExtendedKey,
  derive,
  encodeExtendedKey,
  isPrivate,
  neuter,
  parseDerivationPath
} from './bip32.js';
import { addChecksum } from './checksum.js';
import {
  HELP_MESSAGE,
  UsageError,
  parseCliArgs,
  type CliConfig,
  type Command
} from './config.js';
import { Output, parseDescriptor } from './descriptors.js';
import { DescriptorError } from './errors.js';
import { parseKeyExpression } from './keyExpressions.js';
import { createLogger } from './logger.js';
import { toASM } from './scriptUtils.js';

const log = createLogger('CLI');

export interface CliIO {
  readStdin(): Promise<string>;
  /** Writes one line of results to stdout. */
  out(line: string): void;
  /** Writes one line of error output to stderr. */
  err(line: string): void;
}

type RunConfig = Exclude<CliConfig, { command: 'help' }>;

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_SEMANTIC = 2;
export const EXIT_DERIVATION = 3;

export function exitCodeFor(error: DescriptorError | UsageError): number {
  if (error instanceof UsageError) return EXIT_USAGE;
  switch (error.kind) {
    case 'InvalidContext':
    case 'InvalidThreshold':
    case 'UncompressedKey':
    case 'ScriptTooLarge':
    case 'MultipleScripts':
    case 'NoAddress':
      return EXIT_SEMANTIC;
    case 'HardenedFromPublic':
    case 'InvalidChildKey':
    case 'InvalidPathStep':
    case 'UnresolvedStep':
    case 'DepthExceeded':
      return EXIT_DERIVATION;
    default:
      return EXIT_USAGE;
  }
}

function deriveKey(value: string, config: RunConfig): string[] {
  const key = decodeExtendedKey(value, config.network);
  const derived =
    config.path === undefined ? key : derive(key, parseDerivationPath(config.path));
  const xprv = isPrivate(derived) ? encodeExtendedKey(derived) : '';
  return [`${encodeExtendedKey(neuter(derived))}:${xprv}`];
}

function keyExpression(value: string, config: RunConfig): string[] {
  parseKeyExpression(value, { network: config.network });
  return [value];
}

function scriptExpression(value: string, config: RunConfig): string[] {
  const { network } = config;
  switch (config.checksum) {
    case 'verify':
      parseDescriptor(value, { network, requireChecksum: true });
      return ['OK'];
    case 'compute': {
      const separator = value.indexOf('#');
      const script = separator === -1 ? value : value.slice(0, separator);
      parseDescriptor(script, { network });
      return [addChecksum(script)];
    }
    case undefined:
      parseDescriptor(value, { network });
      return [value];
  }
}

function deriveScript(value: string, config: RunConfig): string[] {
  const { network, index } = config;
  const { multipathLength } = parseDescriptor(value, { network });
  const alternatives =
    multipathLength === 0
      ? [undefined]
      : Array.from({ length: multipathLength }, (_, i) => i);
  return alternatives.flatMap(multipathIndex => {
    const output = new Output({
      descriptor: value,
      network,
      ...(index !== undefined ? { index } : {}),
      ...(multipathIndex !== undefined ? { multipathIndex } : {})
    });
    const addresses = output.getAddresses();
    return output.getScriptPubKeys().map((script, i) => {
      log.debug('Derived script', {
        descriptor: output.getDescriptor(),
        asm: toASM(script)
      });
      const address = addresses[i];
      return address === undefined
        ? hex.encode(script)
        : `${hex.encode(script)} ${address}`;
    });
  });
}

const HANDLERS: Record<
  Command,
  (value: string, config: RunConfig) => string[]
> = {
  'derive-key': deriveKey,
  'key-expression': keyExpression,
  'script-expression': scriptExpression,
  'derive-script': deriveScript
};

function stdinValues(text: string): string[] {
  return text
    .split(/\r?\n/)
    .filter(line => line.trim() !== '');
}

/**
 * Runs the command line tool and resolves to its exit code. Results of the
 * values processed before a failure are still written.
 */
export async function runCli(
  args: readonly string[],
  io: CliIO
): Promise<number> {
  let config: CliConfig;
  try {
    config = parseCliArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`Error: ${error.message}`);
    return EXIT_USAGE;
  }
  if (config.command === 'help') {
    io.out(HELP_MESSAGE);
    return EXIT_OK;
  }
  log.debug('Parsed arguments', {
    command: config.command,
    inputs: config.inputs.length,
    fromStdin: config.fromStdin
  });

  const values = config.fromStdin
    ? stdinValues(await io.readStdin())
    : config.inputs;
  const handler = HANDLERS[config.command];
  for (const value of values) {
    try {
      handler(value, config).forEach(line => io.out(line));
    } catch (error) {
      if (!(error instanceof DescriptorError)) throw error;
      log.info('Value rejected', { kind: error.kind, offset: error.offset });
      io.err(error.message);
      return exitCodeFor(error);
    }
  }
  return EXIT_OK;
}
