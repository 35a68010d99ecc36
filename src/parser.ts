// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';

import { addressToOutputScript } from './address.js';
import {
  DescriptorChecksum,
  assertDescriptorCharset,
  splitChecksum
} from './checksum.js';
import { Cursor } from './cursor.js';
import {
  ChecksumError,
  DerivationError,
  DescriptorSyntaxError,
  toResult,
  type Result
} from './errors.js';
import {
  keyExpressionHasWildcard,
  keyExpressionMultipathLength,
  readKeyExpression
} from './keyExpressions.js';
import { networks, type Network } from './networks.js';
import type {
  DescriptorDocument,
  KeyExpression,
  ParseOptions,
  ScriptExpression,
  ScriptFunction
} from './types.js';

/** Two wrappers (`sh(wsh(...))`) and the script they wrap. */
const MAX_NESTING = 3;

const SCRIPT_FUNCTIONS: ReadonlySet<string> = new Set<ScriptFunction>([
  'pk',
  'pkh',
  'wpkh',
  'combo',
  'sh',
  'wsh',
  'multi',
  'sortedmulti',
  'addr',
  'raw'
]);

function isScriptFunction(name: string): name is ScriptFunction {
  return SCRIPT_FUNCTIONS.has(name);
}

function closeParenthesis(cursor: Cursor): void {
  if (cursor.consume(')')) return;
  if (cursor.atEnd())
    throw new DescriptorSyntaxError(
      'UnbalancedParentheses',
      "Error: missing ')'",
      cursor.offset
    );
  throw cursor.unexpected("')'");
}

function readThreshold(cursor: Cursor): number {
  const digits = cursor.readWhile(character => /\d/.test(character));
  if (digits === '') throw cursor.unexpected('a multisig threshold');
  return Number(digits);
}

/** Offsets of the keys read so far, in reading order. */
type ParseState = {
  network: Network;
  keyOffsets: number[];
};

function readKey(cursor: Cursor, state: ParseState): KeyExpression {
  state.keyOffsets.push(cursor.offset);
  return readKeyExpression(cursor, state.network);
}

function readScript(
  cursor: Cursor,
  state: ParseState,
  depth: number
): ScriptExpression {
  const start = cursor.offset;
  const name = cursor.readWhile(character => /\w/.test(character));
  if (name === '') throw cursor.unexpected('a script expression');
  if (!isScriptFunction(name))
    throw new DescriptorSyntaxError(
      'UnknownFunction',
      `Error: unknown script function ${name}()`,
      start
    );
  if (depth > MAX_NESTING)
    throw new DescriptorSyntaxError(
      'NestingTooDeep',
      `Error: ${name}() is nested more than ${MAX_NESTING} levels deep`,
      start
    );
  cursor.expect('(', `'(' after ${name}`);
  const expression = readArguments(name, cursor, state, depth);
  closeParenthesis(cursor);
  return expression;
}

function readArguments(
  name: ScriptFunction,
  cursor: Cursor,
  state: ParseState,
  depth: number
): ScriptExpression {
  switch (name) {
    case 'pk':
    case 'pkh':
    case 'wpkh':
    case 'combo':
      return { type: name, key: readKey(cursor, state) };
    case 'sh':
    case 'wsh':
      return { type: name, inner: readScript(cursor, state, depth + 1) };
    case 'multi':
    case 'sortedmulti': {
      const threshold = readThreshold(cursor);
      const keys: KeyExpression[] = [];
      while (cursor.consume(',')) keys.push(readKey(cursor, state));
      return { type: name, threshold, keys };
    }
    case 'addr': {
      const offset = cursor.offset;
      const address = cursor.readUntil(')');
      if (address === '') throw cursor.unexpected('an address');
      const script = addressToOutputScript(address, state.network, offset);
      return { type: 'addr', address, script };
    }
    case 'raw': {
      const offset = cursor.offset;
      const script = cursor.readUntil(')');
      if (!/^([0-9a-fA-F]{2})+$/.test(script))
        throw new DescriptorSyntaxError(
          'UnexpectedToken',
          `Error: raw() expects a non-empty even-length hex script, got '${script}'`,
          offset
        );
      return { type: 'raw', script: hex.decode(script.toLowerCase()) };
    }
  }
}

/** Every key expression in the tree, left to right. */
export function collectKeys(expression: ScriptExpression): KeyExpression[] {
  switch (expression.type) {
    case 'pk':
    case 'pkh':
    case 'wpkh':
    case 'combo':
      return [expression.key];
    case 'sh':
    case 'wsh':
      return collectKeys(expression.inner);
    case 'multi':
    case 'sortedmulti':
      return expression.keys;
    case 'addr':
    case 'raw':
      return [];
  }
}

/**
 * Computes `isRanged` and `multipathLength` of a tree. `keyOffsets` are the
 * offsets of its keys in the descriptor text, in `collectKeys()` order.
 *
 * @throws {DerivationError} `InvalidPathStep` when multipath steps of
 * different keys have different lengths.
 */
export function describeKeys(
  expression: ScriptExpression,
  keyOffsets: readonly number[] = []
): {
  isRanged: boolean;
  multipathLength: number;
} {
  const keys = collectKeys(expression);
  let multipathLength = 0;
  keys.forEach((key, i) => {
    const length = keyExpressionMultipathLength(key);
    if (length === 0) return;
    if (multipathLength === 0) multipathLength = length;
    else if (length !== multipathLength)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: multipath step has ${length} values but a previous key has ${multipathLength}`,
        keyOffsets[i]
      );
  });
  return { isRanged: keys.some(keyExpressionHasWildcard), multipathLength };
}

/**
 * Parses descriptor text into a {@link DescriptorDocument}.
 *
 * The checksum, when present, is verified before anything else is parsed.
 * Contextual rules (what may be nested inside `sh()`, compressed keys in
 * segwit...) are not checked here: see `validate()`.
 */
export function parse(
  descriptor: string,
  { network = networks.bitcoin, requireChecksum = false }: ParseOptions = {}
): DescriptorDocument {
  const { body, checksum } = splitChecksum(descriptor);
  if (checksum === undefined && requireChecksum)
    throw new ChecksumError(
      'MissingChecksum',
      `Error: missing checksum`,
      body.length
    );
  assertDescriptorCharset(body);
  if (checksum !== undefined) {
    const expected = DescriptorChecksum(body);
    if (checksum !== expected)
      throw new ChecksumError(
        'ChecksumMismatch',
        `Error: invalid descriptor checksum ${checksum}, expected ${expected}`,
        body.length + 1
      );
  }

  const cursor = new Cursor(body);
  const state: ParseState = { network, keyOffsets: [] };
  const expression = readScript(cursor, state, 1);
  if (!cursor.atEnd()) {
    if (cursor.peek() === ')')
      throw new DescriptorSyntaxError(
        'UnbalancedParentheses',
        "Error: unmatched ')'",
        cursor.offset
      );
    throw cursor.unexpected('end of descriptor');
  }

  return {
    expression,
    ...(checksum !== undefined ? { checksum } : {}),
    network,
    ...describeKeys(expression, state.keyOffsets)
  };
}

export function tryParse(
  descriptor: string,
  options: ParseOptions = {}
): Result<DescriptorDocument> {
  return toResult(() => parse(descriptor, options));
}
