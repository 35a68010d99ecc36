// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import {
  MAX_MULTISIG_KEYS,
  MAX_SCRIPT_ELEMENT_SIZE,
  MAX_STANDARD_P2WSH_SCRIPT_SIZE
} from './charset.js';
import { SemanticError, toResult, type Result } from './errors.js';
import { isCompressedKey, serializeKeyExpression } from './keyExpressions.js';
import type {
  DescriptorDocument,
  KeyExpression,
  ScriptExpression,
  ScriptFunction
} from './types.js';

type Wrapper = 'sh' | 'wsh';

const ALLOWED_INSIDE: Record<Wrapper, ReadonlySet<ScriptFunction>> = {
  sh: new Set<ScriptFunction>(['pk', 'pkh', 'wpkh', 'wsh', 'multi', 'sortedmulti']),
  wsh: new Set<ScriptFunction>(['pk', 'pkh', 'multi', 'sortedmulti'])
};

const TOP_LEVEL_ONLY: ReadonlySet<ScriptFunction> = new Set<ScriptFunction>([
  'combo',
  'addr',
  'raw'
]);

function assertCompressed(key: KeyExpression, context: string): void {
  if (!isCompressedKey(key))
    throw new SemanticError(
      'UncompressedKey',
      `Error: uncompressed key ${serializeKeyExpression(key)} is not allowed in ${context}`
    );
}

function assertThreshold(
  expression: Extract<ScriptExpression, { type: 'multi' | 'sortedmulti' }>
): void {
  const { threshold, keys } = expression;
  if (keys.length > MAX_MULTISIG_KEYS)
    throw new SemanticError(
      'InvalidThreshold',
      `Error: ${expression.type}() takes at most ${MAX_MULTISIG_KEYS} keys, got ${keys.length}`
    );
  if (threshold < 1 || threshold > keys.length)
    throw new SemanticError(
      'InvalidThreshold',
      `Error: ${expression.type}() threshold ${threshold} must be between 1 and ${keys.length}`
    );
}

function keyLength(key: KeyExpression): number {
  return isCompressedKey(key) ? 33 : 65;
}

/** Bytes taken by a number pushed in a script: OP_0..OP_16 or a 1-byte push. */
function numberLength(n: number): number {
  return n <= 16 ? 1 : 2;
}

/**
 * Length of the script an expression compiles to. Keys of every kind have a
 * known length, so this holds for ranged descriptors too.
 */
function scriptLength(expression: ScriptExpression): number | undefined {
  switch (expression.type) {
    case 'pk':
      return keyLength(expression.key) + 2;
    case 'pkh':
      return 25;
    case 'wpkh':
      return 22;
    case 'sh':
      return 23;
    case 'wsh':
      return 34;
    case 'multi':
    case 'sortedmulti':
      return (
        numberLength(expression.threshold) +
        expression.keys.reduce((sum, key) => sum + keyLength(key) + 1, 0) +
        numberLength(expression.keys.length) +
        1
      );
    case 'addr':
    case 'raw':
    case 'combo':
      return undefined;
  }
}

function assertScriptSize(
  inner: ScriptExpression,
  wrapper: Wrapper,
  limit: number
): void {
  const length = scriptLength(inner);
  if (length !== undefined && length > limit)
    throw new SemanticError(
      'ScriptTooLarge',
      wrapper === 'sh'
        ? `Error: P2SH script is too large, ${length} bytes is larger than ${limit} bytes`
        : `Error: script is too large, ${length} bytes is larger than ${limit} bytes`
    );
}

function walk(
  expression: ScriptExpression,
  parent: Wrapper | undefined,
  witness: boolean
): void {
  if (parent !== undefined && !ALLOWED_INSIDE[parent].has(expression.type))
    throw new SemanticError(
      'InvalidContext',
      TOP_LEVEL_ONLY.has(expression.type)
        ? `Error: ${expression.type}() can only be used at the top level`
        : `Error: ${expression.type}() is not allowed inside ${parent}()`
    );
  switch (expression.type) {
    case 'pk':
    case 'pkh':
    case 'combo':
      if (witness) assertCompressed(expression.key, 'wsh()');
      return;
    case 'wpkh':
      assertCompressed(expression.key, 'wpkh()');
      return;
    case 'sh':
      walk(expression.inner, 'sh', false);
      assertScriptSize(expression.inner, 'sh', MAX_SCRIPT_ELEMENT_SIZE);
      return;
    case 'wsh':
      walk(expression.inner, 'wsh', true);
      assertScriptSize(expression.inner, 'wsh', MAX_STANDARD_P2WSH_SCRIPT_SIZE);
      return;
    case 'multi':
    case 'sortedmulti':
      assertThreshold(expression);
      if (witness)
        expression.keys.forEach(key => assertCompressed(key, 'wsh()'));
      return;
    case 'addr':
    case 'raw':
      return;
  }
}

/**
 * Checks the rules that depend on where an expression appears: which
 * functions may be nested in `sh()` and `wsh()`, multisig thresholds,
 * compressed keys under segwit and the size of redeem and witness scripts.
 *
 * @throws {SemanticError}
 */
export function validate(document: DescriptorDocument): DescriptorDocument {
  walk(document.expression, undefined, false);
  return document;
}

export function checkDescriptor(
  document: DescriptorDocument
): Result<DescriptorDocument> {
  return toResult(() => validate(document));
}
