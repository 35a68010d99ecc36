// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';

import {
  decodeExtendedKey,
  derive,
  encodeExtendedKey,
  fingerprint,
  hasExtendedKeyPrefix,
  neuter,
  parseDerivationPath,
  type ExtendedKey
} from './bip32.js';
import { HARDENED_OFFSET } from './charset.js';
import { assertDescriptorCharset } from './checksum.js';
import { Cursor } from './cursor.js';
import {
  DerivationError,
  DescriptorSyntaxError,
  KeyEncodingError
} from './errors.js';
import {
  decodeWif,
  encodeWif,
  hasHexPublicKeyPrefix,
  parseHexPublicKey,
  publicKeyFromPrivateKey
} from './keys.js';
import { networks, type Network } from './networks.js';
import type {
  FixedStep,
  Hardener,
  KeyExpression,
  KeyOrigin,
  PathStep
} from './types.js';

const MAX_INDEX = HARDENED_OFFSET - 1;

function toHardener(marker: string | undefined): Hardener | undefined {
  return marker === "'" || marker === 'h' ? marker : undefined;
}

function fixedStep(index: number, hardened: Hardener | undefined): FixedStep {
  return hardened ? { index, hardened } : { index };
}

/** Re-raises key decoding failures at the offset of the offending key. */
function atOffset<T>(offset: number, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof KeyEncodingError && error.offset === undefined)
      throw new KeyEncodingError(error.message, offset);
    throw error;
  }
}

function parseFixedStep(segment: string, offset: number): FixedStep {
  const match = segment.match(/^(\d+)(['h])?$/);
  const digits = match?.[1];
  if (!match || digits === undefined)
    throw new DerivationError(
      'InvalidPathStep',
      segment === ''
        ? 'Error: empty derivation step'
        : `Error: invalid derivation step '${segment}'`,
      offset
    );
  const index = Number(digits);
  if (index > MAX_INDEX)
    throw new DerivationError(
      'InvalidPathStep',
      `Error: derivation index ${digits} is out of range`,
      offset
    );
  return fixedStep(index, toHardener(match[2]));
}

function parseMultipathStep(segment: string, offset: number): PathStep {
  const match = segment.match(/^<([^<>]*)>(['h])?$/);
  const inner = match?.[1];
  if (!match || inner === undefined)
    throw new DerivationError(
      'InvalidPathStep',
      `Error: invalid multipath step '${segment}'`,
      offset
    );
  const shared = toHardener(match[2]);
  const parts = inner.split(';');
  if (parts.length < 2)
    throw new DerivationError(
      'InvalidPathStep',
      `Error: multipath step '${segment}' needs at least two values`,
      offset
    );
  let partOffset = offset + 1;
  const seen = new Set<string>();
  const indexes = parts.map(part => {
    const step = parseFixedStep(part, partOffset);
    if (shared && step.hardened)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: multipath value '${part}' is marked hardened twice`,
        partOffset
      );
    const value = fixedStep(step.index, step.hardened ?? shared);
    const id = `${value.index}${value.hardened ? 'h' : ''}`;
    if (seen.has(id))
      throw new DerivationError(
        'InvalidPathStep',
        `Error: duplicated value '${part}' in multipath step`,
        partOffset
      );
    seen.add(id);
    partOffset += part.length + 1;
    return value;
  });
  return { type: 'multipath', indexes };
}

function parseKeyPath(text: string, base: number): PathStep[] {
  const segments = text.split('/');
  const steps: PathStep[] = [];
  let offset = base;
  let multipathSeen = false;
  segments.forEach((segment, i) => {
    const wildcard = segment.match(/^\*(['h])?$/);
    if (wildcard) {
      if (i !== segments.length - 1)
        throw new DerivationError(
          'InvalidPathStep',
          'Error: a wildcard can only be the last derivation step',
          offset
        );
      const hardened = toHardener(wildcard[1]);
      steps.push(hardened ? { type: 'wildcard', hardened } : { type: 'wildcard' });
    } else if (segment.startsWith('<')) {
      if (multipathSeen)
        throw new DerivationError(
          'InvalidPathStep',
          'Error: a key can have at most one multipath step',
          offset
        );
      multipathSeen = true;
      steps.push(parseMultipathStep(segment, offset));
    } else {
      steps.push({ type: 'index', ...parseFixedStep(segment, offset) });
    }
    offset += segment.length + 1;
  });
  return steps;
}

function parseOrigin(content: string, base: number): KeyOrigin {
  if (!/^[0-9a-fA-F]{8}(\/|$)/.test(content))
    throw new DescriptorSyntaxError(
      'UnexpectedToken',
      'Error: expected a key origin fingerprint of exactly 8 hex characters',
      base
    );
  const path: FixedStep[] = [];
  if (content.length > 8) {
    let offset = base + 9;
    for (const segment of content.slice(9).split('/')) {
      path.push(parseFixedStep(segment, offset));
      offset += segment.length + 1;
    }
  }
  return { fingerprint: hex.decode(content.slice(0, 8).toLowerCase()), path };
}

/**
 * Parses the text of one key expression starting at absolute offset `base`:
 * an optional `[fingerprint/path]` origin, then a hex public key, a WIF
 * private key, or an extended key followed by its derivation steps.
 */
function parseKeyText(
  text: string,
  base: number,
  network: Network
): KeyExpression {
  let rest = text;
  let at = base;
  let origin: KeyOrigin | undefined;
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close === -1)
      throw new DescriptorSyntaxError(
        'UnexpectedToken',
        "Error: key origin is missing its closing ']'",
        base
      );
    origin = parseOrigin(rest.slice(1, close), base + 1);
    rest = rest.slice(close + 1);
    at = base + close + 1;
  }
  const stray = rest.search(/[[\]]/);
  if (stray !== -1)
    throw new DescriptorSyntaxError(
      'UnexpectedToken',
      stray === 0 && origin
        ? 'Error: a key can have only one key origin'
        : `Error: unexpected '${rest.charAt(stray)}' in key expression`,
      at + stray
    );
  if (rest === '')
    throw new DescriptorSyntaxError(
      'UnexpectedToken',
      'Error: expected a key after the key origin',
      at
    );
  const withOrigin = origin ? { origin } : {};

  const slash = rest.indexOf('/');
  const body = slash === -1 ? rest : rest.slice(0, slash);
  if (hasExtendedKeyPrefix(body)) {
    const key = atOffset(at, () => decodeExtendedKey(body, network));
    const path =
      slash === -1 ? [] : parseKeyPath(rest.slice(slash + 1), at + slash + 1);
    return { type: 'extended', key, path, ...withOrigin };
  }
  if (slash !== -1)
    throw new DescriptorSyntaxError(
      'UnexpectedToken',
      'Error: derivation steps can only follow an extended key',
      at + slash
    );
  if (hasHexPublicKeyPrefix(body))
    return {
      type: 'pubkey',
      pubkey: atOffset(at, () => parseHexPublicKey(body)),
      ...withOrigin
    };
  const { privateKey, compressed } = atOffset(at, () =>
    decodeWif(body, network)
  );
  return { type: 'wif', privateKey, compressed, network, ...withOrigin };
}

/** Reads a key expression argument, stopping at `,` or `)`. */
export function readKeyExpression(
  cursor: Cursor,
  network: Network
): KeyExpression {
  const start = cursor.offset;
  const text = cursor.readUntil(',)');
  if (text === '') throw cursor.unexpected('a key expression');
  return parseKeyText(text, start, network);
}

/**
 * Parses a standalone key expression such as
 * `[deadbeef/0h/1h/2]xprvA1RpRA33e1JQ7ifknakTFpgNXPmW2YvmhqLQYMmrj4xJXXWYpDPS3xz7iAxn8L39njGVyuoseXzU6rcxFLJ8HFsTjSyQbLYnMpCqE2VbFWc/3h/4h/5h/*h`.
 */
export function parseKeyExpression(
  keyExpression: string,
  { network = networks.bitcoin }: { network?: Network } = {}
): KeyExpression {
  if (keyExpression === '')
    throw new DescriptorSyntaxError(
      'UnexpectedToken',
      'Error: expected a key expression but found end of input',
      0
    );
  assertDescriptorCharset(keyExpression);
  const cursor = new Cursor(keyExpression);
  const key = readKeyExpression(cursor, network);
  if (!cursor.atEnd()) throw cursor.unexpected('end of key expression');
  return key;
}

function serializeFixedStep(step: FixedStep): string {
  return `${step.index}${step.hardened ?? ''}`;
}

function serializePathStep(step: PathStep): string {
  switch (step.type) {
    case 'index':
      return serializeFixedStep(step);
    case 'wildcard':
      return `*${step.hardened ?? ''}`;
    case 'multipath':
      return `<${step.indexes.map(serializeFixedStep).join(';')}>`;
  }
}

export function serializeKeyExpression(key: KeyExpression): string {
  const origin = key.origin
    ? `[${[hex.encode(key.origin.fingerprint), ...key.origin.path.map(serializeFixedStep)].join('/')}]`
    : '';
  switch (key.type) {
    case 'pubkey':
      return origin + hex.encode(key.pubkey);
    case 'wif':
      return origin + encodeWif(key.privateKey, key.compressed, key.network);
    case 'extended':
      return [
        origin + encodeExtendedKey(key.key),
        ...key.path.map(serializePathStep)
      ].join('/');
  }
}

export function keyExpressionHasWildcard(key: KeyExpression): boolean {
  return key.type === 'extended' && key.path.some(s => s.type === 'wildcard');
}

/** Number of multipath alternatives of the key, 0 if it has none. */
export function keyExpressionMultipathLength(key: KeyExpression): number {
  if (key.type !== 'extended') return 0;
  for (const step of key.path)
    if (step.type === 'multipath') return step.indexes.length;
  return 0;
}

export function isCompressedKey(key: KeyExpression): boolean {
  switch (key.type) {
    case 'pubkey':
      return key.pubkey.length === 33;
    case 'wif':
      return key.compressed;
    case 'extended':
      return true;
  }
}

function stepIndex(step: FixedStep): number {
  return step.hardened ? step.index + HARDENED_OFFSET : step.index;
}

/**
 * The concrete child indexes of an extended key's path.
 *
 * @throws {DerivationError} `UnresolvedStep` when the path still contains a
 * wildcard or a multipath step.
 */
export function concretePath(path: readonly PathStep[]): number[] {
  return path.map(step => {
    if (step.type !== 'index')
      throw new DerivationError(
        'UnresolvedStep',
        `Error: ${step.type} step must be resolved to an index before deriving`
      );
    return stepIndex(step);
  });
}

/** Computes the public key a concrete key expression stands for. */
export function resolveKey(key: KeyExpression): Uint8Array {
  switch (key.type) {
    case 'pubkey':
      return key.pubkey;
    case 'wif':
      return publicKeyFromPrivateKey(key.privateKey, key.compressed);
    case 'extended':
      return derive(key.key, concretePath(key.path)).publicKey;
  }
}

/**
 * Builds a key expression text from a master node: `[fingerprint/originPath]`
 * followed by the extended key at `originPath` and then `keyPath`.
 *
 * For example `keyExpressionBIP32({ masterNode, originPath: "/84'/0'/0'",
 * keyPath: '/0/*' })` returns `[73c5da0a/84'/0'/0']xpub.../0/*`.
 */
export function keyExpressionBIP32({
  masterNode,
  originPath,
  keyPath = '',
  isPublic = true
}: {
  masterNode: ExtendedKey;
  originPath: string;
  keyPath?: string;
  /**
   * Compute an xpub or xprv
   * @default true
   */
  isPublic?: boolean;
}): string {
  const originNode = derive(masterNode, parseDerivationPath(originPath));
  const key = encodeExtendedKey(isPublic ? neuter(originNode) : originNode);
  const origin = originPath.replace(/^m/, '');
  return `[${hex.encode(fingerprint(masterNode))}${origin}]${key}${keyPath}`;
}
