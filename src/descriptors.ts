// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import memoize from 'lodash.memoize';

import { outputScriptToAddress } from './address.js';
import { HARDENED_OFFSET } from './charset.js';
import { DerivationError, SemanticError, toResult, type Result } from './errors.js';
import { resolveKey } from './keyExpressions.js';
import { networks, type Network } from './networks.js';
import { collectKeys, describeKeys, parse } from './parser.js';
import { buildAll, type Payment } from './scriptBuilder.js';
import { isWitnessProgram } from './scriptUtils.js';
import { serializeDocument } from './serializer.js';
import type {
  DescriptorDocument,
  ExpandOptions,
  KeyExpression,
  ParseOptions,
  PathStep,
  ScriptExpression
} from './types.js';
import { validate } from './validator.js';

/** Parses and validates a descriptor. */
export function parseDescriptor(
  descriptor: string,
  options: ParseOptions = {}
): DescriptorDocument {
  return validate(parse(descriptor, options));
}

export function tryParseDescriptor(
  descriptor: string,
  options: ParseOptions = {}
): Result<DescriptorDocument> {
  return toResult(() => parseDescriptor(descriptor, options));
}

function substituteStep(step: PathStep, selectors: ExpandOptions): PathStep {
  const { index, multipathIndex } = selectors;
  if (step.type === 'wildcard' && index !== undefined)
    return step.hardened
      ? { type: 'index', index, hardened: step.hardened }
      : { type: 'index', index };
  if (step.type === 'multipath' && multipathIndex !== undefined) {
    const selected = step.indexes[multipathIndex];
    if (!selected)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: multipath index ${multipathIndex} is out of range`
      );
    return { type: 'index', ...selected };
  }
  return step;
}

function substituteKey(
  key: KeyExpression,
  selectors: ExpandOptions
): KeyExpression {
  if (key.type !== 'extended') return key;
  return {
    ...key,
    path: key.path.map(step => substituteStep(step, selectors))
  };
}

function substitute(
  expression: ScriptExpression,
  selectors: ExpandOptions
): ScriptExpression {
  switch (expression.type) {
    case 'pk':
    case 'pkh':
    case 'wpkh':
    case 'combo':
      return { ...expression, key: substituteKey(expression.key, selectors) };
    case 'sh':
    case 'wsh':
      return { ...expression, inner: substitute(expression.inner, selectors) };
    case 'multi':
    case 'sortedmulti':
      return {
        ...expression,
        keys: expression.keys.map(key => substituteKey(key, selectors))
      };
    case 'addr':
    case 'raw':
      return expression;
  }
}

function assertSelectors(
  document: DescriptorDocument,
  { index, multipathIndex }: ExpandOptions
): void {
  if (index !== undefined) {
    if (!document.isRanged)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: index ${index} was provided for a descriptor that is not ranged`
      );
    if (!Number.isInteger(index) || index < 0 || index >= HARDENED_OFFSET)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: invalid index ${index}`
      );
  }
  if (multipathIndex !== undefined) {
    if (document.multipathLength === 0)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: multipath index ${multipathIndex} was provided for a descriptor without multipath keys`
      );
    if (
      !Number.isInteger(multipathIndex) ||
      multipathIndex < 0 ||
      multipathIndex >= document.multipathLength
    )
      throw new DerivationError(
        'InvalidPathStep',
        `Error: multipath index ${multipathIndex} is out of range, the descriptor has ${document.multipathLength} alternatives`
      );
  }
}

function rebuild(
  document: DescriptorDocument,
  selectors: ExpandOptions
): DescriptorDocument {
  const expression = substitute(document.expression, selectors);
  return { expression, network: document.network, ...describeKeys(expression) };
}

/**
 * Produces the concrete document for one `index` (replacing the wildcard of
 * a ranged descriptor) and one `multipathIndex` (choosing among `<a;b;...>`
 * alternatives). The result has no checksum: serialize it to get one.
 *
 * @throws {DerivationError} `UnresolvedStep` when a selector the document
 * needs is missing, `InvalidPathStep` when a selector is out of range or the
 * document has nothing for it to select.
 */
export function expand(
  document: DescriptorDocument,
  selectors: ExpandOptions = {}
): DescriptorDocument {
  assertSelectors(document, selectors);
  if (document.isRanged && selectors.index === undefined)
    throw new DerivationError(
      'UnresolvedStep',
      'Error: index was not provided for ranged descriptor'
    );
  if (document.multipathLength > 0 && selectors.multipathIndex === undefined)
    throw new DerivationError(
      'UnresolvedStep',
      'Error: multipathIndex was not provided for a multipath descriptor'
    );
  return rebuild(document, selectors);
}

/**
 * One document per multipath alternative, in order. Wildcards are kept. A
 * document without multipath keys is returned as the only element.
 */
export function expandMultipath(
  document: DescriptorDocument
): DescriptorDocument[] {
  if (document.multipathLength === 0) return [document];
  return Array.from({ length: document.multipathLength }, (_, multipathIndex) =>
    rebuild(document, { multipathIndex })
  );
}

/** The public keys of a concrete expression, left to right. */
export function resolveKeys(expression: ScriptExpression): Uint8Array[] {
  return collectKeys(expression).map(resolveKey);
}

function isSegwitExpression(expression: ScriptExpression): boolean | undefined {
  switch (expression.type) {
    case 'wpkh':
    case 'wsh':
      return true;
    case 'sh':
      return isSegwitExpression(expression.inner);
    case 'addr':
    case 'raw':
      return isWitnessProgram(expression.script);
    case 'combo':
      return undefined;
    default:
      return false;
  }
}

export type OutputOptions = ParseOptions & {
  descriptor: string;
  /** Required for ranged descriptors. */
  index?: number;
  /** Required for multipath descriptors. */
  multipathIndex?: number;
};

/**
 * The outputs a descriptor stands for at one index. Everything is computed
 * when constructed, so an invalid descriptor throws here.
 *
 * ```
 * const output = new Output({
 *   descriptor: 'wpkh([d34db33f/84h/0h/0h]xpub.../0/*)',
 *   index: 7
 * });
 * output.getAddress();
 * ```
 */
export class Output {
  readonly #parsed: DescriptorDocument;
  readonly #document: DescriptorDocument;
  readonly #publicKeys: Uint8Array[];
  readonly #payments: Payment[];
  readonly #network: Network;

  constructor({
    descriptor,
    index,
    multipathIndex,
    network = networks.bitcoin,
    requireChecksum = false
  }: OutputOptions) {
    this.#network = network;
    this.#parsed = parseDescriptor(descriptor, { network, requireChecksum });
    this.#document = expand(this.#parsed, {
      ...(index !== undefined ? { index } : {}),
      ...(multipathIndex !== undefined ? { multipathIndex } : {})
    });
    this.#publicKeys = resolveKeys(this.#document.expression);
    this.#payments = buildAll(this.#document.expression, this.#publicKeys);

    this.getAddresses = memoize(this.getAddresses);
    this.getDescriptor = memoize(this.getDescriptor);
  }

  /** @throws {SemanticError} `MultipleScripts` for `combo()`. */
  getPayment(): Payment {
    const [payment, ...rest] = this.#payments;
    if (!payment || rest.length > 0)
      throw new SemanticError(
        'MultipleScripts',
        `Error: descriptor produces ${this.#payments.length} scripts, use getPayments()`
      );
    return payment;
  }
  getPayments(): Payment[] {
    return [...this.#payments];
  }
  getScriptPubKey(): Uint8Array {
    return this.getPayment().output;
  }
  getScriptPubKeys(): Uint8Array[] {
    return this.#payments.map(payment => payment.output);
  }
  /** Addresses of every script, undefined where a script has none. */
  getAddresses(): Array<string | undefined> {
    return this.#payments.map(payment =>
      outputScriptToAddress(payment.output, this.#network)
    );
  }
  /** @throws {SemanticError} `NoAddress` for scripts without an address. */
  getAddress(): string {
    const address = outputScriptToAddress(
      this.getScriptPubKey(),
      this.#network
    );
    if (address === undefined)
      throw new SemanticError(
        'NoAddress',
        'Error: could not extract an address from the payment'
      );
    return address;
  }
  getRedeemScript(): Uint8Array | undefined {
    return this.getPayment().redeemScript;
  }
  getWitnessScript(): Uint8Array | undefined {
    return this.getPayment().witnessScript;
  }
  /** Resolved public keys, in the order they appear in the descriptor. */
  getPublicKeys(): Uint8Array[] {
    return [...this.#publicKeys];
  }
  /** The concrete descriptor (index and multipath applied) with checksum. */
  getDescriptor(): string {
    return serializeDocument(this.#document);
  }
  /** Undefined for `combo()`, whose scripts are of several kinds. */
  isSegwit(): boolean | undefined {
    return isSegwitExpression(this.#document.expression);
  }
  isRanged(): boolean {
    return this.#parsed.isRanged;
  }
  getNetwork(): Network {
    return this.#network;
  }
}
