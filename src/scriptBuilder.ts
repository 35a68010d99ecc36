// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { sha256 } from '@noble/hashes/sha2';

import {
  MAX_SCRIPT_ELEMENT_SIZE,
  MAX_STANDARD_P2WSH_SCRIPT_SIZE
} from './charset.js';
import { DerivationError, SemanticError } from './errors.js';
import { compareBytes, hash160 } from './keys.js';
import { compileScript } from './scriptUtils.js';
import type { ScriptExpression, ScriptFunction } from './types.js';

/**
 * An output script plus the scripts a spender must reveal: the
 * `redeemScript` of P2SH outputs and the `witnessScript` of P2WSH ones
 * (both are set for `sh(wsh(...))`).
 */
export interface Payment {
  type: Exclude<ScriptFunction, 'combo'>;
  output: Uint8Array;
  redeemScript?: Uint8Array;
  witnessScript?: Uint8Array;
}

/** Hands out resolved public keys in the order their expressions appear. */
class KeyQueue {
  readonly #keys: readonly Uint8Array[];
  #next = 0;

  constructor(keys: readonly Uint8Array[]) {
    this.#keys = keys;
  }

  take(): Uint8Array {
    const key = this.#keys[this.#next];
    if (!key)
      throw new DerivationError(
        'UnresolvedStep',
        `Error: expected a resolved key at position ${this.#next}`
      );
    this.#next++;
    return key;
  }

  assertDrained(): void {
    if (this.#next !== this.#keys.length)
      throw new DerivationError(
        'UnresolvedStep',
        `Error: ${this.#keys.length} keys were given but the expression uses ${this.#next}`
      );
  }
}

const p2pk = (pubkey: Uint8Array): Payment => ({
  type: 'pk',
  output: compileScript([pubkey, 'CHECKSIG'])
});

const p2pkh = (pubkey: Uint8Array): Payment => ({
  type: 'pkh',
  output: compileScript([
    'DUP',
    'HASH160',
    hash160(pubkey),
    'EQUALVERIFY',
    'CHECKSIG'
  ])
});

const p2wpkh = (pubkey: Uint8Array): Payment => ({
  type: 'wpkh',
  output: compileScript([0, hash160(pubkey)])
});

function p2sh(inner: Payment): Payment {
  const redeemScript = inner.output;
  if (redeemScript.length > MAX_SCRIPT_ELEMENT_SIZE)
    throw new SemanticError(
      'ScriptTooLarge',
      `Error: P2SH script is too large, ${redeemScript.length} bytes is larger than ${MAX_SCRIPT_ELEMENT_SIZE} bytes`
    );
  return {
    type: 'sh',
    output: compileScript(['HASH160', hash160(redeemScript), 'EQUAL']),
    redeemScript,
    ...(inner.witnessScript ? { witnessScript: inner.witnessScript } : {})
  };
}

function p2wsh(inner: Payment): Payment {
  const witnessScript = inner.output;
  if (witnessScript.length > MAX_STANDARD_P2WSH_SCRIPT_SIZE)
    throw new SemanticError(
      'ScriptTooLarge',
      `Error: script is too large, ${witnessScript.length} bytes is larger than ${MAX_STANDARD_P2WSH_SCRIPT_SIZE} bytes`
    );
  return {
    type: 'wsh',
    output: compileScript([0, sha256(witnessScript)]),
    witnessScript
  };
}

function toPayment(expression: ScriptExpression, keys: KeyQueue): Payment {
  switch (expression.type) {
    case 'pk':
      return p2pk(keys.take());
    case 'pkh':
      return p2pkh(keys.take());
    case 'wpkh':
      return p2wpkh(keys.take());
    case 'sh':
      return p2sh(toPayment(expression.inner, keys));
    case 'wsh':
      return p2wsh(toPayment(expression.inner, keys));
    case 'multi':
    case 'sortedmulti': {
      const pubkeys = expression.keys.map(() => keys.take());
      if (expression.type === 'sortedmulti') pubkeys.sort(compareBytes);
      return {
        type: expression.type,
        output: compileScript([
          expression.threshold,
          ...pubkeys,
          pubkeys.length,
          'CHECKMULTISIG'
        ])
      };
    }
    case 'addr':
    case 'raw':
      return { type: expression.type, output: expression.script };
    case 'combo':
      throw new SemanticError(
        'MultipleScripts',
        'Error: combo() produces several scripts, use buildAll()'
      );
  }
}

/**
 * Builds the payment of a concrete expression. `keys` are the resolved public
 * keys of the expression, left to right (see `resolveKeys()`).
 *
 * @throws {SemanticError} `MultipleScripts` for `combo()` and
 * `ScriptTooLarge` when a redeem or witness script exceeds its limit.
 */
export function buildPayment(
  expression: ScriptExpression,
  keys: readonly Uint8Array[]
): Payment {
  const queue = new KeyQueue(keys);
  const payment = toPayment(expression, queue);
  queue.assertDrained();
  return payment;
}

/** The scriptPubKey of a concrete expression. */
export function build(
  expression: ScriptExpression,
  keys: readonly Uint8Array[]
): Uint8Array {
  return buildPayment(expression, keys).output;
}

/**
 * Like {@link buildPayment} but also accepts `combo()`, which produces P2PK
 * and P2PKH outputs and, for compressed keys, P2WPKH and P2SH-P2WPKH too.
 */
export function buildAll(
  expression: ScriptExpression,
  keys: readonly Uint8Array[]
): Payment[] {
  if (expression.type !== 'combo') return [buildPayment(expression, keys)];
  const queue = new KeyQueue(keys);
  const pubkey = queue.take();
  queue.assertDrained();
  return pubkey.length === 33
    ? [p2pk(pubkey), p2pkh(pubkey), p2wpkh(pubkey), p2sh(p2wpkh(pubkey))]
    : [p2pk(pubkey), p2pkh(pubkey)];
}
