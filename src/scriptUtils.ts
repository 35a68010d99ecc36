// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { hex } from '@scure/base';

/**
 * One element of a script: an opcode name such as `'CHECKSIG'`, a small
 * number (0-16 compile to `OP_0`..`OP_16`, larger ones to a minimal push)
 * or data to push.
 */
export type ScriptElement = Parameters<typeof btc.Script.encode>[0][number];

export function compileScript(elements: ScriptElement[]): Uint8Array {
  return btc.Script.encode(elements);
}

/**
 * Human readable form of a script: `OP_DUP OP_HASH160 <hex> ...`. Returns
 * undefined for scripts that cannot be decompiled (e.g. truncated pushes
 * in `raw()`).
 */
export function toASM(script: Uint8Array): string | undefined {
  let decoded: ReturnType<typeof btc.Script.decode>;
  try {
    decoded = btc.Script.decode(script);
  } catch {
    return undefined;
  }
  return decoded
    .map(item => {
      if (item instanceof Uint8Array) return hex.encode(item);
      if (typeof item === 'number') return `OP_${item}`;
      return item.startsWith('OP_') ? item : `OP_${item}`;
    })
    .join(' ');
}

/** Segwit output: a version opcode (OP_0..OP_16) and one 2 to 40 byte push. */
export function isWitnessProgram(script: Uint8Array): boolean {
  const [version, length] = script;
  if (version === undefined || length === undefined) return false;
  if (script.length < 4 || script.length > 42) return false;
  if (version !== 0 && (version < 0x51 || version > 0x60)) return false;
  return length + 2 === script.length;
}
