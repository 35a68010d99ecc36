// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { ExtendedKey } from './bip32.js';
import type { Network } from './networks.js';

/**
 * The hardened marker as it was written: `0'` or `0h`. Kept so that a
 * descriptor serializes back to the text it was parsed from.
 */
export type Hardener = "'" | 'h';

/** A concrete child index, as found in key origins and multipath tuples. */
export type FixedStep = {
  index: number;
  hardened?: Hardener;
};

/**
 * One `/`-separated step after a key:
 *
 * - `index`: `/7` or `/7h`
 * - `wildcard`: `/*` or `/*h`; only allowed as the last step
 * - `multipath`: `/<0;1>`, expanding to sibling descriptors (BIP389)
 */
export type PathStep =
  | ({ type: 'index' } & FixedStep)
  | { type: 'wildcard'; hardened?: Hardener }
  | { type: 'multipath'; indexes: FixedStep[] };

/**
 * Key origin information: `[d34db33f/44'/0'/0']`. The fingerprint is the
 * master key fingerprint and the path leads from it to the key that follows.
 */
export type KeyOrigin = {
  fingerprint: Uint8Array;
  path: FixedStep[];
};

/**
 * A parsed key expression. For example,
 * `[d34db33f/49'/0'/0']tpubDCdxmvzJ5QBjTN8oCjjyT2V58AyZvA1fkmCeZRC75QMoaHcVP2m45Bv3hmnR7ttAwkb2UNYyoXdHVt4gwBqRrJqLUU2JrM43HippxiWpHra/1/*`
 * is an `extended` key with an origin and the path `[1, *]`.
 */
export type KeyExpression =
  | { type: 'pubkey'; pubkey: Uint8Array; origin?: KeyOrigin }
  | {
      type: 'wif';
      privateKey: Uint8Array;
      compressed: boolean;
      network: Network;
      origin?: KeyOrigin;
    }
  | {
      type: 'extended';
      key: ExtendedKey;
      path: PathStep[];
      origin?: KeyOrigin;
    };

/**
 * The script expression tree. Every node owns its children: there are no
 * shared nodes and no cycles.
 */
export type ScriptExpression =
  | { type: 'pk'; key: KeyExpression }
  | { type: 'pkh'; key: KeyExpression }
  | { type: 'wpkh'; key: KeyExpression }
  | { type: 'combo'; key: KeyExpression }
  | { type: 'sh'; inner: ScriptExpression }
  | { type: 'wsh'; inner: ScriptExpression }
  | { type: 'multi'; threshold: number; keys: KeyExpression[] }
  | { type: 'sortedmulti'; threshold: number; keys: KeyExpression[] }
  | { type: 'addr'; address: string; script: Uint8Array }
  | { type: 'raw'; script: Uint8Array };

export type ScriptFunction = ScriptExpression['type'];

/**
 * A parsed descriptor. `isRanged` is set when some key ends in a wildcard and
 * `multipathLength` is the number of alternatives of its multipath steps (0
 * when there are none). Documents are never mutated: see `expand()`.
 */
export type DescriptorDocument = {
  expression: ScriptExpression;
  checksum?: string;
  network: Network;
  isRanged: boolean;
  multipathLength: number;
};

export type ParseOptions = {
  /** @default networks.bitcoin */
  network?: Network;
  /**
   * Fail when the descriptor has no `#checksum`.
   * @default false
   */
  requireChecksum?: boolean;
};

export type ExpandOptions = {
  /** Replaces the wildcard of ranged descriptors. */
  index?: number;
  /** Selects the alternative of multipath steps, counting from 0. */
  multipathIndex?: number;
};
