// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

// Constant tables shared by the checksum engine and the parsers.

/**
 * Every character a descriptor may contain, ordered so that `position & 31`
 * is the character's symbol and `position >> 5` its class.
 */
export const INPUT_CHARSET =
  '0123456789()[],\'/*abcdefgh@:$%{}' +
  'IJKLMNOPQRSTUVWXYZ&+-.;<=>?!^_|~' +
  'ijklmnopqrstuvwxyzABCDEFGH`#"\\ ';

export const CHECKSUM_CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';

export const CHECKSUM_LENGTH = 8;

export const CHECKSUM_SEPARATOR = '#';

/** BCH generator of the descriptor checksum code over GF(32). */
export const GENERATOR: readonly bigint[] = Object.freeze([
  0xf5dee51989n,
  0xa9fdca3312n,
  0x1bab10e32dn,
  0x3706b1677an,
  0x644d626ffdn
]);

export const HARDENED_OFFSET = 0x80000000;

/** Order of the secp256k1 group. */
export const CURVE_ORDER =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

export const MAX_MULTISIG_KEYS = 20;

//https://github.com/bitcoin/bitcoin/blob/master/src/script/script.h
export const MAX_SCRIPT_ELEMENT_SIZE = 520;
export const MAX_STANDARD_P2WSH_SCRIPT_SIZE = 3600;

const inputPositions: ReadonlyMap<string, number> = new Map(
  [...INPUT_CHARSET].map((character, position) => [character, position])
);

const checksumPositions: ReadonlyMap<string, number> = new Map(
  [...CHECKSUM_CHARSET].map((character, position) => [character, position])
);

export function inputCharsetPosition(character: string): number | undefined {
  return inputPositions.get(character);
}

export function checksumCharsetPosition(
  character: string
): number | undefined {
  return checksumPositions.get(character);
}
