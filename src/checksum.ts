// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import {
  CHECKSUM_CHARSET,
  CHECKSUM_LENGTH,
  CHECKSUM_SEPARATOR,
  GENERATOR,
  INPUT_CHARSET,
  checksumCharsetPosition,
  inputCharsetPosition
} from './charset.js';
import { ChecksumError, DescriptorSyntaxError } from './errors.js';

function polymod(c: bigint, value: number): bigint {
  const c0 = c >> 35n;
  let next = ((c & 0x7ffffffffn) << 5n) ^ BigInt(value);
  GENERATOR.forEach((generator, i) => {
    if ((c0 >> BigInt(i)) & 1n) next ^= generator;
  });
  return next;
}

/**
 * Maps the descriptor text to checksum symbols: the low 5 bits of every
 * character's charset position, plus one symbol per group of three
 * characters packing their classes (`position >> 5`).
 */
function expand(span: string): number[] {
  const symbols: number[] = [];
  let cls = 0;
  let clsCount = 0;
  for (let offset = 0; offset < span.length; offset++) {
    const character = span.charAt(offset);
    const position = inputCharsetPosition(character);
    if (position === undefined)
      throw new DescriptorSyntaxError(
        'InvalidCharacter',
        `Error: character '${character}' is not allowed in descriptors; expected one of "${INPUT_CHARSET}"`,
        offset
      );
    symbols.push(position & 31);
    cls = cls * 3 + (position >> 5);
    if (++clsCount === 3) {
      symbols.push(cls);
      cls = 0;
      clsCount = 0;
    }
  }
  if (clsCount > 0) symbols.push(cls);
  return symbols;
}

/**
 * Implements the Bitcoin descriptor's checksum algorithm described in
 * {@link https://github.com/bitcoin/bips/blob/master/bip-0380.mediawiki}
 */
export const DescriptorChecksum = (span: string): string => {
  let c = 1n;
  for (const symbol of expand(span)) c = polymod(c, symbol);
  for (let i = 0; i < CHECKSUM_LENGTH; i++) c = polymod(c, 0);
  c ^= 1n;
  let checksum = '';
  for (let i = 0; i < CHECKSUM_LENGTH; i++)
    checksum += CHECKSUM_CHARSET.charAt(
      Number((c >> BigInt(5 * (CHECKSUM_LENGTH - 1 - i))) & 31n)
    );
  return checksum;
};

export function isChecksumShaped(checksum: string): boolean {
  return (
    checksum.length === CHECKSUM_LENGTH &&
    [...checksum].every(
      character => checksumCharsetPosition(character) !== undefined
    )
  );
}

/**
 * True when `checksum` is the checksum of `span`. Never throws: text outside
 * the descriptor charset simply does not verify.
 */
export function verifyChecksum(span: string, checksum: string): boolean {
  if (!isChecksumShaped(checksum)) return false;
  if ([...span].some(character => inputCharsetPosition(character) === undefined))
    return false;
  return DescriptorChecksum(span) === checksum;
}

/**
 * Splits `descriptor#checksum`. There can be at most one separator and it must
 * be followed by exactly 8 checksum characters.
 */
export function splitChecksum(descriptor: string): {
  body: string;
  checksum?: string;
} {
  const at = descriptor.indexOf(CHECKSUM_SEPARATOR);
  if (at === -1) return { body: descriptor };
  const checksum = descriptor.slice(at + 1);
  const second = checksum.indexOf(CHECKSUM_SEPARATOR);
  if (second !== -1)
    throw new ChecksumError(
      'MalformedChecksum',
      `Error: multiple '${CHECKSUM_SEPARATOR}' symbols`,
      at + 1 + second
    );
  if (!isChecksumShaped(checksum))
    throw new ChecksumError(
      'MalformedChecksum',
      `Error: expected ${CHECKSUM_LENGTH} checksum characters after '${CHECKSUM_SEPARATOR}', got '${checksum}'`,
      at + 1
    );
  return { body: descriptor.slice(0, at), checksum };
}

export function addChecksum(body: string): string {
  return `${body}${CHECKSUM_SEPARATOR}${DescriptorChecksum(body)}`;
}

/** Throws on the first character that cannot appear in a descriptor. */
export function assertDescriptorCharset(span: string, base = 0): void {
  for (let offset = 0; offset < span.length; offset++) {
    const character = span.charAt(offset);
    if (inputCharsetPosition(character) === undefined)
      throw new DescriptorSyntaxError(
        'InvalidCharacter',
        `Error: character '${character}' is not allowed in descriptors`,
        base + offset
      );
  }
}
