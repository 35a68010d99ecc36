// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

// BIP32 hierarchical deterministic key derivation over extended keys.
// https://github.com/bitcoin/bips/blob/master/bip-0032.mediawiki

import { secp256k1 } from '@noble/curves/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha2';
import { concatBytes } from '@noble/hashes/utils';

import { CURVE_ORDER, HARDENED_OFFSET } from './charset.js';
import {
  DerivationError,
  KeyEncodingError,
  toResult,
  type Result
} from './errors.js';
import {
  bigIntTo32Bytes,
  bs58check,
  bytesToBigInt,
  hash160,
  isValidPrivateKey,
  pointFromPublicKey,
  publicKeyFromPrivateKey,
  readUInt32BE,
  writeUInt32BE
} from './keys.js';
import { networks, type Network } from './networks.js';

const { ProjectivePoint } = secp256k1;

const EXTENDED_KEY_LENGTH = 78;
const MAX_DEPTH = 255;

/**
 * A decoded xpub/xprv. Values of this type are never mutated: every
 * derivation step returns a new key.
 */
export interface ExtendedKey {
  readonly network: Network;
  readonly depth: number;
  readonly parentFingerprint: Uint8Array;
  readonly childNumber: number;
  readonly chainCode: Uint8Array;
  /** Compressed public key (33 bytes). */
  readonly publicKey: Uint8Array;
  /** Present only for extended private keys. */
  readonly privateKey?: Uint8Array;
}

export function isHardened(index: number): boolean {
  return index >= HARDENED_OFFSET;
}

export function fingerprint(key: ExtendedKey): Uint8Array {
  return hash160(key.publicKey).slice(0, 4);
}

export function isPrivate(key: ExtendedKey): boolean {
  return key.privateKey !== undefined;
}

export function neuter(key: ExtendedKey): ExtendedKey {
  return {
    network: key.network,
    depth: key.depth,
    parentFingerprint: key.parentFingerprint,
    childNumber: key.childNumber,
    chainCode: key.chainCode,
    publicKey: key.publicKey
  };
}

export function hasExtendedKeyPrefix(text: string): boolean {
  return /^[xt]p(ub|rv)/.test(text);
}

/**
 * Decodes a base58check extended key. The version bytes must be the public or
 * private version of `network`.
 */
export function decodeExtendedKey(
  text: string,
  network: Network = networks.bitcoin
): ExtendedKey {
  let data: Uint8Array;
  try {
    data = bs58check.decode(text);
  } catch (error) {
    throw new KeyEncodingError(
      `Error: invalid extended key ${text}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (data.length !== EXTENDED_KEY_LENGTH)
    throw new KeyEncodingError(
      `Error: invalid extended key length ${data.length}: ${text}`
    );

  const version = readUInt32BE(data, 0);
  const isPrivateVersion = version === network.bip32.private;
  if (!isPrivateVersion && version !== network.bip32.public)
    throw new KeyEncodingError(
      `Error: extended key ${text} has version 0x${version.toString(16)} which does not match the selected network`
    );

  const depth = data[4] ?? 0;
  const parentFingerprint = data.slice(5, 9);
  const childNumber = readUInt32BE(data, 9);
  const chainCode = data.slice(13, 45);
  const keyData = data.slice(45, 78);

  if (depth === 0 && parentFingerprint.some(byte => byte !== 0))
    throw new KeyEncodingError(
      `Error: invalid key ${text}: zero depth with non-zero parent fingerprint`
    );
  if (depth === 0 && childNumber !== 0)
    throw new KeyEncodingError(
      `Error: invalid key ${text}: zero depth with non-zero index`
    );

  if (isPrivateVersion) {
    if (keyData[0] !== 0x00)
      throw new KeyEncodingError(
        `Error: invalid key ${text}: private version with public key data`
      );
    const privateKey = keyData.slice(1);
    if (!isValidPrivateKey(privateKey))
      throw new KeyEncodingError(
        `Error: invalid key ${text}: private key out of range`
      );
    return {
      network,
      depth,
      parentFingerprint,
      childNumber,
      chainCode,
      publicKey: publicKeyFromPrivateKey(privateKey),
      privateKey
    };
  }

  if (keyData[0] !== 0x02 && keyData[0] !== 0x03)
    throw new KeyEncodingError(
      `Error: invalid key ${text}: public version with invalid public key data`
    );
  pointFromPublicKey(keyData);
  return {
    network,
    depth,
    parentFingerprint,
    childNumber,
    chainCode,
    publicKey: keyData
  };
}

export function encodeExtendedKey(key: ExtendedKey): string {
  const version = key.privateKey
    ? key.network.bip32.private
    : key.network.bip32.public;
  const keyData = key.privateKey
    ? concatBytes(new Uint8Array([0x00]), key.privateKey)
    : key.publicKey;
  return bs58check.encode(
    concatBytes(
      writeUInt32BE(version),
      new Uint8Array([key.depth]),
      key.parentFingerprint,
      writeUInt32BE(key.childNumber),
      key.chainCode,
      keyData
    )
  );
}

/**
 * Derives the child at `index` (hardened when `index >= 2^31`).
 *
 * @throws {DerivationError} `HardenedFromPublic` when a hardened child is
 * requested from a public key, `InvalidChildKey` when the child falls outside
 * the curve (the caller decides whether to try another index).
 */
export function deriveChild(key: ExtendedKey, index: number): ExtendedKey {
  if (!Number.isInteger(index) || index < 0 || index > 0xffffffff)
    throw new DerivationError(
      'InvalidPathStep',
      `Error: invalid child index ${index}`
    );
  if (key.depth >= MAX_DEPTH)
    throw new DerivationError(
      'DepthExceeded',
      `Error: cannot derive beyond depth ${MAX_DEPTH}`
    );

  let data: Uint8Array;
  if (isHardened(index)) {
    if (!key.privateKey)
      throw new DerivationError(
        'HardenedFromPublic',
        `Error: cannot derive hardened child ${index - HARDENED_OFFSET}h from a public key`
      );
    data = concatBytes(
      new Uint8Array([0x00]),
      key.privateKey,
      writeUInt32BE(index)
    );
  } else {
    data = concatBytes(key.publicKey, writeUInt32BE(index));
  }

  const I = hmac(sha512, key.chainCode, data);
  const tweak = bytesToBigInt(I.slice(0, 32));
  const chainCode = I.slice(32);
  if (tweak >= CURVE_ORDER)
    throw new DerivationError(
      'InvalidChildKey',
      `Error: child ${index} is not a valid key (tweak exceeds curve order)`
    );

  const common = {
    network: key.network,
    depth: key.depth + 1,
    parentFingerprint: fingerprint(key),
    childNumber: index,
    chainCode
  };

  if (key.privateKey) {
    const child = (bytesToBigInt(key.privateKey) + tweak) % CURVE_ORDER;
    if (child === 0n)
      throw new DerivationError(
        'InvalidChildKey',
        `Error: child ${index} is not a valid key (zero scalar)`
      );
    const privateKey = bigIntTo32Bytes(child);
    return {
      ...common,
      publicKey: publicKeyFromPrivateKey(privateKey),
      privateKey
    };
  }

  const parent = pointFromPublicKey(key.publicKey);
  const child =
    tweak === 0n ? parent : parent.add(ProjectivePoint.BASE.multiply(tweak));
  if (child.equals(ProjectivePoint.ZERO))
    throw new DerivationError(
      'InvalidChildKey',
      `Error: child ${index} is not a valid key (point at infinity)`
    );
  return { ...common, publicKey: child.toRawBytes(true) };
}

/** Derives along a concrete path of child indexes. */
export function derive(key: ExtendedKey, path: readonly number[]): ExtendedKey {
  return path.reduce<ExtendedKey>(deriveChild, key);
}

export function tryDerive(
  key: ExtendedKey,
  path: readonly number[]
): Result<ExtendedKey> {
  return toResult(() => derive(key, path));
}

/**
 * Parses a path such as `m/0h/1/2'`, `/0H/1` or `0h/1`. Used for paths given
 * outside descriptors, where `H` is also accepted as a hardened marker.
 */
export function parseDerivationPath(text: string): number[] {
  let rest = text;
  if (rest === 'm') return [];
  if (rest.startsWith('m/')) rest = rest.slice(2);
  else if (rest.startsWith('/')) rest = rest.slice(1);
  return rest.split('/').map(segment => {
    const match = segment.match(/^(\d+)([hH']?)$/);
    if (!match || match[1] === undefined)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: invalid derivation segment '${segment}' in path ${text}`
      );
    const index = Number(match[1]);
    if (index >= HARDENED_OFFSET)
      throw new DerivationError(
        'InvalidPathStep',
        `Error: derivation index ${match[1]} out of range in path ${text}`
      );
    return match[2] ? index + HARDENED_OFFSET : index;
  });
}

export function formatDerivationPath(path: readonly number[]): string {
  return ['m', ...path.map(formatIndex)].join('/');
}

function formatIndex(index: number): string {
  return isHardened(index) ? `${index - HARDENED_OFFSET}h` : `${index}`;
}
