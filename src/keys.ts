// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha2';
import { ripemd160 } from '@noble/hashes/legacy';
import { base58check, hex } from '@scure/base';

import { CURVE_ORDER } from './charset.js';
import { KeyEncodingError } from './errors.js';
import type { Network } from './networks.js';

export const bs58check = base58check(sha256);

const { ProjectivePoint } = secp256k1;
type Point = InstanceType<typeof ProjectivePoint>;

// ---- Byte helpers ----

export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  return BigInt('0x' + hex.encode(bytes));
}

/** Convert a bigint to a 32-byte big-endian array. */
export function bigIntTo32Bytes(n: bigint): Uint8Array {
  return hex.decode(n.toString(16).padStart(64, '0'));
}

export function writeUInt32BE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n >>> 0, false);
  return out;
}

export function readUInt32BE(buf: Uint8Array, offset = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint32(
    offset,
    false
  );
}

/** Lexicographic byte order, as used to sort keys in sortedmulti(). */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

export function isHex(text: string): boolean {
  return /^[0-9a-fA-F]*$/.test(text) && text.length % 2 === 0;
}

// ---- Curve helpers ----

export function isValidPrivateKey(privateKey: Uint8Array): boolean {
  if (privateKey.length !== 32) return false;
  const d = bytesToBigInt(privateKey);
  return d > 0n && d < CURVE_ORDER;
}

export function pointFromPublicKey(publicKey: Uint8Array): Point {
  try {
    return ProjectivePoint.fromHex(publicKey);
  } catch (error) {
    throw new KeyEncodingError(
      `Error: invalid public key ${hex.encode(publicKey)}: ${describe(error)}`
    );
  }
}

export function publicKeyFromPrivateKey(
  privateKey: Uint8Array,
  compressed = true
): Uint8Array {
  return secp256k1.getPublicKey(privateKey, compressed);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---- Hex encoded public keys ----

const HEX_PUBKEY_PREFIXES = ['02', '03', '04'];

export function hasHexPublicKeyPrefix(text: string): boolean {
  return HEX_PUBKEY_PREFIXES.some(prefix => text.startsWith(prefix));
}

/**
 * Parses a hex encoded public key: `02`/`03` followed by 64 hex characters,
 * or `04` followed by 128. The point must lie on the curve.
 */
export function parseHexPublicKey(text: string): Uint8Array {
  if (!hasHexPublicKeyPrefix(text))
    throw new KeyEncodingError(
      `Error: hex encoded public key must start with 02, 03 or 04: ${text}`
    );
  if (!isHex(text))
    throw new KeyEncodingError(
      `Error: hex encoded public key contains non-hexadecimal characters: ${text}`
    );
  const expectedLength = text.startsWith('04') ? 130 : 66;
  if (text.length !== expectedLength)
    throw new KeyEncodingError(
      `Error: hex encoded public key with prefix ${text.slice(0, 2)} must be ${expectedLength} characters long: ${text}`
    );
  const publicKey = hex.decode(text.toLowerCase());
  pointFromPublicKey(publicKey);
  return publicKey;
}

// ---- Wallet Import Format ----

interface DecodedWif {
  privateKey: Uint8Array;
  compressed: boolean;
}

export function encodeWif(
  privateKey: Uint8Array,
  compressed: boolean,
  network: Network
): string {
  const payload = new Uint8Array(compressed ? 34 : 33);
  payload[0] = network.wif;
  payload.set(privateKey, 1);
  if (compressed) payload[33] = 0x01;
  return bs58check.encode(payload);
}

export function decodeWif(wif: string, network: Network): DecodedWif {
  let decoded: Uint8Array;
  try {
    decoded = bs58check.decode(wif);
  } catch (error) {
    throw new KeyEncodingError(
      `Error: could not decode WIF ${wif}: ${describe(error)}`
    );
  }
  if (decoded[0] !== network.wif)
    throw new KeyEncodingError(
      `Error: WIF ${wif} does not belong to the selected network`
    );
  let compressed: boolean;
  if (decoded.length === 34 && decoded[33] === 0x01) compressed = true;
  else if (decoded.length === 33) compressed = false;
  else throw new KeyEncodingError(`Error: invalid WIF length: ${wif}`);
  const privateKey = decoded.slice(1, 33);
  if (!isValidPrivateKey(privateKey))
    throw new KeyEncodingError(`Error: WIF private key out of range: ${wif}`);
  return { privateKey, compressed };
}
