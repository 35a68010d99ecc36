// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

// Independent implementations used to check results: @scure/bip32 for key
// derivation and @scure/btc-signer payments for output scripts.

import { HDKey } from '@scure/bip32';
import { hex } from '@scure/base';

/** BIP32 test vector 1 master keys. */
export const XPUB_1 =
  'xpub661MyMwAqRbcFtXgS5sYJABqqG9YLmC4Q1Rdap9gSE8NqtwybGhePY2gZ29ESFjqJoCu1Rupje8YtGqsefD265TMg7usUDFdp6W1EGMcet8';
export const XPRV_1 =
  'xprv9s21ZrQH143K3QTDL4LXw2F7HEK3wJUD2nW2nRk4stbPy6cq3jPPqjiChkVvvNKmPGJxWUtg6LnF5kejMRNNU3TGtRBeJgk33yuGBxrMPHi';
/** BIP32 test vector 2 master keys. */
export const XPUB_2 =
  'xpub661MyMwAqRbcFW31YEwpkMuc5THy2PSt5bDMsktWQcFF8syAmRUapSCGu8ED9W6oDMSgv6Zz8idoc4a6mr8BDzTJY47LJhkJ8UB7WEGuduB';
export const XPRV_2 =
  'xprv9s21ZrQH143K31xYSDQpPDxsXRTUcvj2iNHm5NUtrGiGG5e2DtALGdso3pGz6ssrdK4PFmM8NSpSBHNqPqm55Qn3LqFtT2emdEXVYsCzC2U';

/** The generator point G, i.e. the public key of private key 1. */
export const PUBKEY_G =
  '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798';
export const PUBKEY_G_UNCOMPRESSED =
  '0479be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8';
/** 2G */
export const PUBKEY_2G =
  '02c6047f9441ed7d6d3045406e95c07cd85c778e4b8cef3ca7abac09b95c709ee5';
/** Private key 1 as compressed and uncompressed WIF. */
export const WIF_1 = 'KwDiBf89QgGbjEhKnhXJuH7LrciVrZi3qYjgd9M7rFU73sVHnoWn';
export const WIF_1_UNCOMPRESSED =
  '5HpHagT65TZzG1PH3CSu63k8DbpvD8s5ip4nEB3kEsreAnchuDf';
/** HASH160 of PUBKEY_G. */
export const HASH160_G = '751e76e8199196d454941c45d1b3a323f1433bd6';

/** `path` uses the `m/0'/1` notation. */
export function oracleNode(extendedKey: string, path: string): HDKey {
  return HDKey.fromExtendedKey(extendedKey).derive(path);
}

export function oraclePublicKey(extendedKey: string, path: string): Uint8Array {
  const { publicKey } = oracleNode(extendedKey, path);
  if (!publicKey) throw new Error(`Error: no public key at ${path}`);
  return publicKey;
}

export function oracleFingerprint(extendedKey: string): string {
  return HDKey.fromExtendedKey(extendedKey)
    .fingerprint.toString(16)
    .padStart(8, '0');
}

export const toHex = (bytes: Uint8Array | undefined): string | undefined =>
  bytes === undefined ? undefined : hex.encode(bytes);

/** Runs `fn` and returns what it throws. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Error: expected an error to be thrown');
}
