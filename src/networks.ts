// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

/**
 * Version bytes and prefixes that tell apart keys and addresses of each
 * chain. The shape is the one @scure/btc-signer takes for addresses, plus
 * the BIP32 versions of extended keys.
 */
export interface Network {
  /** Human readable part of segwit addresses. */
  bech32: string;
  /** Versions of xpub/xprv (tpub/tprv on test chains). */
  bip32: { public: number; private: number };
  pubKeyHash: number;
  scriptHash: number;
  wif: number;
}

export type NetworkName = 'bitcoin' | 'testnet' | 'regtest';

const TEST_VERSIONS = {
  bip32: { public: 0x043587cf, private: 0x04358394 },
  pubKeyHash: 0x6f,
  scriptHash: 0xc4,
  wif: 0xef
};

export const networks: Readonly<Record<NetworkName, Network>> = {
  bitcoin: {
    bech32: 'bc',
    bip32: { public: 0x0488b21e, private: 0x0488ade4 },
    pubKeyHash: 0x00,
    scriptHash: 0x05,
    wif: 0x80
  },
  testnet: { bech32: 'tb', ...TEST_VERSIONS },
  regtest: { bech32: 'bcrt', ...TEST_VERSIONS }
};

export function isNetworkName(name: string): name is NetworkName {
  return Object.prototype.hasOwnProperty.call(networks, name);
}
