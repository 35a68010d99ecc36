// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';

import { DescriptorSyntaxError } from './errors.js';
import type { Network } from './networks.js';

/**
 * Decodes a base58 or bech32 address into its output script.
 *
 * @throws {DescriptorSyntaxError} `InvalidAddress` when the address cannot be
 * decoded or belongs to another network.
 */
export function addressToOutputScript(
  address: string,
  network: Network,
  offset?: number
): Uint8Array {
  try {
    const decoded = btc.Address(network).decode(address);
    return btc.OutScript.encode(decoded);
  } catch (error) {
    throw new DescriptorSyntaxError(
      'InvalidAddress',
      `Error: invalid address ${address} for network ${network.bech32}: ${error instanceof Error ? error.message : String(error)}`,
      offset
    );
  }
}

/**
 * The address of an output script, or undefined for scripts without one
 * (bare pk, bare multisig and non-standard scripts).
 */
export function outputScriptToAddress(
  script: Uint8Array,
  network: Network
): string | undefined {
  try {
    return btc
      .Address(network)
      .encode(btc.OutScript.decode(script));
  } catch {
    return undefined;
  }
}
