// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
import { hex } from '@scure/base';

import { addChecksum } from '../src/checksum.js';
import {
  Output,
  expand,
  expandMultipath,
  parseDescriptor,
  resolveKeys,
  tryParseDescriptor
} from '../src/descriptors.js';
import { DerivationError, SemanticError } from '../src/errors.js';
import { networks } from '../src/networks.js';
import { serialize } from '../src/serializer.js';
import {
  HASH160_G,
  PUBKEY_2G,
  PUBKEY_G,
  XPRV_1,
  XPUB_1,
  catchError,
  oraclePublicKey,
  toHex
} from './helpers/oracle.js';

const G = hex.decode(PUBKEY_G);
const G2 = hex.decode(PUBKEY_2G);
const P2PKH_G = '1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH';
const P2WPKH_G = 'bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4';

describe('Output', () => {
  test('single key outputs', () => {
    expect(new Output({ descriptor: `pkh(${PUBKEY_G})` }).getAddress()).toEqual(
      P2PKH_G
    );
    const wpkh = new Output({ descriptor: `wpkh(${PUBKEY_G})` });
    expect(wpkh.getAddress()).toEqual(P2WPKH_G);
    expect(toHex(wpkh.getScriptPubKey())).toEqual(`0014${HASH160_G}`);
    expect(wpkh.isSegwit()).toBe(true);
    expect(wpkh.isRanged()).toBe(false);
  });

  test('addresses follow the network', () => {
    const output = new Output({
      descriptor: `wpkh(${PUBKEY_G})`,
      network: networks.testnet
    });
    expect(output.getAddress()).toEqual(
      'tb1qw508d6qejxtdg4y5r3zarvary0c5xw7kxpjzsx'
    );
    expect(output.getNetwork()).toBe(networks.testnet);
  });

  test('extended keys must belong to the network', () => {
    expect(
      catchError(
        () =>
          new Output({
            descriptor: `wpkh(${XPUB_1}/0)`,
            network: networks.testnet
          })
      )
    ).toMatchObject({ kind: 'InvalidKeyEncoding', offset: 5 });
  });

  test('sh(wpkh()) exposes its redeem script', () => {
    const oracle = btc.p2sh(btc.p2wpkh(G));
    const output = new Output({ descriptor: `sh(wpkh(${PUBKEY_G}))` });
    expect(output.getAddress()).toEqual(oracle.address);
    expect(output.getRedeemScript()).toEqual(oracle.redeemScript);
    expect(output.getWitnessScript()).toBeUndefined();
    expect(output.isSegwit()).toBe(true);
  });

  test('wsh(multi()) exposes its witness script and keys', () => {
    const multisig = btc.p2ms(1, [G, G2]);
    const oracle = btc.p2wsh(multisig);
    const output = new Output({
      descriptor: `wsh(multi(1,${PUBKEY_G},${PUBKEY_2G}))`
    });
    expect(output.getAddress()).toEqual(oracle.address);
    expect(output.getWitnessScript()).toEqual(multisig.script);
    expect(output.getRedeemScript()).toBeUndefined();
    expect(output.getPublicKeys()).toEqual([G, G2]);
  });

  test('sh(wsh()) exposes both scripts', () => {
    const multisig = btc.p2ms(1, [G, G2]);
    const oracle = btc.p2sh(btc.p2wsh(multisig));
    const output = new Output({
      descriptor: `sh(wsh(sortedmulti(1,${PUBKEY_2G},${PUBKEY_G})))`
    });
    expect(output.getAddress()).toEqual(oracle.address);
    expect(output.getRedeemScript()).toEqual(oracle.redeemScript);
    expect(output.getWitnessScript()).toEqual(multisig.script);
    expect(output.getPublicKeys()).toEqual([G2, G]);
  });

  test('ranged descriptors need an index', () => {
    const descriptor = `wpkh([d34db33f/84h/0h/0h]${XPUB_1}/0/*)`;
    const oracle = btc.p2wpkh(oraclePublicKey(XPUB_1, 'm/0/7'));
    const output = new Output({ descriptor, index: 7 });
    expect(output.isRanged()).toBe(true);
    expect(output.getScriptPubKey()).toEqual(oracle.script);
    expect(output.getAddress()).toEqual(oracle.address);
    expect(output.getDescriptor()).toEqual(
      addChecksum(`wpkh([d34db33f/84h/0h/0h]${XPUB_1}/0/7)`)
    );

    const missing = catchError(() => new Output({ descriptor }));
    expect(missing).toBeInstanceOf(DerivationError);
    expect(missing).toMatchObject({ kind: 'UnresolvedStep' });
    expect(
      catchError(() => new Output({ descriptor, index: 2 ** 31 }))
    ).toMatchObject({ kind: 'InvalidPathStep' });
    expect(
      catchError(() => new Output({ descriptor: `wpkh(${PUBKEY_G})`, index: 0 }))
    ).toMatchObject({ kind: 'InvalidPathStep' });
  });

  test('derives the same output for the same index', () => {
    const descriptor = `pkh([d34db33f/44'/0'/0']${XPUB_1}/0/*)`;
    const first = new Output({ descriptor, index: 5 });
    const second = new Output({ descriptor, index: 5 });
    expect(second.getScriptPubKey()).toEqual(first.getScriptPubKey());
    expect(second.getPublicKeys()).toEqual(first.getPublicKeys());
    expect(second.getAddress()).toEqual(first.getAddress());
  });

  test('hardened wildcards need a private key', () => {
    expect(
      catchError(() => new Output({ descriptor: `wpkh(${XPUB_1}/*h)`, index: 0 }))
    ).toMatchObject({ kind: 'HardenedFromPublic' });
    const output = new Output({ descriptor: `wpkh(${XPRV_1}/*h)`, index: 3 });
    expect(output.getPublicKeys()).toEqual([oraclePublicKey(XPRV_1, "m/3'")]);
    expect(output.getDescriptor()).toEqual(addChecksum(`wpkh(${XPRV_1}/3h)`));
  });

  test('multipath descriptors need a multipath index', () => {
    const descriptor = `wpkh(${XPUB_1}/<0;1>/*)`;
    const output = new Output({ descriptor, index: 2, multipathIndex: 1 });
    expect(output.getPublicKeys()).toEqual([oraclePublicKey(XPUB_1, 'm/1/2')]);
    expect(output.getDescriptor()).toEqual(addChecksum(`wpkh(${XPUB_1}/1/2)`));
    expect(
      catchError(() => new Output({ descriptor, index: 2 }))
    ).toMatchObject({ kind: 'UnresolvedStep' });
    expect(
      catchError(() => new Output({ descriptor, index: 2, multipathIndex: 2 }))
    ).toMatchObject({ kind: 'InvalidPathStep' });
  });

  test('combo() stands for several scripts', () => {
    const output = new Output({ descriptor: `combo(${PUBKEY_G})` });
    expect(output.getAddresses()).toEqual([
      undefined,
      P2PKH_G,
      P2WPKH_G,
      btc.p2sh(btc.p2wpkh(G)).address
    ]);
    expect(output.getScriptPubKeys()).toHaveLength(4);
    expect(output.isSegwit()).toBeUndefined();
    const error = catchError(() => output.getAddress());
    expect(error).toBeInstanceOf(SemanticError);
    expect(error).toMatchObject({ kind: 'MultipleScripts' });
  });

  test('scripts without an address', () => {
    const output = new Output({ descriptor: 'raw(deadbeef)' });
    expect(output.getAddresses()).toEqual([undefined]);
    const error = catchError(() => output.getAddress());
    expect(error).toBeInstanceOf(SemanticError);
    expect(error).toMatchObject({
      kind: 'NoAddress',
      message: 'Error: could not extract an address from the payment'
    });
    expect(output.isSegwit()).toBe(false);
    expect(
      new Output({ descriptor: `pk(${PUBKEY_G})` }).getAddresses()
    ).toEqual([undefined]);
  });

  test('addr() keeps its address', () => {
    const output = new Output({ descriptor: `addr(${P2WPKH_G})` });
    expect(output.getAddress()).toEqual(P2WPKH_G);
    expect(output.isSegwit()).toBe(true);
    expect(output.getPublicKeys()).toEqual([]);
  });

  test('can require a checksum', () => {
    const descriptor = `pk(${PUBKEY_G})`;
    expect(
      catchError(() => new Output({ descriptor, requireChecksum: true }))
    ).toMatchObject({ kind: 'MissingChecksum' });
    expect(
      new Output({
        descriptor: addChecksum(descriptor),
        requireChecksum: true
      }).getDescriptor()
    ).toEqual(addChecksum(descriptor));
  });

  test('invalid descriptors throw when constructed', () => {
    expect(
      catchError(() => new Output({ descriptor: `wsh(wpkh(${PUBKEY_G}))` }))
    ).toMatchObject({ kind: 'InvalidContext' });
  });

  test('memoizes derived values', () => {
    const output = new Output({ descriptor: `pkh(${PUBKEY_G})` });
    expect(output.getAddresses()).toBe(output.getAddresses());
  });
});

describe('parseDescriptor', () => {
  test('parses and validates', () => {
    expect(parseDescriptor(`wpkh(${PUBKEY_G})`).expression.type).toEqual('wpkh');
    expect(
      catchError(() => parseDescriptor(`sh(sh(pk(${PUBKEY_G})))`))
    ).toMatchObject({ kind: 'InvalidContext' });
    const result = tryParseDescriptor(`wpkh(${PUBKEY_G})#00000000`);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toEqual('ChecksumMismatch');
  });
});

describe('expand', () => {
  test('drops the checksum of concrete documents', () => {
    const document = parseDescriptor(addChecksum(`pkh(${PUBKEY_G})`));
    const expanded = expand(document);
    expect(expanded.checksum).toBeUndefined();
    expect(expanded.expression).toEqual(document.expression);
  });

  test('replaces wildcards and multipath steps', () => {
    const document = parseDescriptor(
      `wsh(multi(1,${XPUB_1}/<0;1>/*,${XPRV_1}/<2h;3h>/*h))`
    );
    const expanded = expand(document, { index: 5, multipathIndex: 1 });
    expect(serialize(expanded.expression)).toEqual(
      `wsh(multi(1,${XPUB_1}/1/5,${XPRV_1}/3h/5h))`
    );
    expect(expanded).toMatchObject({ isRanged: false, multipathLength: 0 });
    expect(resolveKeys(expanded.expression)).toEqual([
      oraclePublicKey(XPUB_1, 'm/1/5'),
      oraclePublicKey(XPRV_1, "m/3'/5'")
    ]);
  });

  test('rejects selectors the document has no use for', () => {
    const document = parseDescriptor(`pkh(${XPUB_1}/0/*)`);
    expect(
      catchError(() => expand(document, { index: 0, multipathIndex: 0 }))
    ).toMatchObject({ kind: 'InvalidPathStep' });
  });
});

describe('expandMultipath', () => {
  test('returns one document per alternative', () => {
    const documents = expandMultipath(
      parseDescriptor(`wpkh(${XPUB_1}/<0;1>/*)`)
    );
    expect(documents.map(document => serialize(document.expression))).toEqual([
      `wpkh(${XPUB_1}/0/*)`,
      `wpkh(${XPUB_1}/1/*)`
    ]);
    expect(documents[0]).toMatchObject({ isRanged: true, multipathLength: 0 });
  });

  test('returns documents without multipath keys unchanged', () => {
    const document = parseDescriptor(`wpkh(${XPUB_1}/0/*)`);
    expect(expandMultipath(document)).toEqual([document]);
  });
});
