// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { SemanticError } from '../src/errors.js';
import { parse } from '../src/parser.js';
import { checkDescriptor, validate } from '../src/validator.js';
import {
  PUBKEY_2G,
  PUBKEY_G,
  PUBKEY_G_UNCOMPRESSED,
  WIF_1_UNCOMPRESSED,
  XPUB_1,
  catchError
} from './helpers/oracle.js';

const G = PUBKEY_G;
const U = PUBKEY_G_UNCOMPRESSED;

const check = (descriptor: string) => validate(parse(descriptor));
const kindOf = (descriptor: string) => {
  const error = catchError(() => check(descriptor));
  expect(error).toBeInstanceOf(SemanticError);
  return error instanceof SemanticError ? error.kind : undefined;
};

describe('validate', () => {
  test('returns the document it was given', () => {
    const document = parse(`sh(wsh(pkh(${G})))`);
    expect(validate(document)).toBe(document);
  });

  test.each([
    `pk(${G})`,
    `pkh(${U})`,
    `wpkh(${XPUB_1}/0/*)`,
    `sh(wpkh(${G}))`,
    `sh(pk(${U}))`,
    `sh(multi(1,${G},${U}))`,
    `wsh(pkh(${G}))`,
    `sh(wsh(sortedmulti(2,${G},${PUBKEY_2G})))`,
    `combo(${U})`,
    'raw(deadbeef)',
    `multi(20,${Array(20).fill(G).join(',')})`
  ])('accepts %s', descriptor => {
    expect(() => check(descriptor)).not.toThrow();
  });

  test.each([
    `sh(combo(${G}))`,
    `wsh(combo(${G}))`,
    'sh(raw(deadbeef))',
    'wsh(addr(bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4))',
    `wsh(wpkh(${G}))`,
    `sh(sh(pk(${G})))`,
    `wsh(sh(pk(${G})))`,
    `wsh(wsh(pk(${G})))`
  ])('rejects the nesting of %s', descriptor => {
    expect(kindOf(descriptor)).toEqual('InvalidContext');
  });

  test('names top level only functions', () => {
    expect(catchError(() => check(`sh(combo(${G}))`))).toMatchObject({
      message: 'Error: combo() can only be used at the top level'
    });
    expect(catchError(() => check(`wsh(wpkh(${G}))`))).toMatchObject({
      message: 'Error: wpkh() is not allowed inside wsh()'
    });
  });

  test.each([
    `multi(0,${G})`,
    `multi(3,${G},${PUBKEY_2G})`,
    `sortedmulti(2,${G})`,
    `wsh(multi(21,${Array(21).fill(G).join(',')}))`,
    `multi(1,${Array(21).fill(G).join(',')})`
  ])('rejects the threshold of %s', descriptor => {
    expect(kindOf(descriptor)).toEqual('InvalidThreshold');
  });

  test('reports the multisig threshold range', () => {
    expect(catchError(() => check(`multi(3,${G},${PUBKEY_2G})`))).toMatchObject({
      message: 'Error: multi() threshold 3 must be between 1 and 2'
    });
  });

  test.each([
    `wpkh(${U})`,
    `wpkh(${WIF_1_UNCOMPRESSED})`,
    `sh(wpkh(${U}))`,
    `wsh(pk(${U}))`,
    `wsh(pkh(${U}))`,
    `sh(wsh(multi(1,${G},${U})))`
  ])('rejects the uncompressed key of %s', descriptor => {
    expect(kindOf(descriptor)).toEqual('UncompressedKey');
  });
});

describe('script size', () => {
  test('limits P2SH redeem scripts to 520 bytes', () => {
    expect(() =>
      check(`sh(multi(1,${Array(15).fill(G).join(',')}))`)
    ).not.toThrow();
    expect(
      catchError(() => check(`sh(multi(1,${Array(16).fill(G).join(',')}))`))
    ).toMatchObject({
      kind: 'ScriptTooLarge',
      message: 'Error: P2SH script is too large, 547 bytes is larger than 520 bytes'
    });
  });

  test('counts the length of every key', () => {
    // 1 + 7 * 66 + 1 + 1
    expect(() =>
      check(`sh(multi(1,${Array(7).fill(U).join(',')}))`)
    ).not.toThrow();
    // 1 + 8 * 66 + 1 + 1
    expect(
      catchError(() => check(`sh(multi(1,${Array(8).fill(U).join(',')}))`))
    ).toMatchObject({ kind: 'ScriptTooLarge' });
  });

  test('checks ranged descriptors too', () => {
    expect(
      kindOf(`sh(multi(1,${Array(16).fill(`${XPUB_1}/0/*`).join(',')}))`)
    ).toEqual('ScriptTooLarge');
  });
});

describe('checkDescriptor', () => {
  test('wraps the outcome in a result', () => {
    const document = parse(`wpkh(${G})`);
    expect(checkDescriptor(document)).toEqual({ ok: true, value: document });
    const failed = checkDescriptor(parse(`wpkh(${U})`));
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.kind).toEqual('UncompressedKey');
  });
});
