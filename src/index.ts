// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

export type {
  DescriptorDocument,
  ExpandOptions,
  FixedStep,
  Hardener,
  KeyExpression,
  KeyOrigin,
  ParseOptions,
  PathStep,
  ScriptExpression,
  ScriptFunction
} from './types.js';
export {
  Output,
  expand,
  expandMultipath,
  parseDescriptor,
  resolveKeys,
  tryParseDescriptor
} from './descriptors.js';
export type { OutputOptions } from './descriptors.js';
export { parse, tryParse } from './parser.js';
export { validate, checkDescriptor } from './validator.js';
export { serialize, serializeDocument } from './serializer.js';
export { build, buildAll, buildPayment } from './scriptBuilder.js';
export type { Payment } from './scriptBuilder.js';
export {
  DescriptorChecksum,
  DescriptorChecksum as checksum,
  addChecksum,
  splitChecksum,
  verifyChecksum
} from './checksum.js';
export {
  keyExpressionBIP32,
  parseKeyExpression,
  resolveKey,
  serializeKeyExpression
} from './keyExpressions.js';
export {
  decodeExtendedKey,
  derive,
  deriveChild,
  encodeExtendedKey,
  fingerprint,
  formatDerivationPath,
  neuter,
  parseDerivationPath,
  tryDerive
} from './bip32.js';
export type { ExtendedKey } from './bip32.js';
export { addressToOutputScript, outputScriptToAddress } from './address.js';
export { toASM } from './scriptUtils.js';
export { networks } from './networks.js';
export type { Network, NetworkName } from './networks.js';
export * from './errors.js';
