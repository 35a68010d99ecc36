// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { hex } from '@scure/base';

import { addChecksum } from './checksum.js';
import { serializeKeyExpression } from './keyExpressions.js';
import type { DescriptorDocument, ScriptExpression } from './types.js';

/**
 * Writes an expression back as descriptor text, without checksum. Hex is
 * written in lowercase, numbers (path steps and thresholds) without leading
 * zeros, and hardened markers keep the form they were parsed with.
 */
export function serialize(expression: ScriptExpression): string {
  switch (expression.type) {
    case 'pk':
    case 'pkh':
    case 'wpkh':
    case 'combo':
      return `${expression.type}(${serializeKeyExpression(expression.key)})`;
    case 'sh':
    case 'wsh':
      return `${expression.type}(${serialize(expression.inner)})`;
    case 'multi':
    case 'sortedmulti':
      return `${expression.type}(${[
        expression.threshold,
        ...expression.keys.map(serializeKeyExpression)
      ].join(',')})`;
    case 'addr':
      return `addr(${expression.address})`;
    case 'raw':
      return `raw(${hex.encode(expression.script)})`;
  }
}

/** `serialize()` followed by a freshly computed `#checksum`. */
export function serializeDocument(document: DescriptorDocument): string {
  return addChecksum(serialize(document.expression));
}
