// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { DescriptorSyntaxError } from './errors.js';

/**
 * Read position over descriptor text. Offsets reported in errors are
 * absolute: `base` is the offset of `text` inside the full descriptor.
 */
export class Cursor {
  readonly text: string;
  readonly base: number;
  #position = 0;

  constructor(text: string, base = 0) {
    this.text = text;
    this.base = base;
  }

  get offset(): number {
    return this.base + this.#position;
  }

  atEnd(): boolean {
    return this.#position >= this.text.length;
  }

  peek(): string | undefined {
    return this.atEnd() ? undefined : this.text.charAt(this.#position);
  }

  consume(token: string): boolean {
    if (!this.text.startsWith(token, this.#position)) return false;
    this.#position += token.length;
    return true;
  }

  /** Reads characters while `predicate` holds. */
  readWhile(predicate: (character: string) => boolean): string {
    const start = this.#position;
    while (!this.atEnd() && predicate(this.text.charAt(this.#position)))
      this.#position++;
    return this.text.slice(start, this.#position);
  }

  /** Reads up to (not including) the first of `stops`, or to the end. */
  readUntil(stops: string): string {
    return this.readWhile(character => !stops.includes(character));
  }

  expect(token: string, expected: string): void {
    if (this.consume(token)) return;
    throw this.unexpected(expected);
  }

  unexpected(expected: string): DescriptorSyntaxError {
    const found = this.peek();
    return new DescriptorSyntaxError(
      'UnexpectedToken',
      `Error: expected ${expected} but found ${found === undefined ? 'end of input' : `'${found}'`}`,
      this.offset
    );
  }
}
