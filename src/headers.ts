// ============================================================================
// Operation headers
// ============================================================================

import { throwError } from './errors.js';

/**
 * Header map of a single batch operation.
 *
 * Names match case-insensitively, but the first spelling and the insertion
 * position are kept: headers are written in the order they were first set.
 */
export class OperationHeaders implements Iterable<[string, string]> {
  #entries = new Map<string, [string, string]>();
  #readonly = false;

  get size(): number {
    return this.#entries.size;
  }

  get readonly(): boolean {
    return this.#readonly;
  }

  get(name: string): string | undefined {
    return this.#entries.get(name.toLowerCase())?.[1];
  }

  has(name: string): boolean {
    return this.#entries.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    this.verifyWritable(name);
    const key = name.toLowerCase();
    const existing = this.#entries.get(key);
    if (existing) {
      existing[1] = value;
    } else {
      this.#entries.set(key, [name, value]);
    }
    return this;
  }

  delete(name: string): boolean {
    this.verifyWritable(name);
    return this.#entries.delete(name.toLowerCase());
  }

  /** @internal Called once the headers have been written. */
  freeze(): void {
    this.#readonly = true;
  }

  *[Symbol.iterator](): IterableIterator<[string, string]> {
    for (const [name, value] of this.#entries.values()) {
      yield [name, value];
    }
  }

  private verifyWritable(name: string): void {
    if (this.#readonly) {
      throwError(
        'OperationMessageCompleted',
        `Cannot modify header '${name}': the operation headers have already been written`
      );
    }
  }
}
