/**
 * TokenStream: the unconsumed command-line tokens of one invocation.
 *
 * Entries are never reordered. Stages split, insert or remove entries in
 * place, and mark the ones they have given meaning to as consumed.
 */

interface TokenEntry {
  value: string;
  consumed: boolean;
}

export class TokenStream {
  private entries: TokenEntry[];

  constructor(tokens: readonly string[]) {
    this.entries = tokens.map((value) => ({ value, consumed: false }));
  }

  /** Total number of entries, consumed or not. */
  get length(): number {
    return this.entries.length;
  }

  at(index: number): string | undefined {
    return this.entries[index]?.value;
  }

  isConsumed(index: number): boolean {
    return this.entries[index]?.consumed ?? true;
  }

  /** Index of the first unconsumed entry at or after `from`, or -1. */
  nextIndex(from = 0): number {
    for (let i = Math.max(from, 0); i < this.entries.length; i++) {
      if (!this.entries[i].consumed) return i;
    }
    return -1;
  }

  hasNext(): boolean {
    return this.nextIndex() !== -1;
  }

  /** First unconsumed token, without consuming it. */
  peek(): string | undefined {
    const index = this.nextIndex();
    return index === -1 ? undefined : this.entries[index].value;
  }

  /** Consume and return the first unconsumed token. */
  next(): string | undefined {
    const index = this.nextIndex();
    if (index === -1) return undefined;
    this.entries[index].consumed = true;
    return this.entries[index].value;
  }

  consume(index: number): void {
    const entry = this.entries[index];
    if (!entry) {
      throw new RangeError(`Token index ${index} out of range (length ${this.entries.length})`);
    }
    entry.consumed = true;
  }

  /** Replace the entry at `index` with unconsumed `parts`, in order. */
  split(index: number, parts: readonly string[]): void {
    this.assertIndex(index);
    this.entries.splice(index, 1, ...parts.map((value) => ({ value, consumed: false })));
  }

  insert(index: number, tokens: readonly string[]): void {
    if (index < 0 || index > this.entries.length) {
      throw new RangeError(`Token index ${index} out of range (length ${this.entries.length})`);
    }
    this.entries.splice(index, 0, ...tokens.map((value) => ({ value, consumed: false })));
  }

  remove(index: number): string {
    this.assertIndex(index);
    const [entry] = this.entries.splice(index, 1);
    return entry.value;
  }

  /** Unconsumed tokens, in order. */
  remaining(): string[] {
    return this.entries.filter((entry) => !entry.consumed).map((entry) => entry.value);
  }

  /** Consume and return every unconsumed token, in order. */
  drain(): string[] {
    const tokens = this.remaining();
    for (const entry of this.entries) entry.consumed = true;
    return tokens;
  }

  /** Every token, consumed or not. */
  toArray(): string[] {
    return this.entries.map((entry) => entry.value);
  }

  private assertIndex(index: number): void {
    if (index < 0 || index >= this.entries.length) {
      throw new RangeError(`Token index ${index} out of range (length ${this.entries.length})`);
    }
  }
}
