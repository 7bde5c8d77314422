/**
 * Commit and change ids, and their shortest unambiguous prefixes.
 */

export interface IdIndex {
  /** Number of hex digits needed to tell `hex` apart from every other id. */
  shortestUniquePrefixLength(hex: string): number;
}

export class ShortestIdPrefix {
  readonly prefix: string;
  readonly rest: string;

  constructor(prefix: string, rest: string) {
    this.prefix = prefix;
    this.rest = rest;
  }

  withBrackets(): string {
    return this.rest === "" ? this.prefix : `${this.prefix}[${this.rest}]`;
  }
}

export class CommitOrChangeId {
  readonly hex: string;
  private readonly index: IdIndex;

  constructor(hex: string, index: IdIndex) {
    this.hex = hex;
    this.index = index;
  }

  short(length: number): string {
    return this.hex.slice(0, length);
  }

  /**
   * The unique prefix, followed by enough of the remaining digits to make
   * `totalLength` digits in all.
   */
  shortest(totalLength: number): ShortestIdPrefix {
    const prefixLength = Math.min(this.index.shortestUniquePrefixLength(this.hex), this.hex.length);
    return new ShortestIdPrefix(
      this.hex.slice(0, prefixLength),
      this.hex.slice(prefixLength, Math.max(prefixLength, totalLength))
    );
  }
}

/**
 * Index over a fixed set of ids.
 */
export class HexIdIndex implements IdIndex {
  private readonly ids: readonly string[];

  constructor(ids: Iterable<string>) {
    this.ids = [...new Set(ids)];
  }

  shortestUniquePrefixLength(hex: string): number {
    let longestShared = 0;
    for (const other of this.ids) {
      if (other !== hex) {
        longestShared = Math.max(longestShared, commonPrefixLength(hex, other));
      }
    }
    return Math.min(longestShared + 1, hex.length);
  }
}

function commonPrefixLength(a: string, b: string): number {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a[i] === b[i]) i++;
  return i;
}
