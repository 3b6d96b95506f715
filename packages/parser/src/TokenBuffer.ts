import { type Token, TokenType } from './tokens';

/**
 * Immutable, ordered run of tokens.
 * Used to lift an attribute or block out of one body and splice it into another.
 */
export class TokenBuffer implements Iterable<Token> {
  private readonly tokens: readonly Token[];

  constructor(tokens: readonly Token[] = []) {
    this.tokens = [...tokens];
  }

  get length(): number {
    return this.tokens.length;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  at(index: number): Token | undefined {
    return this.tokens.at(index);
  }

  slice(start?: number, end?: number): TokenBuffer {
    return new TokenBuffer(this.tokens.slice(start, end));
  }

  concat(...others: TokenBuffer[]): TokenBuffer {
    return new TokenBuffer([...this.tokens, ...others.flatMap((other) => other.toArray())]);
  }

  /** Strips the leading and trailing runs of newline tokens; interior tokens are kept as they are. */
  trimNewlines(): TokenBuffer {
    let start = 0;
    let end = this.tokens.length;
    while (start < end && this.tokens[start].type === TokenType.Newline) start++;
    while (end > start && this.tokens[end - 1].type === TokenType.Newline) end--;
    return this.slice(start, end);
  }

  toArray(): Token[] {
    return [...this.tokens];
  }

  [Symbol.iterator](): Iterator<Token> {
    return this.tokens[Symbol.iterator]();
  }

  toString(): string {
    let out = '';
    for (const token of this.tokens) out += ' '.repeat(token.spacesBefore) + token.value;
    return out;
  }
}
