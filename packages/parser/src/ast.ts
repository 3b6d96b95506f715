import { TokenBuffer } from './TokenBuffer';
import { newlineToken, TokenType } from './tokens';

export type BodyItem = Attribute | Block | TokenBuffer;

/** `name = expression`, kept as the exact tokens it was parsed from. */
export class Attribute {
  constructor(
    readonly name: string,
    private readonly tokens: TokenBuffer, // lead comments through the end of the line
    private readonly expr: TokenBuffer // value expression, trailing comment included
  ) {}

  expression(): TokenBuffer {
    return this.expr;
  }

  buildTokens(): TokenBuffer {
    return this.tokens;
  }

  /** The same attribute spelled out by a different token run, e.g. one trimmed for relocation. */
  withTokens(tokens: TokenBuffer): Attribute {
    return new Attribute(this.name, tokens, this.expr);
  }
}

export class Block {
  constructor(
    readonly type: string, // e.g., "resource"
    readonly labels: readonly string[], // e.g., ["aws_instance", "web"]
    private readonly header: TokenBuffer, // lead comments through '{'
    readonly body: Body,
    private readonly closer: TokenBuffer // '}' through the end of its line
  ) {}

  buildTokens(): TokenBuffer {
    return this.header.concat(this.body.buildTokens(), this.closer);
  }
}

/**
 * Contents of a block (or of the whole file).
 * Attributes are addressed by name; blocks and loose tokens keep their position.
 */
export class Body {
  private items: BodyItem[] = [];
  private index = new Map<string, Attribute>();
  private closing: TokenBuffer = new TokenBuffer();

  constructor(
    private readonly braced: boolean,
    private opener: TokenBuffer = new TokenBuffer() // rest of the line after '{'
  ) {}

  attributes(): Map<string, Attribute> {
    return new Map(this.index);
  }

  getAttribute(name: string): Attribute | undefined {
    return this.index.get(name);
  }

  /** Attributes and blocks in their current order; loose tokens are skipped. */
  elements(): Array<Attribute | Block> {
    return this.items.filter((item): item is Attribute | Block => !(item instanceof TokenBuffer));
  }

  /** Like `elements()`, but comment runs that belong to no item keep their place too. */
  entries(): BodyItem[] {
    return this.items.filter((item) => !(item instanceof TokenBuffer) || hasComment(item));
  }

  /** Comment runs separated by a blank line from the item below them. */
  detachedComments(): TokenBuffer[] {
    return this.items.filter((item): item is TokenBuffer => item instanceof TokenBuffer && hasComment(item));
  }

  blocks(): Block[] {
    return this.items.filter((item): item is Block => item instanceof Block);
  }

  /** Comments after the last item; they stay in place when the body is cleared. */
  closingComments(): TokenBuffer {
    return this.closing;
  }

  setClosingComments(tokens: TokenBuffer): void {
    this.closing = tokens;
  }

  /** Drops every item. A cleared block body always starts on the line after its '{'. */
  clear(): void {
    this.items = [];
    this.index.clear();
    if (this.braced && ![...this.opener].some((token) => token.type === TokenType.Newline)) this.opener = this.opener.concat(new TokenBuffer([newlineToken()]));
  }

  appendAttribute(attribute: Attribute): void {
    if (this.index.has(attribute.name)) throw new Error(`Attribute "${attribute.name}" already exists in this body`);
    this.items.push(attribute);
    this.index.set(attribute.name, attribute);
  }

  appendBlock(block: Block): void {
    this.items.push(block);
  }

  appendNewline(): void {
    this.items.push(new TokenBuffer([newlineToken()]));
  }

  appendUnstructuredTokens(tokens: TokenBuffer): void {
    this.items.push(tokens);
  }

  buildTokens(): TokenBuffer {
    const parts = [this.opener, ...this.items.map((item) => (item instanceof TokenBuffer ? item : item.buildTokens())), this.closing];
    return new TokenBuffer(parts.flatMap((part) => part.toArray()));
  }
}

function hasComment(tokens: TokenBuffer): boolean {
  return [...tokens].some((token) => token.type === TokenType.Comment);
}

export class Document {
  constructor(readonly body: Body) {}

  toString(): string {
    return this.body.buildTokens().toString();
  }
}
