import { Attribute, Block, Body, Document } from './ast';
import { ParseError } from './errors';
import { TokenBuffer } from './TokenBuffer';
import { CLOSING_TOKENS, newlineToken, OPENING_TOKENS, type Token, TokenType } from './tokens';

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  public parse(): Document {
    this.current = 0;
    const body = this.parseBody(false, new TokenBuffer());
    if (!this.isAtEnd()) return this.error(`Unexpected token: ${this.peek().value}`);
    return new Document(body);
  }

  private parseBody(braced: boolean, opener: TokenBuffer): Body {
    const body = new Body(braced, opener);
    // Comments collected since the last item; they belong to the next one
    let trivia: Token[] = [];

    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      if (this.check(TokenType.Newline)) {
        const newline = this.advance();
        // A blank line detaches the comments above it from the next item
        if (trivia.at(-1)?.type === TokenType.Newline) {
          body.appendUnstructuredTokens(new TokenBuffer(trivia));
          trivia = [];
        }
        if (trivia.length > 0) trivia.push(newline);
        else body.appendUnstructuredTokens(new TokenBuffer([newline]));
        continue;
      }

      if (this.check(TokenType.Comment)) {
        trivia.push(this.advance());
        continue;
      }

      const lead = new TokenBuffer(trivia);
      trivia = [];

      const nameToken = this.consume(TokenType.Identifier, 'Expect attribute name or block type.');
      if (this.check(TokenType.Assign)) {
        if (body.getAttribute(nameToken.value)) this.error(`Duplicate attribute "${nameToken.value}".`, nameToken);
        body.appendAttribute(this.parseAttribute(lead, nameToken));
      } else body.appendBlock(this.parseBlock(lead, nameToken));
    }

    body.setClosingComments(new TokenBuffer(trivia));
    return body;
  }

  private parseAttribute(lead: TokenBuffer, nameToken: Token): Attribute {
    // name = expression
    const assign = this.advance();

    const expression: Token[] = [];
    let depth = 0;
    while (!this.isAtEnd()) {
      const token = this.peek();
      // An expression ends at the end of its line, or at the '}' of a single-line block
      if (depth === 0 && (token.type === TokenType.Newline || token.type === TokenType.RBrace)) break;
      if (OPENING_TOKENS.has(token.type)) depth++;
      if (CLOSING_TOKENS.has(token.type) && --depth < 0) return this.error(`Unexpected '${token.value}' in expression.`);
      expression.push(this.advance());
    }

    if (depth > 0) return this.error('Expect closing bracket before end of file.');
    if (!expression.some((token) => token.type !== TokenType.Comment)) return this.error(`Expect expression after '=' for "${nameToken.value}".`, assign);

    const expr = new TokenBuffer(expression);
    return new Attribute(nameToken.value, lead.concat(new TokenBuffer([nameToken, assign]), expr, this.lineEnd()), expr);
  }

  private parseBlock(lead: TokenBuffer, typeToken: Token): Block {
    // type "label" "label" { ... }
    const labelTokens: Token[] = [];
    while (this.check(TokenType.String) || this.check(TokenType.Identifier)) labelTokens.push(this.advance());

    const lbrace = this.consume(TokenType.LBrace, `Expect '=' or '{' after "${typeToken.value}".`);

    const opener: Token[] = [];
    if (this.check(TokenType.Comment)) opener.push(this.advance());
    if (this.check(TokenType.Newline)) opener.push(this.advance());

    const body = this.parseBody(true, new TokenBuffer(opener));
    const rbrace = this.consume(TokenType.RBrace, "Expect '}' after block body.");

    const closer: Token[] = [rbrace];
    if (this.check(TokenType.Comment)) closer.push(this.advance());
    if (!this.check(TokenType.Newline) && !this.check(TokenType.RBrace) && !this.isAtEnd()) this.error(`Expect newline after '}' of "${typeToken.value}" block.`);

    return new Block(
      typeToken.value,
      labelTokens.map((token) => unquote(token)),
      new TokenBuffer([...lead, typeToken, ...labelTokens, lbrace]),
      body,
      new TokenBuffer(closer).concat(this.lineEnd())
    );
  }

  /** The newline closing an item; synthesized for the last line of a file that has none. */
  private lineEnd(): TokenBuffer {
    if (this.check(TokenType.Newline)) return new TokenBuffer([this.advance()]);
    if (this.isAtEnd()) return new TokenBuffer([newlineToken()]);
    return new TokenBuffer();
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    return this.error(message);
  }

  private error(message: string, token: Token = this.peek()): never {
    throw new ParseError(message, token.line, token.column);
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

function unquote(token: Token): string {
  if (token.type !== TokenType.String) return token.value;
  return token.value.slice(1, -1).replaceAll(/\\(["\\])/g, '$1');
}
