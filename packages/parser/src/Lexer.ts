import { ParseError } from './errors';
import { type Token, TokenType } from './tokens';

interface TokenSpec {
  type: TokenType;
  regex: RegExp;
}

const HEREDOC_OPENER = /^<<(-?)([A-Z_a-z][\w-]*)\r?\n/;

/**
 * Lossless lexer: every byte of the input except horizontal whitespace ends up in a token,
 * and that whitespace is recorded on the following token as `spacesBefore`.
 */
export class Lexer {
  private input: string = '';
  private cursor: number = 0;
  private line: number = 1;
  private column: number = 1;
  private pendingSpaces: number = 0;

  // Regex rules (Order matters!)
  private specs: TokenSpec[] = [
    { type: TokenType.Number, regex: /^\d+(?:\.\d+)?(?:[Ee][+-]?\d+)?/ },
    { type: TokenType.Identifier, regex: /^[A-Z_a-z][\w-]*/ },
    { type: TokenType.Ellipsis, regex: /^\.\.\./ },
    { type: TokenType.Arrow, regex: /^=>/ },
    { type: TokenType.Operator, regex: /^(?:==|!=|<=|>=|&&|\|\|)/ },
    { type: TokenType.Assign, regex: /^=/ },
    { type: TokenType.LBrace, regex: /^{/ },
    { type: TokenType.RBrace, regex: /^}/ },
    { type: TokenType.LBracket, regex: /^\[/ },
    { type: TokenType.RBracket, regex: /^]/ },
    { type: TokenType.LParen, regex: /^\(/ },
    { type: TokenType.RParen, regex: /^\)/ },
    { type: TokenType.Dot, regex: /^\./ },
    { type: TokenType.Comma, regex: /^,/ },
    { type: TokenType.Colon, regex: /^:/ },
    { type: TokenType.Question, regex: /^\?/ },
    { type: TokenType.Operator, regex: /^[!%*+/<>-]/ },
  ];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.cursor = 0;
    this.line = 1;
    this.column = 1;
    this.pendingSpaces = 0;

    // Byte order mark
    if (this.input.startsWith('\uFEFF')) this.cursor = 1;

    while (this.cursor < this.input.length) {
      const remaining = this.input.slice(this.cursor);

      // 1. Horizontal whitespace is attached to the next token
      const whitespaceMatch = remaining.match(/^[\t ]+/);
      if (whitespaceMatch) {
        this.pendingSpaces += whitespaceMatch[0].length;
        this.advance(whitespaceMatch[0]);
        continue;
      }

      // 2. Newlines
      const newlineMatch = remaining.match(/^\r?\n/);
      if (newlineMatch) {
        tokens.push(this.emit(TokenType.Newline, '\n', newlineMatch[0]));
        continue;
      }

      // 3. Comments (#, // or /* */)
      if (remaining.startsWith('#') || remaining.startsWith('//')) {
        const comment = remaining.match(/^[^\n\r]*/);
        tokens.push(this.emit(TokenType.Comment, comment ? comment[0] : remaining));
        continue;
      }
      if (remaining.startsWith('/*')) {
        const end = remaining.indexOf('*/', 2);
        if (end === -1) this.fail('Unterminated block comment');
        tokens.push(this.emit(TokenType.Comment, remaining.slice(0, end + 2)));
        continue;
      }

      // 4. Templates
      if (remaining.startsWith('"')) {
        tokens.push(this.emit(TokenType.String, remaining.slice(0, this.scanQuoted(remaining, 0))));
        continue;
      }
      const heredoc = remaining.match(HEREDOC_OPENER);
      if (heredoc) {
        tokens.push(this.emit(TokenType.Heredoc, remaining.slice(0, this.scanHeredoc(remaining, heredoc[0].length, heredoc[2]))));
        continue;
      }

      // 5. Match Token
      let matched = false;
      for (const spec of this.specs) {
        const match = remaining.match(spec.regex);
        if (match) {
          tokens.push(this.emit(spec.type, match[0]));
          matched = true;
          break;
        }
      }

      if (!matched) this.fail(`Unexpected character "${remaining[0]}"`);
    }

    tokens.push({ type: TokenType.EOF, value: '', spacesBefore: this.pendingSpaces, line: this.line, column: this.column });
    return tokens;
  }

  /** Returns the index just past the closing quote of the template starting at `start`. */
  private scanQuoted(text: string, start: number): number {
    let i = start + 1;
    while (i < text.length) {
      const char = text[i];
      if (char === '\\') {
        i += 2;
        continue;
      }
      if (char === '"') return i + 1;
      if (char === '\n' || char === '\r') break;
      if ((char === '$' || char === '%') && text[i + 1] === '{') {
        // $${ and %%{ are literal escapes
        if (text[i - 1] === char) {
          i += 2;
          continue;
        }
        i = this.scanInterpolation(text, i + 2);
        continue;
      }
      i++;
    }
    return this.fail('Unterminated string');
  }

  private scanInterpolation(text: string, start: number): number {
    let depth = 1;
    let i = start;
    while (i < text.length) {
      const char = text[i];
      if (char === '"') {
        i = this.scanQuoted(text, i);
        continue;
      }
      if (char === '{') depth++;
      if (char === '}' && --depth === 0) return i + 1;
      i++;
    }
    return this.fail('Unterminated template interpolation');
  }

  private scanHeredoc(text: string, bodyStart: number, marker: string): number {
    let lineStart = bodyStart;
    while (lineStart < text.length) {
      const newline = text.indexOf('\n', lineStart);
      const lineEnd = newline === -1 ? text.length : newline;
      const content = text.slice(lineStart, lineEnd).replace(/\r$/, '');
      if (content.trim() === marker) return lineStart + content.length;
      if (newline === -1) break;
      lineStart = newline + 1;
    }
    return this.fail(`Unterminated heredoc, expected closing marker "${marker}"`);
  }

  private emit(type: TokenType, value: string, raw: string = value): Token {
    const token: Token = { type, value, spacesBefore: this.pendingSpaces, line: this.line, column: this.column };
    this.pendingSpaces = 0;
    this.advance(raw);
    return token;
  }

  private fail(message: string): never {
    throw new ParseError(message, this.line, this.column);
  }

  private advance(text: string) {
    for (const char of text)
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else this.column++;
    this.cursor += text.length;
  }
}
