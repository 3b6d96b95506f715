import { CLOSING_TOKENS, type Document, Lexer, OPENING_TOKENS, type Token, TokenType } from '@tfsort/parser';

const INDENT = '  ';

// Identifiers that read as keywords inside for expressions
const KEYWORDS = new Set(['for', 'in', 'if']);

// Tokens after which '-' and '!' are prefix operators
const UNARY_CONTEXT = new Set([TokenType.Assign, TokenType.Operator, TokenType.LParen, TokenType.LBracket, TokenType.LBrace, TokenType.Comma, TokenType.Colon, TokenType.Question, TokenType.Arrow]);

interface Line {
  tokens: Token[];
  indent: number;
}

/**
 * Canonical layout: two-space indentation per open bracket line, normalized spacing between tokens,
 * '=' aligned across consecutive attribute lines. Token text and line breaks are never changed.
 */
export function format(source: string): string {
  const lines = splitLines(new Lexer(source).tokenize());
  computeIndents(lines);

  const rendered = lines.map((line) => renderLine(line));
  alignAssignments(lines, rendered);

  while (rendered.length > 0 && rendered.at(-1) === '') rendered.pop();
  return rendered.length === 0 ? '' : `${rendered.join('\n')}\n`;
}

export function formatDocument(document: Document): string {
  return format(document.toString());
}

function splitLines(tokens: Token[]): Line[] {
  const lines: Line[] = [];
  let current: Token[] = [];
  for (const token of tokens) {
    if (token.type === TokenType.EOF) break;
    if (token.type === TokenType.Newline) {
      lines.push({ tokens: current, indent: 0 });
      current = [];
    } else current.push(token);
  }
  lines.push({ tokens: current, indent: 0 });
  return lines;
}

/*
 * Each line that leaves brackets open adds one indentation level, however many it opens.
 * Closing brackets at the start of a line dedent that line itself.
 */
function computeIndents(lines: Line[]): void {
  const levels: number[] = [];

  const close = (count: number) => {
    let remaining = count;
    while (remaining > 0 && levels.length > 0) {
      const top = levels.pop() ?? 0;
      if (top > remaining) levels.push(top - remaining);
      remaining -= top;
    }
  };

  for (const line of lines) {
    let index = 0;
    while (index < line.tokens.length && CLOSING_TOKENS.has(line.tokens[index].type)) {
      close(1);
      index++;
    }
    line.indent = levels.length;

    let net = 0;
    for (const token of line.tokens.slice(index)) {
      if (OPENING_TOKENS.has(token.type)) net++;
      if (CLOSING_TOKENS.has(token.type)) net--;
    }
    if (net > 0) levels.push(net);
    else if (net < 0) close(-net);
  }
}

function renderLine(line: Line): string {
  if (line.tokens.length === 0) return '';

  let out = INDENT.repeat(line.indent);
  line.tokens.forEach((token, index) => {
    if (index > 0) out += ' '.repeat(spacing(index > 1 ? line.tokens[index - 2] : undefined, line.tokens[index - 1], token));
    out += token.value;
  });
  return out;
}

function spacing(before: Token | undefined, prev: Token, next: Token): number {
  if (next.type === TokenType.Comment || prev.type === TokenType.Comment) return 1;

  if (next.type === TokenType.Comma || next.type === TokenType.Dot || next.type === TokenType.Ellipsis) return 0;
  if (next.type === TokenType.RParen || next.type === TokenType.RBracket) return 0;
  if (prev.type === TokenType.LParen || prev.type === TokenType.LBracket || prev.type === TokenType.Dot) return 0;
  if (next.type === TokenType.RBrace) return prev.type === TokenType.LBrace ? 0 : 1;

  // Calls and index expressions: f(x), a[0], list[*].id
  if (next.type === TokenType.LParen || next.type === TokenType.LBracket) {
    if (prev.type === TokenType.Identifier) return isKeyword(prev) ? 1 : 0;
    if (prev.type === TokenType.RBracket || prev.type === TokenType.RParen) return 0;
  }

  // Prefix operators: -1, !enabled
  if (prev.type === TokenType.Operator && (prev.value === '-' || prev.value === '!')) if (!before || UNARY_CONTEXT.has(before.type) || isKeyword(before)) return 0;

  return 1;
}

function isKeyword(token: Token): boolean {
  return token.type === TokenType.Identifier && KEYWORDS.has(token.value);
}

function isAssignment(line: Line): boolean {
  const [key, assign] = line.tokens;
  return (key?.type === TokenType.Identifier || key?.type === TokenType.String) && assign?.type === TokenType.Assign;
}

function alignAssignments(lines: Line[], rendered: string[]): void {
  let start = 0;
  while (start < lines.length) {
    if (!isAssignment(lines[start])) {
      start++;
      continue;
    }

    let end = start + 1;
    while (end < lines.length && isAssignment(lines[end]) && lines[end].indent === lines[start].indent) end++;

    const group = lines.slice(start, end);
    const width = group.reduce((max, line) => Math.max(max, line.tokens[0].value.length), 0);
    for (let index = start; index < end; index++) {
      const line = lines[index];
      const keyEnd = INDENT.length * line.indent + line.tokens[0].value.length;
      const rest = rendered[index].slice(keyEnd).trimStart();
      rendered[index] = rendered[index].slice(0, keyEnd) + ' '.repeat(width - line.tokens[0].value.length + 1) + rest;
    }

    start = end;
  }
}
