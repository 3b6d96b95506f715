export enum TokenType {
  Newline = 'NEWLINE', // \n or \r\n outside a token
  Comment = 'COMMENT', // # ..., // ..., /* ... */
  Identifier = 'IDENTIFIER', // Block types, attribute names, keywords
  String = 'STRING', // "value", interpolations included
  Heredoc = 'HEREDOC', // <<EOF ... EOF
  Number = 'NUMBER', // 123, 1.5e3
  LBrace = 'LBRACE', // {
  RBrace = 'RBRACE', // }
  LBracket = 'LBRACKET', // [
  RBracket = 'RBRACKET', // ]
  LParen = 'LPAREN', // (
  RParen = 'RPAREN', // )
  Assign = 'ASSIGN', // =
  Arrow = 'ARROW', // => (for expressions)
  Ellipsis = 'ELLIPSIS', // ...
  Dot = 'DOT', // . (for references)
  Comma = 'COMMA', // ,
  Colon = 'COLON', // :
  Question = 'QUESTION', // ?
  Operator = 'OPERATOR', // == != <= >= && || < > + - * / % !
  EOF = 'EOF', // End of File
}

export interface Token {
  type: TokenType;
  /** Raw source text, verbatim */
  value: string;
  /** Spaces and tabs between the previous token (or line start) and this one */
  spacesBefore: number;
  line: number;
  column: number;
}

export const OPENING_TOKENS: ReadonlySet<TokenType> = new Set([TokenType.LBrace, TokenType.LBracket, TokenType.LParen]);
export const CLOSING_TOKENS: ReadonlySet<TokenType> = new Set([TokenType.RBrace, TokenType.RBracket, TokenType.RParen]);

export function newlineToken(): Token {
  return { type: TokenType.Newline, value: '\n', spacesBefore: 0, line: 0, column: 0 };
}
