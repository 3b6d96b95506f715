export * from './ast';
export * from './errors';
export * from './Lexer';
export * from './Parser';
export * from './TokenBuffer';
export * from './tokens';
