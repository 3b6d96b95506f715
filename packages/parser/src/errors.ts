export class ParseError extends Error {
  constructor(
    readonly detail: string,
    readonly line: number,
    readonly column: number
  ) {
    super(`[Line ${line}, Column ${column}] ${detail}`);
    this.name = 'ParseError';
  }
}
