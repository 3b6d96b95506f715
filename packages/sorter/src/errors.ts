import type { ParseError } from '@tfsort/parser';

/** A configuration file that could not be parsed; wraps the parser's diagnostic. */
export class ConfigParseError extends Error {
  constructor(
    readonly filename: string,
    readonly diagnostic: ParseError
  ) {
    super(`error parsing HCL content from '${filename}': ${diagnostic.message}`, { cause: diagnostic });
    this.name = 'ConfigParseError';
  }
}
