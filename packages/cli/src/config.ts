export const DEFAULT_BLOCKS = 'variable,output';

/** Options as commander hands them over */
export interface RawSortOptions {
  blocks?: string;
  write?: boolean;
  check?: boolean;
  recursive?: boolean;
}

export interface SortOptions {
  blocks: ReadonlySet<string>; // Top-level block types sorted by their first label
  write: boolean;
  check: boolean;
  recursive: boolean;
}

export function parseBlockList(value: string): ReadonlySet<string> {
  const kinds = value
    .split(',')
    .map((kind) => kind.trim())
    .filter((kind) => kind.length > 0);
  return new Set(kinds);
}

export function resolveOptions(raw: RawSortOptions): SortOptions {
  const options: SortOptions = {
    blocks: parseBlockList(raw.blocks ?? DEFAULT_BLOCKS),
    write: raw.write ?? false,
    check: raw.check ?? false,
    recursive: raw.recursive ?? false,
  };

  if (options.write && options.check) throw new Error('--write and --check cannot be used together');
  return options;
}
