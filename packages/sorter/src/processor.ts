import { formatDocument } from '@tfsort/formatter';
import { Block, type BodyItem, type Document, Lexer, ParseError, Parser } from '@tfsort/parser';

import { ConfigParseError } from './errors';
import { appendLine, compareNames, sortLocalsBlock, sortRequiredProvidersInBlock, sortResourceParams } from './sorters';

export const DEFAULT_SORTABLE_BLOCKS: ReadonlySet<string> = new Set(['variable', 'output']);

interface SortableBlock {
  name: string;
  block: Block;
}

/** Parses a configuration file into an editable document. */
export function parseConfig(src: string | Uint8Array, filename: string): Document {
  const content = typeof src === 'string' ? src : Buffer.from(src).toString('utf8');
  try {
    const tokens = new Lexer(content).tokenize();
    return new Parser(tokens).parse();
  } catch (error) {
    if (error instanceof ParseError) throw new ConfigParseError(filename, error);
    throw error;
  }
}

/**
 * Normalizes the inner order of `terraform`, `locals`, `resource` and `data` blocks, then moves the labelled
 * blocks whose type is in `allowedBlocks` after every other top-level item, ordered by their first label.
 * Top-level comments separated by a blank line from the item below them count as other items.
 */
export function processAndSortBlocks(document: Document, allowedBlocks: ReadonlySet<string>): Document {
  const body = document.body;

  for (const block of body.blocks())
    switch (block.type) {
      case 'terraform':
        sortRequiredProvidersInBlock(block);
        break;
      case 'resource':
      case 'data':
        sortResourceParams(block);
        break;
      case 'locals':
        sortLocalsBlock(block);
        break;
    }

  const sortableItems: SortableBlock[] = [];
  // Detached comments, such as a file header, stay with the other items in their place
  const otherItems: BodyItem[] = [];

  for (const element of body.entries()) {
    if (element instanceof Block && allowedBlocks.has(element.type) && element.labels.length > 0) sortableItems.push({ name: element.labels[0], block: element });
    else otherItems.push(element);
  }

  // Stable: blocks sharing a label keep their relative order
  sortableItems.sort((a, b) => compareNames(a.name, b.name));

  const ordered = [...otherItems, ...sortableItems.map((item) => item.block)];
  body.clear();
  ordered.forEach((element, index) => {
    appendLine(body, element);
    if (index < ordered.length - 1) body.appendNewline();
  });

  return document;
}

export function formatHclBytes(document: Document): string {
  return formatDocument(document);
}

/** Parse, sort and format one configuration file. */
export function sortConfig(src: string | Uint8Array, filename: string, allowedBlocks: ReadonlySet<string> = DEFAULT_SORTABLE_BLOCKS): string {
  return formatHclBytes(processAndSortBlocks(parseConfig(src, filename), allowedBlocks));
}
