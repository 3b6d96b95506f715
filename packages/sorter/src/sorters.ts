import { Attribute, Block, type Body, type BodyItem, TokenBuffer, TokenType } from '@tfsort/parser';

// First in resource/data bodies, in the order they appear
const META_ARGS_FIRST: ReadonlySet<string> = new Set(['count', 'for_each']);
// Last in resource/data bodies
const META_ARG_DEPENDS_ON = 'depends_on';

/** Byte-wise comparison of the UTF-8 encodings. */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function sortByName(attributes: Iterable<Attribute>): Attribute[] {
  return [...attributes].sort((a, b) => compareNames(a.name, b.name));
}

/** Appends an item so that it ends its own line. */
export function appendLine(body: Body, element: BodyItem): void {
  if (element instanceof TokenBuffer) {
    body.appendUnstructuredTokens(element.trimNewlines());
    body.appendNewline();
    return;
  }

  if (element instanceof Attribute) {
    body.appendAttribute(element.withTokens(element.buildTokens().trimNewlines()));
    body.appendNewline();
    return;
  }

  body.appendBlock(element);
  if (element.buildTokens().at(-1)?.type !== TokenType.Newline) body.appendNewline();
}

/*
 * Replaces the body with a blank first line followed by the non-empty groups, one blank line between groups.
 * Detached comments open the body as a group of their own.
 * Consecutive blocks inside a group are also separated by a blank line.
 */
function rebuild(body: Body, groups: BodyItem[][]): void {
  body.clear();
  body.appendNewline();

  let previous = false;
  for (const group of groups) {
    if (group.length === 0) continue;
    if (previous) body.appendNewline();

    group.forEach((element, index) => {
      if (index > 0 && element instanceof Block && group[index - 1] instanceof Block) body.appendNewline();
      appendLine(body, element);
    });
    previous = true;
  }
}

function rebuildSorted(body: Body): void {
  rebuild(body, [body.detachedComments(), sortByName(body.attributes().values()), body.blocks()]);
}

/** Sorts the provider entries of every `required_providers` block nested in a `terraform` block. */
export function sortRequiredProvidersInBlock(block: Block): void {
  for (const child of block.body.blocks()) if (child.type === 'required_providers') rebuildSorted(child.body);
}

/** Sorts the assignments of a `locals` block by name. */
export function sortLocalsBlock(block: Block): void {
  rebuildSorted(block.body);
}

/**
 * Orders a `resource` or `data` body after the Terraform style guide:
 * `count`/`for_each`, then the other arguments by name, then nested blocks, then `depends_on`.
 */
export function sortResourceParams(block: Block): void {
  const body = block.body;
  const attributes = body.attributes();

  const first: Attribute[] = [];
  const rest: Attribute[] = [];
  for (const [name, attribute] of attributes)
    if (META_ARGS_FIRST.has(name)) first.push(attribute);
    else if (name !== META_ARG_DEPENDS_ON) rest.push(attribute);

  // TODO: place a nested lifecycle block after the other nested blocks
  const dependsOn = attributes.get(META_ARG_DEPENDS_ON);
  rebuild(body, [body.detachedComments(), first, sortByName(rest), body.blocks(), dependsOn ? [dependsOn] : []]);
}
