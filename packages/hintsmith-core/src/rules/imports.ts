export type ImportDirective = {
  readonly addImports: readonly string[];
  readonly removeImports: readonly string[];
  readonly addStaticImports: readonly string[];
  readonly removeStaticImports: readonly string[];
  /** Old static import → new static import. */
  readonly replaceStaticImports: ReadonlyMap<string, string>;
};

export type ImportDirectiveInput = {
  addImports?: Iterable<string>;
  removeImports?: Iterable<string>;
  addStaticImports?: Iterable<string>;
  removeStaticImports?: Iterable<string>;
  replaceStaticImports?: Iterable<readonly [string, string]>;
};

function uniqueList(values: Iterable<string> | undefined): readonly string[] {
  return Object.freeze([...new Set(values ?? [])]);
}

export function createImportDirective(input: ImportDirectiveInput = {}): ImportDirective {
  return Object.freeze({
    addImports: uniqueList(input.addImports),
    removeImports: uniqueList(input.removeImports),
    addStaticImports: uniqueList(input.addStaticImports),
    removeStaticImports: uniqueList(input.removeStaticImports),
    replaceStaticImports: new Map(input.replaceStaticImports ?? []),
  });
}

export const EMPTY_IMPORT_DIRECTIVE: ImportDirective = createImportDirective();

export function isEmptyImportDirective(directive: ImportDirective): boolean {
  return (
    directive.addImports.length === 0 &&
    directive.removeImports.length === 0 &&
    directive.addStaticImports.length === 0 &&
    directive.removeStaticImports.length === 0 &&
    directive.replaceStaticImports.size === 0
  );
}

/**
 * Union of the given directives, in argument order. Lists keep the first
 * occurrence of every entry; for replacements a later directive wins.
 */
export function mergeImportDirectives(
  ...directives: ReadonlyArray<ImportDirective | null | undefined>
): ImportDirective {
  const present = directives.filter((directive): directive is ImportDirective => !!directive);
  return createImportDirective({
    addImports: present.flatMap((directive) => directive.addImports),
    removeImports: present.flatMap((directive) => directive.removeImports),
    addStaticImports: present.flatMap((directive) => directive.addStaticImports),
    removeStaticImports: present.flatMap((directive) => directive.removeStaticImports),
    replaceStaticImports: present.flatMap((directive) => [...directive.replaceStaticImports]),
  });
}

const QUALIFIED_TYPE_NAME = /\b([a-z][a-z0-9_]*(?:\.[a-z][a-z0-9_]*)*\.[A-Z][A-Za-z0-9_]*)\b/g;

/**
 * Fully qualified type names spelled out in replacement text, such as
 * `java.util.Objects` in `java.util.Objects.equals($a, $b)`. Names glued
 * to a placeholder or to a preceding member access are not candidates.
 */
export function detectImports(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(QUALIFIED_TYPE_NAME)) {
    const name = match[1];
    const start = match.index ?? 0;
    if (name === undefined) {
      continue;
    }
    const before = text[start - 1];
    const after = text[start + name.length];
    if (before === "$" || before === "." || after === "$") {
      continue;
    }
    found.add(name);
  }
  return [...found];
}
