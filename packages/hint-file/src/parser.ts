import {
  AUTO_BINDINGS,
  GuardSyntaxError,
  OTHERWISE_GUARD,
  createImportDirective,
  createPattern,
  createTransformationRule,
  extractConstraints,
  findTopLevel,
  forEachCodeChar,
  inferPatternKind,
  parseGuardExpression,
  placeholdersIn,
  type GuardExpression,
  type ImportDirective,
  type PatternKind,
  type RewriteAlternativeInput,
  type TransformationRule,
} from "@hintsmith/core";
import { HintParseError } from "./errors.ts";
import { lexHintText, type LexedHintText, type MetadataDirective } from "./lexer.ts";
import { DEFAULT_SEVERITY, type HintFile, type HintFileMetadata } from "./types.ts";

export type ParseHintFileOptions = {
  /** Name reported in errors and used as the file id when none is declared. */
  unitId?: string;
};

type Segment = { text: string; offset: number };

type ImportKeyword =
  | "addImport"
  | "removeImport"
  | "addStaticImport"
  | "removeStaticImport"
  | "replaceStaticImport";

const IMPORT_KEYWORD =
  /(?<![\w$.])(addImport|removeImport|addStaticImport|removeStaticImport|replaceStaticImport)(?=\s|$)/g;
const DESCRIPTION = /^\s*"((?:[^"\\\n]|\\.)*)"\s*:(?!:)/;
// Marks an `:: otherwise` guard, which is not an expression.
const OTHERWISE = Symbol("otherwise");

/**
 * Parses hint file text. Rules look like
 *
 * ```
 * "Prefer includes":
 * $xs.indexOf($x) !== -1 :: sourceVersionGE(2016)
 * => $xs.includes($x)
 * ;;
 * ```
 *
 * Includes are recorded, not resolved; see `resolveHintFile`.
 */
export function parseHintFile(text: string, options: ParseHintFileOptions = {}): HintFile {
  const { unitId } = options;
  if (text.trim().length === 0) {
    throw new HintParseError(1, "Hint file is empty.", unitId);
  }

  const lexed = lexHintText(text, unitId);
  const metadata = buildMetadata(lexed.metadata);
  const declaredId = lexed.metadata.find((directive) => directive.key === "id")?.value;

  const rules = splitRules(lexed, unitId).map((segment) => parseRule(segment, lexed, unitId));

  return Object.freeze({
    ...(declaredId ? { id: declaredId } : unitId ? { id: unitId } : {}),
    metadata,
    rules: Object.freeze(rules),
    includes: Object.freeze([...lexed.includes]),
  });
}

function buildMetadata(directives: readonly MetadataDirective[]): HintFileMetadata {
  let description: string | undefined;
  let severity = DEFAULT_SEVERITY;
  let minSourceVersion: string | undefined;
  let tags: string[] = [];
  const properties: Record<string, string> = {};

  for (const { key, value } of directives) {
    switch (key) {
      case "id":
        break;
      case "description":
        description = value;
        break;
      case "severity":
        severity = value;
        break;
      case "minSourceVersion":
        minSourceVersion = value;
        break;
      case "tags":
        tags = value
          .split(",")
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0);
        break;
      default:
        properties[key] = value;
    }
  }

  return Object.freeze({
    ...(description !== undefined ? { description } : {}),
    severity,
    ...(minSourceVersion !== undefined ? { minSourceVersion } : {}),
    tags: Object.freeze(tags),
    properties: Object.freeze(properties),
  });
}

// A run of two or more top-level semicolons ends a rule; the last two are the
// terminator, so `return x;;;` keeps the statement's own semicolon.
function splitRules(lexed: LexedHintText, unitId: string | undefined): Segment[] {
  const { code } = lexed;
  const terminators: number[] = [];
  let runStart = -1;
  let runEnd = -1;

  const closeRun = () => {
    if (runStart !== -1 && runEnd - runStart >= 2) {
      terminators.push(runEnd - 2);
    }
    runStart = -1;
  };

  forEachCodeChar(code, (char, index, depth) => {
    if (char === ";" && depth === 0) {
      if (runStart === -1 || index !== runEnd) {
        closeRun();
        runStart = index;
      }
      runEnd = index + 1;
      return;
    }
    if (runStart !== -1 && index >= runEnd) {
      closeRun();
    }
  });
  closeRun();

  const segments: Segment[] = [];
  let cursor = 0;
  for (const terminator of terminators) {
    const segment = { text: code.slice(cursor, terminator), offset: cursor };
    if (segment.text.trim().length === 0) {
      throw new HintParseError(lexed.lineOf(terminator), "Empty rule before ';;'.", unitId);
    }
    segments.push(segment);
    cursor = terminator + 2;
  }

  const rest = code.slice(cursor);
  if (rest.trim().length > 0) {
    const restStart = cursor + (rest.length - rest.trimStart().length);
    throw new HintParseError(
      lexed.lineOf(restStart),
      "Rule is missing its ';;' terminator.",
      unitId,
    );
  }
  return segments;
}

function parseRule(
  segment: Segment,
  lexed: LexedHintText,
  unitId: string | undefined,
): TransformationRule {
  const fail = (offset: number, message: string): never => {
    throw new HintParseError(lexed.lineOf(offset), message, unitId);
  };

  let body = segment.text;
  let description: string | undefined;
  const described = DESCRIPTION.exec(body);
  if (described) {
    description = (described[1] ?? "").replace(/\\(.)/g, "$1");
    body = " ".repeat(described[0].length) + body.slice(described[0].length);
  }

  const extracted = extractImportDirectives(body, segment.offset, fail);
  body = extracted.body;

  const arrows = findTopLevel(body, "=>");
  const pieces: Segment[] = [];
  let cursor = 0;
  for (const arrow of [...arrows, body.length]) {
    pieces.push({ text: body.slice(cursor, arrow), offset: segment.offset + cursor });
    cursor = arrow + 2;
  }

  const [sourcePiece, ...replacementPieces] = pieces;
  if (!sourcePiece) {
    return fail(segment.offset, "Missing source pattern.");
  }

  const source = splitGuard(sourcePiece);
  const sourceText = source.pattern.text.trim();
  if (sourceText.length === 0) {
    return fail(firstCodeOffset(sourcePiece), "Missing source pattern.");
  }
  const sourceCode = extractConstraints(sourceText).text;
  const kind = inferPatternKind(sourceCode);
  const sourceGuard = source.guard ? parseGuard(source.guard, fail) : undefined;
  if (sourceGuard === OTHERWISE) {
    return fail(sourcePiece.offset, "'otherwise' is only valid on a replacement.");
  }

  const bound = new Set([...placeholdersIn(sourceCode), ...AUTO_BINDINGS]);
  const alternatives = replacementPieces.map((piece) =>
    parseAlternative(piece, kind, bound, fail),
  );

  return createTransformationRule({
    sourcePattern: createPattern(sourceText, kind),
    alternatives,
    ...(description !== undefined ? { description } : {}),
    ...(sourceGuard ? { sourceGuard } : {}),
    ...(extracted.imports ? { imports: extracted.imports } : {}),
  });
}

function parseAlternative(
  piece: Segment,
  kind: PatternKind,
  bound: ReadonlySet<string>,
  fail: (offset: number, message: string) => never,
): RewriteAlternativeInput {
  const { pattern, guard } = splitGuard(piece);
  const replacementText = pattern.text.trim();
  if (replacementText.length === 0) {
    return fail(piece.offset, "Missing replacement after '=>'.");
  }

  for (const name of placeholdersIn(replacementText)) {
    if (!bound.has(name)) {
      fail(firstCodeOffset(pattern), `Replacement uses unbound placeholder ${name}.`);
    }
  }

  const condition = guard ? parseGuard(guard, fail) : undefined;
  const replacementPattern = createPattern(replacementText, kind);
  if (condition === OTHERWISE) {
    return { replacementPattern, isOtherwise: true };
  }
  return condition ? { replacementPattern, condition } : { replacementPattern };
}

function splitGuard(piece: Segment): { pattern: Segment; guard: Segment | null } {
  const separator = findTopLevel(piece.text, "::")[0];
  if (separator === undefined) {
    return { pattern: piece, guard: null };
  }
  return {
    pattern: { text: piece.text.slice(0, separator), offset: piece.offset },
    guard: { text: piece.text.slice(separator + 2), offset: piece.offset + separator + 2 },
  };
}

function parseGuard(
  guard: Segment,
  fail: (offset: number, message: string) => never,
): GuardExpression | typeof OTHERWISE {
  const text = guard.text.trim();
  if (text.length === 0) {
    return fail(guard.offset, "Missing guard after '::'.");
  }
  if (text === OTHERWISE_GUARD) {
    return OTHERWISE;
  }
  try {
    return parseGuardExpression(text);
  } catch (error) {
    if (error instanceof GuardSyntaxError) {
      return fail(firstCodeOffset(guard), error.message);
    }
    throw error;
  }
}

// Import directives may start a line or follow a guard on the same line. A
// directive runs to the end of its line, the next `=>` or the next directive.
function extractImportDirectives(
  body: string,
  baseOffset: number,
  fail: (offset: number, message: string) => never,
): { body: string; imports: ImportDirective | null } {
  const topLevel = new Set<number>();
  forEachCodeChar(body, (_char, index, depth) => {
    if (depth === 0) {
      topLevel.add(index);
    }
  });
  const starts = [...body.matchAll(IMPORT_KEYWORD)]
    .map((found) => ({ index: found.index ?? 0, keyword: found[1] ?? "" }))
    .filter((found) => topLevel.has(found.index));
  if (starts.length === 0) {
    return { body, imports: null };
  }

  const arrows = findTopLevel(body, "=>");
  const lists: Record<Exclude<ImportKeyword, "replaceStaticImport">, string[]> = {
    addImport: [],
    removeImport: [],
    addStaticImport: [],
    removeStaticImport: [],
  };
  const replacements: Array<[string, string]> = [];
  let kept = body;

  starts.forEach(({ index, keyword }, position) => {
    const lineEnd = body.indexOf("\n", index);
    const end = Math.min(
      lineEnd === -1 ? body.length : lineEnd,
      arrows.find((arrow) => arrow > index) ?? body.length,
      starts[position + 1]?.index ?? body.length,
    );
    const args = body
      .slice(index + keyword.length, end)
      .split(/\s+/)
      .filter((arg) => arg.length > 0);
    kept = kept.slice(0, index) + " ".repeat(end - index) + kept.slice(end);

    if (keyword === "replaceStaticImport") {
      const [from, to] = args;
      if (args.length !== 2 || !from || !to) {
        fail(baseOffset + index, "replaceStaticImport takes an old and a new name.");
      } else {
        replacements.push([from, to]);
      }
    } else if (isListKeyword(keyword)) {
      const [name] = args;
      if (args.length !== 1 || !name) {
        fail(baseOffset + index, `${keyword} takes exactly one qualified name.`);
      } else {
        lists[keyword].push(name);
      }
    }
  });

  return {
    body: kept,
    imports: createImportDirective({
      addImports: lists.addImport,
      removeImports: lists.removeImport,
      addStaticImports: lists.addStaticImport,
      removeStaticImports: lists.removeStaticImport,
      replaceStaticImports: replacements,
    }),
  };
}

function isListKeyword(
  keyword: string,
): keyword is Exclude<ImportKeyword, "replaceStaticImport"> {
  return (
    keyword === "addImport" ||
    keyword === "removeImport" ||
    keyword === "addStaticImport" ||
    keyword === "removeStaticImport"
  );
}

function firstCodeOffset(segment: Segment): number {
  return segment.offset + (segment.text.length - segment.text.trimStart().length);
}
