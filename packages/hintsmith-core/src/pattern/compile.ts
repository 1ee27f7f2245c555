import type { SyntaxLanguage } from "../syntax/types.ts";
import { extractConstraints, placeholdersIn } from "./placeholders.ts";
import type { CompiledPattern, Pattern } from "./types.ts";

/** Parses pattern text for its kind. Throws `PatternCompileError` on text the language rejects. */
export function compilePattern(pattern: Pattern, language: SyntaxLanguage): CompiledPattern {
  const { text, constraints } = extractConstraints(pattern.text);
  return {
    pattern,
    language,
    tree: language.parsePattern(text, pattern.kind),
    constraints,
    placeholders: placeholdersIn(text),
  };
}
