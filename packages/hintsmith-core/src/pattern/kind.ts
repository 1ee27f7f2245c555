import { findClosingBracket, forEachCodeChar } from "../common/scan.ts";
import type { PatternKind } from "./types.ts";

const STATEMENT_KEYWORDS =
  /^(if|for|while|do|return|throw|try|switch|const|let|var|break|continue)\b/;
const OPERATOR_CHARS = new Set(["+", "-", "*", "/", "%", "<", ">", "=", "!", "&", "|", "?", "^", "~", ":", ","]);

/**
 * Guesses the kind of a source pattern from its text, checked in order:
 * decorators, imports, blocks, statements, constructor and method calls,
 * and finally plain expressions.
 */
export function inferPatternKind(text: string): PatternKind {
  const trimmed = text.trim();
  if (trimmed.startsWith("@")) {
    return "ANNOTATION";
  }
  if (/^import\b/.test(trimmed)) {
    return "IMPORT";
  }
  if (trimmed.startsWith("{")) {
    return "BLOCK";
  }

  const semicolons: number[] = [];
  forEachCodeChar(trimmed, (char, index, depth) => {
    if (char === ";" && depth === 0) {
      semicolons.push(index);
    }
  });
  if (semicolons.length > 1) {
    return "STATEMENT_SEQUENCE";
  }
  if (semicolons.length === 1) {
    return semicolons[0] === trimmed.length - 1 ? "STATEMENT" : "STATEMENT_SEQUENCE";
  }
  if (STATEMENT_KEYWORDS.test(trimmed)) {
    return "STATEMENT";
  }

  if (trimmed.endsWith(")")) {
    const isConstruction = /^new\s/.test(trimmed);
    const callee = isConstruction ? trimmed.replace(/^new\s+/, "") : trimmed;
    if (isCallShaped(callee)) {
      if (!isConstruction) {
        return "METHOD_CALL";
      }
      const open = callee.indexOf("(");
      return findClosingBracket(callee, open) === callee.length - 1 ? "CONSTRUCTOR" : "METHOD_CALL";
    }
  }

  return "EXPRESSION";
}

// A call has no operator or whitespace outside its brackets.
function isCallShaped(text: string): boolean {
  let shaped = true;
  forEachCodeChar(text, (char, _index, depth) => {
    if (depth === 0 && (OPERATOR_CHARS.has(char) || /\s/.test(char))) {
      shaped = false;
      return true;
    }
  });
  return shaped;
}
