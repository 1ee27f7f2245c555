import { TemplateRenderError } from "../errors.ts";
import { extractConstraints, placeholderPattern } from "./placeholders.ts";
import type { Bindings } from "./types.ts";

export type TemplateToken = { kind: "text"; value: string } | { kind: "placeholder"; name: string };

export type CompiledReplacement = {
  source: string;
  tokens: readonly TemplateToken[];
};

export function compileReplacement(source: string): CompiledReplacement {
  const text = extractConstraints(source).text;
  const tokens: TemplateToken[] = [];
  let cursor = 0;
  for (const found of text.matchAll(placeholderPattern())) {
    const index = found.index ?? 0;
    if (index > cursor) {
      tokens.push({ kind: "text", value: text.slice(cursor, index) });
    }
    tokens.push({ kind: "placeholder", name: found[0] });
    cursor = index + found[0].length;
  }
  if (cursor < text.length) {
    tokens.push({ kind: "text", value: text.slice(cursor) });
  }
  return { source, tokens };
}

export function renderReplacement(
  template: string,
  bindings: Bindings,
  sourceText: string,
): string {
  return renderCompiledReplacement(compileReplacement(template), bindings, sourceText);
}

/**
 * Pastes the original source text of every binding into the template.
 *
 * An empty variadic binding takes the `,` or `;` that follows it along, or
 * the dangling `,` before a closing bracket. A `;` right after a placeholder
 * is dropped when the pasted text already ends a statement.
 */
export function renderCompiledReplacement(
  template: CompiledReplacement,
  bindings: Bindings,
  sourceText: string,
): string {
  let rendered = "";
  let pending: "empty" | "statement" | null = null;

  for (const token of template.tokens) {
    if (token.kind === "text") {
      let value = token.value;
      if (pending === "empty") {
        if (/^\s*[,;]/.test(value)) {
          value = value.replace(/^\s*[,;][ \t]*/, "");
        } else if (/^\s*[)\]}>]/.test(value)) {
          rendered = rendered.replace(/,\s*$/, "");
        }
      } else if (pending === "statement") {
        value = value.replace(/^;/, "");
      }
      pending = null;
      rendered += value;
      continue;
    }

    const binding = bindings.get(token.name);
    if (!binding) {
      throw new TemplateRenderError(`Replacement uses unknown placeholder "${token.name}".`);
    }

    const pasted = sourceText.slice(binding.offset, binding.offset + binding.length);
    if (binding.kind === "list" && binding.nodes.length === 0) {
      pending = "empty";
    } else if (/[;}]\s*$/.test(pasted)) {
      pending = "statement";
    } else {
      pending = null;
    }
    rendered += pasted;
  }

  return rendered;
}
