import { createLineStarts, toLineCharacter } from "@hintsmith/core";
import { HintParseError } from "./errors.ts";

export type MetadataDirective = { key: string; value: string; line: number };

export type LexedHintText = {
  /** Input with comments and directive lines blanked out; offsets and lines are unchanged. */
  code: string;
  metadata: MetadataDirective[];
  includes: string[];
  lineOf(offset: number): number;
};

const METADATA_LINE = /^<!\s*([A-Za-z][\w.-]*)\s*:\s*(.*?)\s*>$/;
const INCLUDE_LINE = /^include\s+<?([^\s<>;]+)>?\s*;?$/;

/**
 * Splits hint text into its lexical partitions. Comments become spaces so
 * that every later offset still points into the original text.
 */
export function lexHintText(text: string, unitId?: string): LexedHintText {
  const lineStarts = createLineStarts(text);
  const lineOf = (offset: number) => toLineCharacter(lineStarts, offset).line;

  const chars = blankComments(text).split("");
  const metadata: MetadataDirective[] = [];
  const includes: string[] = [];

  lineStarts.forEach((start, index) => {
    const end = lineStarts[index + 1] ?? chars.length;
    const line = chars.slice(start, end).join("").trim();
    if (line.startsWith("<!")) {
      const directive = METADATA_LINE.exec(line);
      if (!directive) {
        throw new HintParseError(index + 1, `Invalid metadata directive "${line}".`, unitId);
      }
      metadata.push({ key: directive[1] ?? "", value: directive[2] ?? "", line: index + 1 });
    } else if (/^include(?=\s|$)(?!\s*\()/.test(line)) {
      const include = INCLUDE_LINE.exec(line);
      if (!include) {
        throw new HintParseError(index + 1, `Invalid include directive "${line}".`, unitId);
      }
      includes.push(include[1] ?? "");
    } else {
      return;
    }

    for (let offset = start; offset < end; offset += 1) {
      if (chars[offset] !== "\n" && chars[offset] !== "\r") {
        chars[offset] = " ";
      }
    }
  });

  return { code: chars.join(""), metadata, includes, lineOf };
}

function blankComments(text: string): string {
  let out = "";
  let quote: string | null = null;

  for (let index = 0; index < text.length; index += 1) {
    const ch = text[index] ?? "";
    const next = text[index + 1] ?? "";

    if (quote !== null) {
      out += ch;
      if (ch === "\\" && index + 1 < text.length) {
        out += next;
        index += 1;
      } else if (ch === quote || (ch === "\n" && quote !== "`")) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'" || ch === "`") {
      quote = ch;
      out += ch;
      continue;
    }

    if (ch === "/" && next === "/") {
      while (index < text.length && text[index] !== "\n") {
        out += " ";
        index += 1;
      }
      index -= 1;
      continue;
    }

    if (ch === "/" && next === "*") {
      const close = text.indexOf("*/", index + 2);
      const end = close === -1 ? text.length : close + 2;
      out += text.slice(index, end).replace(/[^\r\n]/g, " ");
      index = end - 1;
      continue;
    }

    out += ch;
  }

  return out;
}
