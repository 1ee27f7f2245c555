type Mode = "normal" | "single" | "double" | "template" | "line-comment" | "block-comment";

type StackEntry = {
  close: ")" | "]" | "}";
  // A `{` that opened a `${ ... }` template expression returns to template mode.
  templateExpr: boolean;
};

/**
 * Called for every character that is code: outside strings, template text and
 * comments. `depth` is the bracket depth around the character, so an opening
 * bracket and its matching close both report the depth they sit at.
 * Returning `true` stops the scan.
 */
export type CodeCharVisitor = (char: string, index: number, depth: number) => boolean | void;

export function forEachCodeChar(text: string, visit: CodeCharVisitor): void {
  let mode: Mode = "normal";
  const stack: StackEntry[] = [];

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i] ?? "";
    const next = i + 1 < text.length ? text[i + 1] : "";

    if (mode === "line-comment") {
      if (ch === "\n") {
        mode = "normal";
      }
      continue;
    }

    if (mode === "block-comment") {
      if (ch === "*" && next === "/") {
        mode = "normal";
        i += 1;
      }
      continue;
    }

    if (mode === "single" || mode === "double") {
      if (ch === "\\") {
        i += 1;
        continue;
      }
      if ((mode === "single" && ch === "'") || (mode === "double" && ch === '"')) {
        mode = "normal";
      }
      continue;
    }

    if (mode === "template") {
      if (ch === "\\") {
        i += 1;
        continue;
      }
      if (ch === "`") {
        mode = "normal";
        continue;
      }
      if (ch === "$" && next === "{") {
        stack.push({ close: "}", templateExpr: true });
        mode = "normal";
        i += 1;
      }
      continue;
    }

    if (ch === "/" && next === "/") {
      mode = "line-comment";
      i += 1;
      continue;
    }
    if (ch === "/" && next === "*") {
      mode = "block-comment";
      i += 1;
      continue;
    }
    if (ch === "'") {
      mode = "single";
      continue;
    }
    if (ch === '"') {
      mode = "double";
      continue;
    }
    if (ch === "`") {
      mode = "template";
      continue;
    }

    if (ch === "(" || ch === "[" || ch === "{") {
      if (visit(ch, i, stack.length) === true) {
        return;
      }
      stack.push({ close: ch === "(" ? ")" : ch === "[" ? "]" : "}", templateExpr: false });
      continue;
    }

    if (ch === ")" || ch === "]" || ch === "}") {
      const top = stack[stack.length - 1];
      if (top && top.close === ch) {
        stack.pop();
        if (top.templateExpr) {
          mode = "template";
          continue;
        }
      }
      if (visit(ch, i, stack.length) === true) {
        return;
      }
      continue;
    }

    if (visit(ch, i, stack.length) === true) {
      return;
    }
  }
}

/** Start indices of `token` occurrences that sit at bracket depth zero in code. */
export function findTopLevel(text: string, token: string): number[] {
  const found: number[] = [];
  let skipUntil = -1;
  forEachCodeChar(text, (_char, index, depth) => {
    if (depth !== 0 || index < skipUntil) {
      return;
    }
    if (text.startsWith(token, index)) {
      found.push(index);
      skipUntil = index + token.length;
    }
  });
  return found;
}

/** Index of the bracket closing the one opened at `openIndex`, or -1. */
export function findClosingBracket(text: string, openIndex: number): number {
  const openDepth = depthAt(text, openIndex);
  let closing = -1;
  forEachCodeChar(text, (char, index, depth) => {
    if (index <= openIndex) {
      return;
    }
    if ((char === ")" || char === "]" || char === "}") && depth === openDepth) {
      closing = index;
      return true;
    }
  });
  return closing;
}

function depthAt(text: string, target: number): number {
  let found = -1;
  forEachCodeChar(text, (_char, index, depth) => {
    if (index === target) {
      found = depth;
      return true;
    }
  });
  return found;
}
