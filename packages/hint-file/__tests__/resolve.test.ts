import { describe, expect, test } from "vitest";
import {
  CircularIncludeError,
  HintParseError,
  IncludeLoadError,
  resolveHintFile,
  type IncludeLoader,
} from "../src/index.ts";

function loaderFor(units: Record<string, string>): IncludeLoader {
  return (id) => {
    const text = units[id];
    if (text === undefined) {
      throw new Error(`ENOENT: ${id}`);
    }
    return text;
  };
}

function sourceTexts(id: string, loader: IncludeLoader): string[] {
  return resolveHintFile(id, loader).rules.map((rule) => rule.sourcePattern.text);
}

describe("resolveHintFile", () => {
  test("splices included rules before the file's own, depth first", () => {
    const loader = loaderFor({
      main: "include first\ninclude second\nmain($x) => m($x) ;;",
      first: "include nested\nfirst($x) => f($x) ;;",
      nested: "nested($x) => n($x) ;;",
      second: "second($x) => s($x) ;;",
    });

    expect(sourceTexts("main", loader)).toEqual(["nested($x)", "first($x)", "second($x)", "main($x)"]);
  });

  test("a unit reached along two paths contributes its rules twice", () => {
    const loader = loaderFor({
      top: "include left\ninclude right\n",
      left: "include shared\n",
      right: "include shared\n",
      shared: "shared($x) => s($x) ;;",
    });

    expect(sourceTexts("top", loader)).toEqual(["shared($x)", "shared($x)"]);
  });

  test("reports the include path that closes a cycle", () => {
    const loader = loaderFor({
      a: "include b\na() => x() ;;",
      b: "include a\nb() => y() ;;",
    });

    let caught: unknown;
    try {
      resolveHintFile("a", loader);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CircularIncludeError);
    expect(caught instanceof CircularIncludeError ? caught.cycle : []).toEqual(["a", "b", "a"]);
    expect(caught instanceof Error ? caught.message : "").toBe("Circular include: a -> b -> a");
  });

  test("wraps loader failures", () => {
    const loader = loaderFor({ main: "include missing\nmain() => m() ;;" });

    expect(() => resolveHintFile("main", loader)).toThrow(IncludeLoadError);
    expect(() => resolveHintFile("main", loader)).toThrow(
      'Cannot load hint file "missing": ENOENT: missing',
    );
  });

  test("passes parse errors of included units through", () => {
    const loader = loaderFor({ main: "include broken\nmain() => m() ;;", broken: "oops()" });

    expect(() => resolveHintFile("main", loader)).toThrow(HintParseError);
  });
});
