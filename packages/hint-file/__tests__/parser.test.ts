import { describe, expect, test } from "vitest";
import { guardCall } from "@hintsmith/core";
import { HintParseError, parseHintFile } from "../src/index.ts";

function parseError(text: string): HintParseError {
  try {
    parseHintFile(text, { unitId: "sample.hint" });
  } catch (error) {
    if (error instanceof HintParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a parse error");
}

describe("parseHintFile", () => {
  test("parses a described rule with a source guard", () => {
    const hintFile = parseHintFile(
      [
        '"Prefer includes":',
        "$xs.indexOf($x) !== -1 :: sourceVersionGE(2016)",
        "=> $xs.includes($x)",
        ";;",
        "",
      ].join("\n"),
    );

    expect(hintFile.rules).toHaveLength(1);
    const [rule] = hintFile.rules;
    expect(rule?.description).toBe("Prefer includes");
    expect(rule?.sourcePattern.text).toBe("$xs.indexOf($x) !== -1");
    expect(rule?.sourcePattern.kind).toBe("EXPRESSION");
    expect(rule?.sourceGuard).toEqual(guardCall("sourceVersionGE", ["2016"]));
    expect(rule?.alternatives.map((alternative) => alternative.replacementPattern.text)).toEqual([
      "$xs.includes($x)",
    ]);
    expect(rule?.alternatives[0]?.isOtherwise).toBe(false);
    expect(rule?.alternatives[0]?.condition).toBeUndefined();
  });

  test("keeps replacement alternatives in declaration order", () => {
    const hintFile = parseHintFile(
      [
        "JSON.parse(JSON.stringify($v))",
        "=> structuredClone($v) :: sourceVersionGE(2022)",
        "=> deepCopy($v) :: otherwise",
        ";;",
      ].join("\n"),
    );

    const alternatives = hintFile.rules[0]?.alternatives ?? [];
    expect(alternatives.map((alternative) => alternative.replacementPattern.text)).toEqual([
      "structuredClone($v)",
      "deepCopy($v)",
    ]);
    expect(alternatives[0]?.condition).toEqual(guardCall("sourceVersionGE", ["2022"]));
    expect(alternatives.map((alternative) => alternative.isOtherwise)).toEqual([false, true]);
    expect(alternatives.every((alternative) => alternative.replacementPattern.kind === "METHOD_CALL")).toBe(
      true,
    );
  });

  test("a rule without '=>' only reports", () => {
    const hintFile = parseHintFile('"Avoid eval":\neval($code)\n;;\n');

    expect(hintFile.rules[0]?.alternatives).toEqual([]);
    expect(hintFile.rules[0]?.sourcePattern.kind).toBe("METHOD_CALL");
  });

  test("reads import directives into the rule", () => {
    const hintFile = parseHintFile(
      [
        "isEqual($a, $b)",
        "=> lodash.Util.isEqual($a, $b)",
        "addImport lodash.Util",
        "removeImport legacy.Equality",
        "replaceStaticImport legacy.Eq.check lodash.Util.isEqual",
        ";;",
      ].join("\n"),
    );

    const rule = hintFile.rules[0];
    expect(rule?.alternatives[0]?.replacementPattern.text).toBe("lodash.Util.isEqual($a, $b)");
    expect(rule?.imports?.addImports).toEqual(["lodash.Util"]);
    expect(rule?.imports?.removeImports).toEqual(["legacy.Equality"]);
    expect([...(rule?.imports?.replaceStaticImports ?? [])]).toEqual([
      ["legacy.Eq.check", "lodash.Util.isEqual"],
    ]);
  });

  test("reads import directives that follow a guard on the same line", () => {
    const hintFile = parseHintFile(
      "read($x) => readAll($x) :: otherwise addImport fs.Reader removeImport legacy.Io ;;\nwrap($y) => $y.addImport(z) ;;",
    );

    const [first, second] = hintFile.rules;
    expect(first?.alternatives[0]?.isOtherwise).toBe(true);
    expect(first?.imports?.addImports).toEqual(["fs.Reader"]);
    expect(first?.imports?.removeImports).toEqual(["legacy.Io"]);
    expect(second?.alternatives[0]?.replacementPattern.text).toBe("$y.addImport(z)");
    expect(second?.imports).toBeUndefined();
  });

  test("a call to a function named include is a pattern, not a directive", () => {
    const hintFile = parseHintFile("include($x)\n=> contains($x)\n;;");

    expect(hintFile.includes).toEqual([]);
    expect(hintFile.rules[0]?.sourcePattern.text).toBe("include($x)");
  });

  test("a run of semicolons keeps the statement's own semicolon", () => {
    const hintFile = parseHintFile("log($x);\n=> console.log($x);;;\n");

    expect(hintFile.rules[0]?.sourcePattern.text).toBe("log($x);");
    expect(hintFile.rules[0]?.sourcePattern.kind).toBe("STATEMENT");
    expect(hintFile.rules[0]?.alternatives[0]?.replacementPattern.text).toBe("console.log($x);");
  });

  test("ignores terminators inside comments and strings", () => {
    const hintFile = parseHintFile(
      [
        "// a comment with ;; in it",
        '"Semicolons; in a description":',
        "/* also ;; here */ warn($x)",
        '=> warn($x, ";;")',
        ";;",
      ].join("\n"),
    );

    expect(hintFile.rules).toHaveLength(1);
    expect(hintFile.rules[0]?.description).toBe("Semicolons; in a description");
    expect(hintFile.rules[0]?.alternatives[0]?.replacementPattern.text).toBe('warn($x, ";;")');
  });

  test("unescapes quotes in descriptions", () => {
    const hintFile = parseHintFile('"Say \\"hi\\"":\nhello()\n=> hi()\n;;');

    expect(hintFile.rules[0]?.description).toBe('Say "hi"');
  });

  test("reads metadata and includes", () => {
    const hintFile = parseHintFile(
      [
        "<!id: sample>",
        "<!description: Sample hints>",
        "<!severity: warning>",
        "<!minSourceVersion: 2017>",
        "<!tags: a, b ,,c>",
        "<!owner: platform>",
        "include base",
        "include <extra>;",
        "",
        "f($x) => g($x) ;;",
      ].join("\n"),
      { unitId: "sample.hint" },
    );

    expect(hintFile.id).toBe("sample");
    expect(hintFile.metadata).toEqual({
      description: "Sample hints",
      severity: "warning",
      minSourceVersion: "2017",
      tags: ["a", "b", "c"],
      properties: { owner: "platform" },
    });
    expect(hintFile.includes).toEqual(["base", "extra"]);
    expect(hintFile.rules).toHaveLength(1);
  });

  test("falls back to the unit id and default severity", () => {
    const hintFile = parseHintFile("f($x) => g($x) ;;", { unitId: "plain.hint" });

    expect(hintFile.id).toBe("plain.hint");
    expect(hintFile.metadata.severity).toBe("info");
    expect(hintFile.metadata.tags).toEqual([]);
    expect(parseHintFile("f($x) => g($x) ;;").id).toBeUndefined();
  });

  test("rejects empty input", () => {
    expect(parseError("  \n").message).toBe("Line 1: Hint file is empty.");
  });

  test("rejects a rule without a terminator", () => {
    const error = parseError("a($x) => b($x) ;;\n\nc($x)\n=> d($x)\n");

    expect(error.message).toBe("Line 3: Rule is missing its ';;' terminator.");
    expect(error.line).toBe(3);
    expect(error.unitId).toBe("sample.hint");
  });

  test("rejects an empty rule", () => {
    expect(parseError("a($x) => b($x);;\n;;\n").message).toBe("Line 2: Empty rule before ';;'.");
  });

  test("rejects replacement placeholders the source does not bind", () => {
    expect(parseError("a($x)\n=> b($y)\n;;").message).toBe(
      "Line 2: Replacement uses unbound placeholder $y.",
    );
  });

  test("accepts the automatic bindings in replacements", () => {
    const hintFile = parseHintFile("a($x)\n=> wrap($_)\n;;");

    expect(hintFile.rules[0]?.alternatives[0]?.replacementPattern.text).toBe("wrap($_)");
  });

  test("rejects 'otherwise' on the source pattern", () => {
    expect(parseError("a($x) :: otherwise\n=> b($x)\n;;").message).toBe(
      "Line 1: 'otherwise' is only valid on a replacement.",
    );
  });

  test("reports guard syntax errors at the guard's line", () => {
    const error = parseError("a($x)\n=> b($x) :: ok() &&\n;;");

    expect(error.line).toBe(2);
  });

  test("rejects malformed directives", () => {
    expect(parseError("<!broken>\na() => b() ;;").message).toBe(
      'Line 1: Invalid metadata directive "<!broken>".',
    );
    expect(parseError("include\na() => b() ;;").message).toBe(
      'Line 1: Invalid include directive "include".',
    );
    expect(parseError("a()\n=> b()\naddImport\n;;").message).toBe(
      "Line 3: addImport takes exactly one qualified name.",
    );
  });
});
