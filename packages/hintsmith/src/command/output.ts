import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { ImportDirective } from "@hintsmith/core";
import type { ApplyResult, ReportEntry } from "@hintsmith/rewrite";

export type FormatOutputOptions = {
  color?: boolean;
  chalkInstance?: ChalkInstance;
};

export function formatApplyOutput(result: ApplyResult, options: FormatOutputOptions = {}): string {
  const chalkInstance = buildChalk(options);
  const useColor = chalkInstance.level > 0;
  const paint = (style: (value: string) => string, value: string) =>
    useColor ? style(value) : value;
  const lines: string[] = [];
  const changedFiles = result.files.filter((file) => file.replacementCount > 0);

  for (const file of changedFiles) {
    lines.push(paint(chalkInstance.bold, `diff --git a/${file.file} b/${file.file}`));
    lines.push(paint(chalkInstance.gray, `--- a/${file.file}`));
    lines.push(paint(chalkInstance.gray, `+++ b/${file.file}`));

    for (const occurrence of file.occurrences) {
      if (!occurrence.applied || occurrence.replacement === null) {
        continue;
      }

      const oldCount = countLines(occurrence.matched);
      const newCount = countLines(occurrence.replacement);
      const hunkHeader = `@@ -${occurrence.line},${oldCount} +${occurrence.line},${newCount} @@`;
      lines.push(
        paint(
          chalkInstance.cyan,
          occurrence.description ? `${hunkHeader} ${occurrence.description}` : hunkHeader,
        ),
      );

      for (const oldLine of splitDiffLines(occurrence.matched)) {
        lines.push(paint(chalkInstance.red, `-${oldLine}`));
      }
      for (const newLine of splitDiffLines(occurrence.replacement)) {
        lines.push(paint(chalkInstance.green, `+${newLine}`));
      }
    }

    if (file.imports) {
      for (const line of formatImportDirective(file.imports)) {
        lines.push(paint(chalkInstance.yellow, `# ${line}`));
      }
    }
  }

  for (const file of result.files) {
    for (const occurrence of file.occurrences) {
      if (occurrence.replacement !== null) {
        continue;
      }
      const label = occurrence.description ?? occurrence.pattern;
      lines.push(
        `${file.file}:${occurrence.line}:${occurrence.character} ${paint(
          severityStyle(chalkInstance, occurrence.severity),
          occurrence.severity,
        )} ${label}`,
      );
    }
  }

  if (result.totalMatches === 0) {
    lines.push(paint(chalkInstance.gray, "No matches."));
  } else if (changedFiles.length === 0) {
    lines.push(paint(chalkInstance.gray, "No changes."));
  }

  const summary = [
    `${result.filesChanged} ${pluralize("file", result.filesChanged)} changed`,
    `${result.totalReplacements} ${pluralize("replacement", result.totalReplacements)}`,
    `${result.totalMatches} ${pluralize("match", result.totalMatches)}`,
    result.skippedRules > 0
      ? `${result.skippedRules} ${pluralize("rule", result.skippedRules)} skipped`
      : null,
    result.dryRun ? "(dry-run)" : null,
  ]
    .filter((part) => part !== null)
    .join(", ");
  lines.push(paint(chalkInstance.gray, summary));

  return lines.join("\n");
}

export function formatReportText(
  entries: readonly ReportEntry[],
  options: FormatOutputOptions = {},
): string {
  const chalkInstance = buildChalk(options);
  const useColor = chalkInstance.level > 0;
  const lines: string[] = [];

  for (const entry of entries) {
    const severity = useColor
      ? severityStyle(chalkInstance, entry.severity)(entry.severity)
      : entry.severity;
    lines.push(
      `${entry.file}:${entry.line}:${entry.character} ${severity} ${entry.description ?? entry.pattern}`,
    );
    const matched = firstLine(entry.matched);
    lines.push(
      entry.replacement === null
        ? `  ${matched}`
        : `  ${matched} => ${firstLine(entry.replacement)}`,
    );
  }

  const summary = `${entries.length} ${pluralize("finding", entries.length)}`;
  lines.push(useColor ? chalkInstance.gray(summary) : summary);
  return lines.join("\n");
}

export function formatImportDirective(directive: ImportDirective): string[] {
  return [
    ...directive.addImports.map((name) => `add import ${name}`),
    ...directive.removeImports.map((name) => `remove import ${name}`),
    ...directive.addStaticImports.map((name) => `add static import ${name}`),
    ...directive.removeStaticImports.map((name) => `remove static import ${name}`),
    ...[...directive.replaceStaticImports].map(
      ([from, to]) => `replace static import ${from} with ${to}`,
    ),
  ];
}

export function buildChalk(options: FormatOutputOptions): ChalkInstance {
  if (options.chalkInstance) {
    return options.chalkInstance;
  }

  const shouldColor = options.color ?? false;
  if (!shouldColor) {
    return new Chalk({ level: 0 });
  }

  const level = chalk.level > 0 ? chalk.level : 1;
  return new Chalk({ level });
}

export function splitDiffLines(text: string): string[] {
  const normalized = text.replaceAll("\r\n", "\n");
  if (normalized.length === 0) {
    return [];
  }

  if (normalized.endsWith("\n")) {
    return normalized.slice(0, -1).split("\n");
  }

  return normalized.split("\n");
}

export function countLines(text: string): number {
  return splitDiffLines(text).length;
}

function severityStyle(chalkInstance: ChalkInstance, severity: string): ChalkInstance {
  switch (severity) {
    case "error":
      return chalkInstance.red;
    case "warning":
      return chalkInstance.yellow;
    default:
      return chalkInstance.blue;
  }
}

function firstLine(text: string): string {
  const [head = "", ...rest] = text.split("\n");
  return rest.length > 0 ? `${head} ...` : head;
}

function pluralize(word: string, count: number): string {
  if (count === 1) {
    return word;
  }
  return word.endsWith("ch") ? `${word}es` : `${word}s`;
}
