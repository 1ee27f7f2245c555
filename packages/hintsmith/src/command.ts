import { stderr as processStderr, stdin as processStdin } from "node:process";
import { buildCommand, type CommandContext, type TypedPositionalParameters } from "@stricli/core";
import {
  applyHintsToProject,
  formatReportCsv,
  formatReportJson,
  reportFromApplyResult,
  type ApplyOptions,
  type ApplyResult,
  type ReportEntry,
} from "@hintsmith/rewrite";
import {
  applyCommandFlagParameters,
  reportCommandFlagParameters,
  validateApplyCommandFlags,
  type ApplyCommandFlags,
  type ReportCommandFlags,
} from "./command/flags.ts";
import { formatApplyOutput, formatReportText } from "./command/output.ts";

type CommandProcess = {
  process: { stdout: { write(s: string): void; isTTY?: boolean } };
};

type RunCommandOptions = {
  /**
   * Text encoding used for reading/writing scoped source files.
   * Defaults to "utf8".
   */
  encoding?: BufferEncoding;
  /**
   * Optional logger override. Defaults to stderr when --verbose is enabled.
   */
  logger?: (line: string) => void;
  /**
   * Used for testing / embedding. If omitted and the hint input is "-", stdin
   * is read from the current process.
   */
  readStdin?: () => Promise<string>;
  /**
   * Optional stream source for stdin hint input. Ignored when `readStdin` is
   * provided. Defaults to process stdin.
   */
  stdinStream?: ReadableTextStream;
};

type ReadableTextStream = AsyncIterable<unknown> & {
  setEncoding?(encoding: BufferEncoding): void;
};

type SharedFlags = Pick<
  ApplyCommandFlags,
  "cwd" | "concurrency" | "verbose" | "source-version" | "semantic"
>;

export async function runApplyCommand(
  hintInput: string,
  scope: string | undefined,
  flags: ApplyCommandFlags,
  options: RunCommandOptions = {},
): Promise<ApplyResult> {
  validateApplyCommandFlags(flags);

  const { hints, applyOptions } = await prepareRun(hintInput, scope, flags, options);
  return applyHintsToProject(hints, {
    ...applyOptions,
    dryRun: (flags["dry-run"] ?? false) || (flags.check ?? false),
  });
}

/** Runs the hints without writing anything and flattens every occurrence. */
export async function runReportCommand(
  hintInput: string,
  scope: string | undefined,
  flags: ReportCommandFlags,
  options: RunCommandOptions = {},
): Promise<ReportEntry[]> {
  const { hints, applyOptions } = await prepareRun(hintInput, scope, flags, options);
  const result = await applyHintsToProject(hints, { ...applyOptions, dryRun: true });
  return reportFromApplyResult(result);
}

async function prepareRun(
  hintInput: string,
  scope: string | undefined,
  flags: SharedFlags,
  options: RunCommandOptions,
): Promise<{ hints: string; applyOptions: ApplyOptions }> {
  const logger =
    options.logger ??
    (flags.verbose ? (line: string) => processStderr.write(`${line}\n`) : undefined);
  const hints = await resolveHintInput(hintInput, {
    encoding: options.encoding ?? "utf8",
    readStdin: options.readStdin,
    stdinStream: options.stdinStream,
  });

  return {
    hints,
    applyOptions: {
      concurrency: flags.concurrency,
      cwd: flags.cwd,
      encoding: options.encoding,
      logger,
      scope: scope ?? ".",
      verbose: flags.verbose,
      sourceVersion: flags["source-version"] ?? null,
      semantic: flags.semantic ?? false,
    },
  };
}

const positionalParameters: TypedPositionalParameters<
  readonly [hintInput: string, scope?: string],
  CommandContext
> = {
  kind: "tuple" as const,
  parameters: [
    {
      brief: "Hint file text, path to a .hint file, or - for stdin",
      placeholder: "hints",
      parse: (input: string) => input,
    },
    {
      brief: "Scope file or directory (defaults to current directory)",
      placeholder: "scope",
      parse: (input: string) => input,
      optional: true,
    },
  ],
};

export const applyCommand = buildCommand({
  async func(this: CommandProcess, flags: ApplyCommandFlags, hintInput: string, scope?: string) {
    const result = await runApplyCommand(hintInput, scope, flags);
    if (flags.json ?? false) {
      this.process.stdout.write(JSON.stringify(result, jsonReplacer, 2) + "\n");
      enforceCheckMode(flags, result);
      return;
    }

    const output = formatApplyOutput(result, {
      color: Boolean(this.process.stdout.isTTY) && !(flags["no-color"] ?? false),
    });
    this.process.stdout.write(`${output}\n`);

    enforceCheckMode(flags, result);
  },
  parameters: {
    flags: applyCommandFlagParameters,
    positional: positionalParameters,
  },
  docs: {
    brief: "Apply hint file rules to a project",
  },
});

export const reportCommand = buildCommand({
  async func(this: CommandProcess, flags: ReportCommandFlags, hintInput: string, scope?: string) {
    const entries = await runReportCommand(hintInput, scope, flags);
    switch (flags.format ?? "text") {
      case "json":
        this.process.stdout.write(`${formatReportJson(entries)}\n`);
        return;
      case "csv":
        this.process.stdout.write(`${formatReportCsv(entries)}\n`);
        return;
      case "text":
        this.process.stdout.write(
          `${formatReportText(entries, {
            color: Boolean(this.process.stdout.isTTY) && !(flags["no-color"] ?? false),
          })}\n`,
        );
    }
  },
  parameters: {
    flags: reportCommandFlagParameters,
    positional: positionalParameters,
  },
  docs: {
    brief: "List hint matches without changing files",
  },
});

// Import directives hold a Map, which JSON.stringify would print as {}.
export function jsonReplacer(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

function enforceCheckMode(flags: ApplyCommandFlags, result: ApplyResult): void {
  if (!(flags.check ?? false)) {
    return;
  }

  if (result.totalReplacements > 0) {
    throw new Error(
      `Check failed: ${result.totalReplacements} replacements would be applied in ${result.filesChanged} files.`,
    );
  }
}

async function resolveHintInput(
  hintInput: string,
  options: {
    encoding: BufferEncoding;
    readStdin?: () => Promise<string>;
    stdinStream?: ReadableTextStream;
  },
): Promise<string> {
  if (hintInput !== "-") {
    return hintInput;
  }

  const reader =
    options.readStdin ??
    (() => readAllFromStream(options.stdinStream ?? processStdin, options.encoding));
  const text = await reader();
  if (text.trim().length === 0) {
    throw new Error("Hint file read from stdin was empty.");
  }
  return text;
}

async function readAllFromStream(
  stream: ReadableTextStream,
  encoding: BufferEncoding,
): Promise<string> {
  stream.setEncoding?.(encoding);

  let text = "";
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}
