export type ApplyCommandFlags = {
  "dry-run"?: boolean;
  check?: boolean;
  json?: boolean;
  "no-color"?: boolean;
  cwd?: string;
  concurrency?: number;
  verbose?: number;
  "source-version"?: string;
  semantic?: boolean;
};

export type ReportFormat = "text" | "json" | "csv";

export type ReportCommandFlags = Omit<ApplyCommandFlags, "dry-run" | "check" | "json"> & {
  format?: ReportFormat;
};

const sharedFlagParameters = {
  concurrency: {
    kind: "parsed" as const,
    optional: true,
    brief: "Max files processed concurrently (default: 8)",
    placeholder: "n",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error("--concurrency must be a positive number");
      }
      return Math.floor(value);
    },
  },
  verbose: {
    kind: "parsed" as const,
    optional: true,
    brief: "Print perf tracing (1=summary, 2=includes per-file timings)",
    placeholder: "level",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value < 0) {
        throw new Error("--verbose must be a non-negative number");
      }
      return Math.floor(value);
    },
  },
  "no-color": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Disable colored output",
  },
  cwd: {
    kind: "parsed" as const,
    optional: true,
    brief: "Working directory for resolving hint file and scope",
    placeholder: "path",
    parse: (input: string) => input,
  },
  "source-version": {
    kind: "parsed" as const,
    optional: true,
    brief: "Language level of the sources, e.g. 2020 (version guards fail when unset)",
    placeholder: "version",
    parse: parseSourceVersion,
  },
  semantic: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Build a TypeScript program so type-aware guards can answer",
  },
} as const;

export const applyCommandFlagParameters = {
  ...sharedFlagParameters,
  json: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Output structured JSON instead of compact diff-style text",
  },
  "dry-run": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Preview changes without writing files",
  },
  check: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Fail when any replacement would be applied (implies --dry-run)",
  },
} as const;

export const reportCommandFlagParameters = {
  ...sharedFlagParameters,
  format: {
    kind: "enum" as const,
    values: ["text", "json", "csv"] as const,
    optional: true,
    brief: "Report format (default: text)",
  },
} as const;

export function parseSourceVersion(input: string): string {
  const value = input.trim();
  if (!/^\d+(?:\.\d+)*$/.test(value)) {
    throw new Error("--source-version must be a dotted number such as 2020 or 1.8");
  }
  return value;
}

export function validateApplyCommandFlags(flags: ApplyCommandFlags): void {
  if ((flags.check ?? false) && (flags["dry-run"] ?? false)) {
    throw new Error("Cannot combine --check with --dry-run.");
  }
}
