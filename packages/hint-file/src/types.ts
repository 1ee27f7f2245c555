import type { TransformationRule } from "@hintsmith/core";

export type HintFileMetadata = {
  readonly description?: string;
  /** Defaults to `"info"`. */
  readonly severity: string;
  /** Lowest source version the rules apply to; compared as a dotted number. */
  readonly minSourceVersion?: string;
  readonly tags: readonly string[];
  /** Directives with keys the parser does not know, kept verbatim. */
  readonly properties: Readonly<Record<string, string>>;
};

export type HintFile = {
  /** From `<!id: ...>`, or assigned by the store that loaded it. */
  readonly id?: string;
  readonly metadata: HintFileMetadata;
  readonly rules: readonly TransformationRule[];
  /** Ids named by `include` lines, in order. */
  readonly includes: readonly string[];
};

/** Returns the text of the hint file with the given id. */
export type IncludeLoader = (id: string) => string;

export const DEFAULT_SEVERITY = "info";
