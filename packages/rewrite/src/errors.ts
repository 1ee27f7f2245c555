import { HintsmithError } from "@hintsmith/core";

export type StaleFileReason = "unreadable" | "changed";

/** A file no longer holds the text the replacements were computed from. */
export class StaleFileError extends HintsmithError {
  readonly filePath: string;
  readonly reason: StaleFileReason;

  constructor(filePath: string, reason: StaleFileReason, options?: ErrorOptions) {
    super(
      reason === "changed"
        ? `${filePath} changed on disk after it was read; run apply again.`
        : `${filePath} could not be read back before writing; run apply again.`,
      options,
    );
    this.filePath = filePath;
    this.reason = reason;
  }
}
