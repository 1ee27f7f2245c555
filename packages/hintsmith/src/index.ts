export { app } from "./app.ts";
export {
  applyCommand,
  jsonReplacer,
  reportCommand,
  runApplyCommand,
  runReportCommand,
} from "./command.ts";
export {
  applyCommandFlagParameters,
  parseSourceVersion,
  reportCommandFlagParameters,
  validateApplyCommandFlags,
} from "./command/flags.ts";
export type { ApplyCommandFlags, ReportCommandFlags, ReportFormat } from "./command/flags.ts";
export {
  buildChalk,
  countLines,
  formatApplyOutput,
  formatImportDirective,
  formatReportText,
  splitDiffLines,
} from "./command/output.ts";
export type { FormatOutputOptions } from "./command/output.ts";
