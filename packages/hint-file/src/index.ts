export { CircularIncludeError, HintParseError, IncludeLoadError } from "./errors.ts";
export { parseHintFile } from "./parser.ts";
export type { ParseHintFileOptions } from "./parser.ts";
export { resolveHintFile, resolveWithLookup } from "./resolve.ts";
export type { HintFileLookup, ResolvedHintFile } from "./resolve.ts";
export { HintFileStore } from "./store.ts";
export {
  BUNDLED_LIBRARIES,
  bundledLibraryPath,
  isBundledLibrary,
  readBundledLibrary,
} from "./libraries.ts";
export { DEFAULT_SEVERITY } from "./types.ts";
export type { HintFile, HintFileMetadata, IncludeLoader } from "./types.ts";
