import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

export const BUNDLED_LIBRARIES: readonly string[] = ["collections", "modernize", "performance"];

const LIBRARY_DIRECTORY = new URL("../libraries/", import.meta.url);

export function isBundledLibrary(id: string): boolean {
  return BUNDLED_LIBRARIES.includes(id);
}

export function bundledLibraryPath(id: string): string {
  return fileURLToPath(new URL(`${id}.hint`, LIBRARY_DIRECTORY));
}

export async function readBundledLibrary(id: string): Promise<string> {
  if (!isBundledLibrary(id)) {
    throw new Error(`Unknown bundled hint library "${id}".`);
  }
  return readFile(bundledLibraryPath(id), "utf8");
}
