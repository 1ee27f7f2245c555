import { IncludeLoadError } from "./errors.ts";
import { BUNDLED_LIBRARIES, readBundledLibrary } from "./libraries.ts";
import { parseHintFile } from "./parser.ts";
import { resolveWithLookup, type ResolvedHintFile } from "./resolve.ts";
import type { HintFile } from "./types.ts";

const INFERRED_PREFIX = "inferred:";
const MANUAL_PREFIX = "manual:";

/**
 * Parsed hint files by load key, with a second index by declared `<!id: ...>`.
 * Includes resolve against the store itself.
 */
export class HintFileStore {
  private readonly byKey = new Map<string, HintFile>();
  private readonly byDeclaredId = new Map<string, HintFile>();
  private bundledLoaded = false;

  /** Parses and registers `text` under `key`. A parse error leaves the store unchanged. */
  load(key: string, text: string): HintFile {
    const hintFile = parseHintFile(text, { unitId: key });
    this.put(key, hintFile);
    return hintFile;
  }

  /** Looks a unit up by load key, then by declared id. */
  get(id: string): HintFile | undefined {
    return this.byKey.get(id) ?? this.byDeclaredId.get(id);
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  keys(): string[] {
    return [...this.byKey.keys()];
  }

  unregister(key: string): HintFile | undefined {
    const removed = this.byKey.get(key);
    if (!removed) {
      return undefined;
    }
    this.byKey.delete(key);
    if (removed.id !== undefined && this.byDeclaredId.get(removed.id) === removed) {
      this.byDeclaredId.delete(removed.id);
    }
    return removed;
  }

  clear(): void {
    this.byKey.clear();
    this.byDeclaredId.clear();
    this.bundledLoaded = false;
  }

  resolveRules(id: string): ResolvedHintFile {
    return resolveWithLookup(id, (unitId) => {
      const hintFile = this.get(unitId);
      if (!hintFile) {
        throw new IncludeLoadError(unitId, "no such hint file is loaded.");
      }
      return hintFile;
    });
  }

  /** Registers mined rules as `inferred:<commit>`, tagged when they carry no tags. */
  registerInferredRules(hintFile: HintFile, sourceCommit: string): HintFile {
    const id = `${INFERRED_PREFIX}${sourceCommit}`;
    const tags =
      hintFile.metadata.tags.length > 0
        ? hintFile.metadata.tags
        : Object.freeze(["inferred", "mining", sourceCommit]);
    const registered = Object.freeze({
      ...hintFile,
      id,
      metadata: Object.freeze({ ...hintFile.metadata, tags }),
    });
    this.put(id, registered);
    return registered;
  }

  inferredHintFiles(): HintFile[] {
    return [...this.byKey.entries()]
      .filter(([key]) => key.startsWith(INFERRED_PREFIX))
      .map(([, hintFile]) => hintFile);
  }

  /** Re-registers `inferred:<commit>` as `manual:<commit>`. Returns the new id. */
  promoteToManual(id: string): string | null {
    const hintFile = this.unregister(id);
    if (!hintFile) {
      return null;
    }
    const promotedId = id.replace(INFERRED_PREFIX, MANUAL_PREFIX);
    this.put(promotedId, Object.freeze({ ...hintFile, id: promotedId }));
    return promotedId;
  }

  /** Loads the libraries shipped with this package once; later calls are no-ops. */
  async loadBundledLibraries(): Promise<string[]> {
    if (this.bundledLoaded) {
      return [];
    }
    const texts = await Promise.all(BUNDLED_LIBRARIES.map((id) => readBundledLibrary(id)));
    BUNDLED_LIBRARIES.forEach((id, index) => {
      this.load(id, texts[index] ?? "");
    });
    this.bundledLoaded = true;
    return [...BUNDLED_LIBRARIES];
  }

  private put(key: string, hintFile: HintFile): void {
    const previous = this.byKey.get(key);
    if (previous?.id !== undefined && this.byDeclaredId.get(previous.id) === previous) {
      this.byDeclaredId.delete(previous.id);
    }
    this.byKey.set(key, hintFile);
    if (hintFile.id !== undefined) {
      this.byDeclaredId.set(hintFile.id, hintFile);
    }
  }
}
