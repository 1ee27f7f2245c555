import { GuardRegistrationError } from "../errors.ts";
import { BUILTIN_GUARDS } from "./builtins.ts";
import type { GuardFunction, GuardFunctionResolver } from "./types.ts";

export type GuardConflictPolicy = "reject" | "override";

export type GuardRegistryOptions = {
  /** What `register` does with a name that is already taken. Defaults to `"reject"`. */
  onConflict?: GuardConflictPolicy;
  /** Pre-register the built-in guard functions. Defaults to `true`. */
  builtins?: boolean;
};

/**
 * Name → guard function table. Instances are independent; nothing is shared
 * between registries, so callers pass `registry.resolver` where it is needed.
 */
export class GuardRegistry {
  readonly onConflict: GuardConflictPolicy;
  private readonly functions = new Map<string, GuardFunction>();

  constructor(options: GuardRegistryOptions = {}) {
    this.onConflict = options.onConflict ?? "reject";
    if (options.builtins ?? true) {
      for (const [name, fn] of BUILTIN_GUARDS) {
        this.functions.set(name, fn);
      }
    }
  }

  register(name: string, fn: GuardFunction): this {
    if (this.functions.has(name) && this.onConflict === "reject") {
      throw new GuardRegistrationError(name);
    }
    this.functions.set(name, fn);
    return this;
  }

  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  get(name: string): GuardFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return [...this.functions.keys()].sort();
  }

  readonly resolver: GuardFunctionResolver = (name) => this.functions.get(name);
}

export function createGuardRegistry(options: GuardRegistryOptions = {}): GuardRegistry {
  return new GuardRegistry(options);
}
