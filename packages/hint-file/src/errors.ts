import { HintsmithError } from "@hintsmith/core";

export class HintParseError extends HintsmithError {
  /** One-based line in the hint file text. */
  readonly line: number;
  readonly unitId: string | undefined;

  constructor(line: number, message: string, unitId?: string) {
    super(`Line ${line}: ${message}`);
    this.line = line;
    this.unitId = unitId;
  }
}

export class CircularIncludeError extends HintsmithError {
  /** Include path that closed the cycle, e.g. `["a", "b", "a"]`. */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Circular include: ${cycle.join(" -> ")}`);
    this.cycle = Object.freeze([...cycle]);
  }
}

export class IncludeLoadError extends HintsmithError {
  readonly id: string;

  constructor(id: string, reason: string, options?: ErrorOptions) {
    super(`Cannot load hint file "${id}": ${reason}`, options);
    this.id = id;
  }
}
