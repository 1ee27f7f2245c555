/** Base class for every error the engine raises on purpose. */
export class HintsmithError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A guard names a function the resolver does not know. Raised at evaluation time. */
export class UnknownGuardFunctionError extends HintsmithError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Unknown guard function "${functionName}".`);
    this.functionName = functionName;
  }
}

export class GuardSyntaxError extends HintsmithError {
  /** One-based column inside the guard text, as printed in the message. */
  readonly column: number;

  constructor(message: string, column: number) {
    super(message);
    this.column = column;
  }
}

export class GuardRegistrationError extends HintsmithError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Guard function "${functionName}" is already registered.`);
    this.functionName = functionName;
  }
}

export class PatternCompileError extends HintsmithError {
  readonly patternText: string;

  constructor(patternText: string, reason: string) {
    super(`Cannot compile pattern "${patternText}": ${reason}`);
    this.patternText = patternText;
  }
}

export class TemplateRenderError extends HintsmithError {}

export class ProcessingCancelledError extends HintsmithError {
  /** Number of rules fully processed before cancellation was observed. */
  readonly completedRules: number;

  constructor(completedRules: number) {
    super(`Processing cancelled after ${completedRules} rules.`);
    this.completedRules = completedRules;
  }
}

/** A guard function was called with arguments it cannot use. */
export class GuardArgumentError extends HintsmithError {
  readonly functionName: string;

  constructor(functionName: string, message: string) {
    super(`${functionName}: ${message}`);
    this.functionName = functionName;
  }
}
