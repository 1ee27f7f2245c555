import { UnknownGuardFunctionError } from "../errors.ts";
import type { GuardContext, GuardExpression, GuardFunctionResolver } from "./types.ts";

/**
 * Evaluates `expression` left to right with short-circuiting `&&` and `||`.
 * Throws `UnknownGuardFunctionError` for a call the resolver cannot answer.
 */
export function evaluateGuard(
  expression: GuardExpression,
  context: GuardContext,
  resolver: GuardFunctionResolver,
): boolean {
  switch (expression.kind) {
    case "call": {
      const fn = resolver(expression.name);
      if (!fn) {
        throw new UnknownGuardFunctionError(expression.name);
      }
      return fn(context, expression.args);
    }
    case "and":
      return (
        evaluateGuard(expression.left, context, resolver) &&
        evaluateGuard(expression.right, context, resolver)
      );
    case "or":
      return (
        evaluateGuard(expression.left, context, resolver) ||
        evaluateGuard(expression.right, context, resolver)
      );
    case "not":
      return !evaluateGuard(expression.operand, context, resolver);
    default:
      return assertNever(expression);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled guard expression: ${JSON.stringify(value)}`);
}
