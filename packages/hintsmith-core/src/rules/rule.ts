import { evaluateGuard } from "../guard/evaluate.ts";
import type { GuardContext, GuardExpression, GuardFunctionResolver } from "../guard/types.ts";
import type { Pattern } from "../pattern/types.ts";
import type { ImportDirective } from "./imports.ts";

export type RewriteAlternative = {
  readonly replacementPattern: Pattern;
  readonly condition?: GuardExpression;
  readonly isOtherwise: boolean;
  readonly imports?: ImportDirective;
};

export type TransformationRule = {
  readonly description?: string;
  readonly sourcePattern: Pattern;
  readonly sourceGuard?: GuardExpression;
  /** Empty for hint-only rules, which report matches without rewriting them. */
  readonly alternatives: readonly RewriteAlternative[];
  readonly imports?: ImportDirective;
};

export type RewriteAlternativeInput = {
  replacementPattern: Pattern;
  condition?: GuardExpression;
  isOtherwise?: boolean;
  imports?: ImportDirective;
};

export function createRewriteAlternative(input: RewriteAlternativeInput): RewriteAlternative {
  return Object.freeze({
    replacementPattern: input.replacementPattern,
    isOtherwise: input.isOtherwise ?? false,
    ...(input.condition ? { condition: input.condition } : {}),
    ...(input.imports ? { imports: input.imports } : {}),
  });
}

export type TransformationRuleInput = {
  description?: string;
  sourcePattern: Pattern;
  sourceGuard?: GuardExpression;
  alternatives?: readonly RewriteAlternativeInput[];
  imports?: ImportDirective;
};

export function createTransformationRule(input: TransformationRuleInput): TransformationRule {
  return Object.freeze({
    sourcePattern: input.sourcePattern,
    alternatives: Object.freeze((input.alternatives ?? []).map(createRewriteAlternative)),
    ...(input.description !== undefined ? { description: input.description } : {}),
    ...(input.sourceGuard ? { sourceGuard: input.sourceGuard } : {}),
    ...(input.imports ? { imports: input.imports } : {}),
  });
}

export function isHintOnly(rule: TransformationRule): boolean {
  return rule.alternatives.length === 0;
}

/**
 * First alternative, in declaration order, that is `otherwise` or whose
 * condition holds. An alternative without a condition always applies.
 */
export function findMatchingAlternative(
  rule: TransformationRule,
  context: GuardContext,
  resolver: GuardFunctionResolver,
): RewriteAlternative | null {
  for (const alternative of rule.alternatives) {
    if (alternative.isOtherwise || !alternative.condition) {
      return alternative;
    }
    if (evaluateGuard(alternative.condition, context, resolver)) {
      return alternative;
    }
  }
  return null;
}
