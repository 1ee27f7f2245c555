import { findAncestor, hasRole, nodeListsEqual, structurallyEqual, walkTree } from "../syntax/tree.ts";
import type { NodeRole, SyntaxNode, SyntaxTree } from "../syntax/types.ts";
import { bindingSatisfiesConstraint, isVariadicPlaceholder } from "./placeholders.ts";
import {
  ENCLOSING_TYPE_BINDING,
  MATCHED_NODE_BINDING,
  type Binding,
  type Bindings,
  type CompiledPattern,
  type Match,
  type PatternKind,
} from "./types.ts";

const REQUIRED_ROLE: Readonly<Record<Exclude<PatternKind, "STATEMENT_SEQUENCE">, NodeRole>> = {
  EXPRESSION: "expression",
  STATEMENT: "statement",
  BLOCK: "block",
  METHOD_CALL: "method-call",
  CONSTRUCTOR: "constructor-call",
  ANNOTATION: "annotation",
  IMPORT: "import",
  FIELD: "field",
  METHOD_DECLARATION: "method-declaration",
};

const EMPTY_BINDINGS: Bindings = new Map();

type ListMatch = {
  bindings: Bindings;
  /** Index one past the last candidate item consumed. */
  end: number;
};

/**
 * Matches a single-node pattern against `candidate`. For statement sequences
 * the first window inside the candidate's own statement lists is returned.
 */
export function matchPattern(compiled: CompiledPattern, candidate: SyntaxNode): Match | null {
  if (compiled.pattern.kind === "STATEMENT_SEQUENCE") {
    return matchSequencesIn(compiled, candidate)[0] ?? null;
  }

  if (!candidate.roles.has(REQUIRED_ROLE[compiled.pattern.kind])) {
    return null;
  }

  const root = compiled.tree.nodes[0];
  if (!root) {
    return null;
  }
  const bindings = matchNode(compiled, root, candidate, EMPTY_BINDINGS);
  if (!bindings) {
    return null;
  }
  return {
    matchedNode: candidate,
    matchedNodes: [candidate],
    bindings: withAutoBindings(bindings, candidate, [candidate]),
    sourceOffset: candidate.offset,
    sourceLength: candidate.length,
  };
}

/** Every match of `compiled` in `tree`, in pre-order. Matches may nest or overlap. */
export function findMatches(tree: SyntaxTree, compiled: CompiledPattern): Match[] {
  const matches: Match[] = [];
  walkTree(tree.root, (node) => {
    if (compiled.pattern.kind === "STATEMENT_SEQUENCE") {
      matches.push(...matchSequencesIn(compiled, node));
      return;
    }
    const match = matchPattern(compiled, node);
    if (match) {
      matches.push(match);
    }
  });
  return matches;
}

function matchSequencesIn(compiled: CompiledPattern, owner: SyntaxNode): Match[] {
  const matches: Match[] = [];
  for (const slot of owner.slots()) {
    if (slot.kind !== "list" || slot.listKind !== "statements") {
      continue;
    }

    const items = slot.nodes;
    for (let start = 0; start < items.length; start += 1) {
      const window = matchList(compiled, compiled.tree.nodes, items, 0, start, EMPTY_BINDINGS, {
        allowTrailing: true,
        fallbackOffset: owner.offset + owner.length,
      });
      const first = items[start];
      const last = window ? items[window.end - 1] : undefined;
      if (!window || !first || !last || window.end <= start) {
        continue;
      }

      const matchedNodes = items.slice(start, window.end);
      matches.push({
        matchedNode: first,
        matchedNodes,
        bindings: withAutoBindings(window.bindings, first, matchedNodes),
        sourceOffset: first.offset,
        sourceLength: last.offset + last.length - first.offset,
      });
    }
  }
  return matches;
}

function matchNode(
  compiled: CompiledPattern,
  pattern: SyntaxNode,
  candidate: SyntaxNode,
  bindings: Bindings,
): Bindings | null {
  const placeholder = compiled.language.placeholderName(pattern);
  if (placeholder !== null) {
    if (isVariadicPlaceholder(placeholder)) {
      return bindList(compiled, placeholder, [candidate], candidate.offset, bindings);
    }
    return bindNode(compiled, placeholder, candidate, bindings);
  }

  if (pattern.kind !== candidate.kind || pattern.token !== candidate.token) {
    return null;
  }

  const patternSlots = pattern.slots();
  const candidateSlots = candidate.slots();
  if (patternSlots.length !== candidateSlots.length) {
    return null;
  }

  let state: Bindings = bindings;
  for (let index = 0; index < patternSlots.length; index += 1) {
    const patternSlot = patternSlots[index];
    const candidateSlot = candidateSlots[index];
    if (!patternSlot || !candidateSlot) {
      return null;
    }

    if (patternSlot.kind === "node") {
      if (candidateSlot.kind !== "node") {
        return null;
      }
      if (!patternSlot.node || !candidateSlot.node) {
        if (patternSlot.node !== candidateSlot.node) {
          return null;
        }
        continue;
      }
      const next = matchNode(compiled, patternSlot.node, candidateSlot.node, state);
      if (!next) {
        return null;
      }
      state = next;
      continue;
    }

    if (candidateSlot.kind !== "list") {
      return null;
    }
    const listMatch = matchList(compiled, patternSlot.nodes, candidateSlot.nodes, 0, 0, state, {
      allowTrailing: false,
      fallbackOffset: candidate.offset + candidate.length,
    });
    if (!listMatch) {
      return null;
    }
    state = listMatch.bindings;
  }

  return state;
}

/**
 * Left-to-right list matching. Variadic placeholders try the shortest run
 * first and grow only when the rest of the list fails to match.
 */
function matchList(
  compiled: CompiledPattern,
  patternItems: readonly SyntaxNode[],
  candidateItems: readonly SyntaxNode[],
  patternIndex: number,
  candidateIndex: number,
  bindings: Bindings,
  options: { allowTrailing: boolean; fallbackOffset: number },
): ListMatch | null {
  if (patternIndex === patternItems.length) {
    return options.allowTrailing || candidateIndex === candidateItems.length
      ? { bindings, end: candidateIndex }
      : null;
  }

  const item = patternItems[patternIndex];
  if (!item) {
    return null;
  }

  const placeholder = compiled.language.placeholderName(item);
  if (placeholder !== null && isVariadicPlaceholder(placeholder)) {
    const anchor = candidateItems[candidateIndex]?.offset ?? options.fallbackOffset;
    for (let length = 0; candidateIndex + length <= candidateItems.length; length += 1) {
      const run = candidateItems.slice(candidateIndex, candidateIndex + length);
      const bound = bindList(compiled, placeholder, run, anchor, bindings);
      if (!bound) {
        continue;
      }
      const rest = matchList(
        compiled,
        patternItems,
        candidateItems,
        patternIndex + 1,
        candidateIndex + length,
        bound,
        options,
      );
      if (rest) {
        return rest;
      }
    }
    return null;
  }

  const candidate = candidateItems[candidateIndex];
  if (!candidate) {
    return null;
  }
  const next = matchNode(compiled, item, candidate, bindings);
  if (!next) {
    return null;
  }
  return matchList(
    compiled,
    patternItems,
    candidateItems,
    patternIndex + 1,
    candidateIndex + 1,
    next,
    options,
  );
}

function bindNode(
  compiled: CompiledPattern,
  name: string,
  node: SyntaxNode,
  bindings: Bindings,
): Bindings | null {
  const binding: Binding = { kind: "node", node, offset: node.offset, length: node.length };
  if (!satisfiesConstraint(compiled, name, binding)) {
    return null;
  }

  const existing = bindings.get(name);
  if (existing) {
    return existing.kind === "node" && structurallyEqual(existing.node, node) ? bindings : null;
  }
  return new Map(bindings).set(name, binding);
}

function bindList(
  compiled: CompiledPattern,
  name: string,
  nodes: readonly SyntaxNode[],
  anchorOffset: number,
  bindings: Bindings,
): Bindings | null {
  const binding = listBinding(nodes, anchorOffset);
  if (!satisfiesConstraint(compiled, name, binding)) {
    return null;
  }

  const existing = bindings.get(name);
  if (existing) {
    return existing.kind === "list" && nodeListsEqual(existing.nodes, nodes) ? bindings : null;
  }
  return new Map(bindings).set(name, binding);
}

function listBinding(nodes: readonly SyntaxNode[], anchorOffset: number): Binding {
  const first = nodes[0];
  const last = nodes[nodes.length - 1];
  if (!first || !last) {
    return { kind: "list", nodes, offset: anchorOffset, length: 0 };
  }
  return {
    kind: "list",
    nodes,
    offset: first.offset,
    length: last.offset + last.length - first.offset,
  };
}

function satisfiesConstraint(compiled: CompiledPattern, name: string, binding: Binding): boolean {
  const constraint = compiled.constraints.get(name);
  return constraint === undefined || bindingSatisfiesConstraint(binding, constraint);
}

function withAutoBindings(
  bindings: Bindings,
  matchedNode: SyntaxNode,
  matchedNodes: readonly SyntaxNode[],
): Bindings {
  const result = new Map(bindings);
  if (!result.has(MATCHED_NODE_BINDING)) {
    result.set(
      MATCHED_NODE_BINDING,
      matchedNodes.length === 1
        ? { kind: "node", node: matchedNode, offset: matchedNode.offset, length: matchedNode.length }
        : listBinding(matchedNodes, matchedNode.offset),
    );
  }

  const enclosingType = findAncestor(matchedNode, hasRole("type-declaration"));
  if (enclosingType && !result.has(ENCLOSING_TYPE_BINDING)) {
    result.set(ENCLOSING_TYPE_BINDING, {
      kind: "node",
      node: enclosingType,
      offset: enclosingType.offset,
      length: enclosingType.length,
    });
  }
  return result;
}
