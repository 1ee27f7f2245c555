import type { NodeRole, SyntaxNode, SyntaxSlot } from "./types.ts";

/** Same kind, same token, and pairwise equal children. Positions and trivia are ignored. */
export function structurallyEqual(left: SyntaxNode, right: SyntaxNode): boolean {
  if (left === right) {
    return true;
  }
  if (left.kind !== right.kind || left.token !== right.token) {
    return false;
  }

  const leftSlots = left.slots();
  const rightSlots = right.slots();
  if (leftSlots.length !== rightSlots.length) {
    return false;
  }
  return leftSlots.every((slot, index) => {
    const other = rightSlots[index];
    return other !== undefined && slotsEqual(slot, other);
  });
}

function slotsEqual(left: SyntaxSlot, right: SyntaxSlot): boolean {
  if (left.kind === "node" && right.kind === "node") {
    if (!left.node || !right.node) {
      return left.node === right.node;
    }
    return structurallyEqual(left.node, right.node);
  }
  if (left.kind === "list" && right.kind === "list") {
    return nodeListsEqual(left.nodes, right.nodes);
  }
  return false;
}

export function nodeListsEqual(
  left: readonly SyntaxNode[],
  right: readonly SyntaxNode[],
): boolean {
  return (
    left.length === right.length &&
    left.every((node, index) => {
      const other = right[index];
      return other !== undefined && structurallyEqual(node, other);
    })
  );
}

export function childNodes(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (const slot of node.slots()) {
    if (slot.kind === "list") {
      children.push(...slot.nodes);
    } else if (slot.node) {
      children.push(slot.node);
    }
  }
  return children;
}

/** Pre-order walk. Returning `false` from `visit` skips the node's children. */
export function walkTree(root: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || visit(node) === false) {
      continue;
    }
    const children = childNodes(node);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) {
        stack.push(child);
      }
    }
  }
}

export function someNode(root: SyntaxNode, predicate: (node: SyntaxNode) => boolean): boolean {
  let found = false;
  walkTree(root, (node) => {
    if (found) {
      return false;
    }
    if (predicate(node)) {
      found = true;
      return false;
    }
  });
  return found;
}

/** Closest proper ancestor satisfying `predicate`. */
export function findAncestor(
  node: SyntaxNode,
  predicate: (candidate: SyntaxNode) => boolean,
): SyntaxNode | null {
  let current = node.parent;
  while (current) {
    if (predicate(current)) {
      return current;
    }
    current = current.parent;
  }
  return null;
}

export function hasRole(role: NodeRole): (node: SyntaxNode) => boolean {
  return (node) => node.roles.has(role);
}

export function sliceText(text: string, node: { offset: number; length: number }): string {
  return text.slice(node.offset, node.offset + node.length);
}
