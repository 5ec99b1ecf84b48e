/**
 * Control-flow queries over a function's statement graph.
 *
 * Successors come from each node's continuation edges; `return` nodes have
 * none. Traversal is depth-first from the entry, `then` edge before `else`.
 */

import type { IrStmt, NodeId } from "./ir-types.ts";

// ─── CFG helpers ────────────────────────────────────────────────────────────

export function successors(node: IrStmt): NodeId[] {
  switch (node.kind) {
    case "nop":
    case "eval":
    case "assign":
      return [node.next];
    case "branch":
      return node.thenNode === node.elseNode ? [node.thenNode] : [node.thenNode, node.elseNode];
    case "return":
      return [];
  }
}

/**
 * Ids reachable from `entry`, in depth-first pre-order. Ids without a node
 * are skipped.
 */
export function reachableNodes(nodes: ReadonlyMap<NodeId, IrStmt>, entry: NodeId): NodeId[] {
  const visited = new Set<NodeId>();
  const order: NodeId[] = [];
  const stack: NodeId[] = [entry];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    const node = nodes.get(id);
    if (!node) continue;
    visited.add(id);
    order.push(id);
    // Push in reverse so the first successor is visited first
    const succs = successors(node);
    for (let i = succs.length - 1; i >= 0; i--) {
      const succ = succs[i];
      if (succ !== undefined && !visited.has(succ)) stack.push(succ);
    }
  }
  return order;
}

export function canReach(
  nodes: ReadonlyMap<NodeId, IrStmt>,
  from: NodeId,
  target: NodeId
): boolean {
  return reachableNodes(nodes, from).includes(target);
}
