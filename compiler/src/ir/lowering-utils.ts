/**
 * Node arena and slot helpers for FunctionLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type { IrStmt, NodeId, SlotId } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

const LINK_PREFIX = "link";

export function freshNodeId(this: FunctionLowerer, prefix: string): NodeId {
  return `${prefix}.${this.nodeCounter++}`;
}

/** Add a node under a fresh id and return that id. */
export function addNode(this: FunctionLowerer, prefix: string, node: IrStmt): NodeId {
  const id = this.freshNodeId(prefix);
  this.nodes.set(id, node);
  return id;
}

/**
 * Allocate an id before its node can be built (loop heads: the body needs
 * the head's id as its continuation before the head's edges are known).
 */
export function reserveNode(this: FunctionLowerer, prefix: string): NodeId {
  return this.freshNodeId(prefix);
}

export function fillNode(this: FunctionLowerer, id: NodeId, node: IrStmt): void {
  if (this.nodes.has(id)) {
    throw new Error(`node '${id}' is already filled`);
  }
  this.nodes.set(id, node);
}

/** Placeholder continuation, bound later with `bindLink`. */
export function reserveLink(this: FunctionLowerer): NodeId {
  const id = this.freshNodeId(LINK_PREFIX);
  this.links.set(id, null);
  return id;
}

export function bindLink(this: FunctionLowerer, link: NodeId, target: NodeId): void {
  if (this.links.get(link) !== null) {
    throw new Error(`link '${link}' is unknown or already bound`);
  }
  this.links.set(link, target);
}

/** Follow link placeholders until a real node id is reached. */
export function resolveLink(this: FunctionLowerer, id: NodeId): NodeId {
  let current = id;
  for (let hops = 0; this.links.has(current); hops++) {
    const target = this.links.get(current);
    if (target === undefined || target === null || hops > this.links.size) {
      throw new Error(`link '${current}' was never bound`);
    }
    current = target;
  }
  return current;
}

/**
 * Rewrite every edge through `resolveLink` so only real node ids remain,
 * and return the resolved entry id. Called once, when the body is lowered.
 */
export function resolveLinks(this: FunctionLowerer, entry: NodeId): NodeId {
  for (const [id, node] of this.nodes) {
    switch (node.kind) {
      case "nop":
      case "eval":
      case "assign":
        this.nodes.set(id, { ...node, next: this.resolveLink(node.next) });
        break;
      case "branch":
        this.nodes.set(id, {
          ...node,
          thenNode: this.resolveLink(node.thenNode),
          elseNode: this.resolveLink(node.elseNode),
        });
        break;
      case "return":
        break;
    }
  }
  const resolved = this.resolveLink(entry);
  this.links.clear();
  return resolved;
}

export function allocSlot(this: FunctionLowerer): SlotId {
  return this.numLocals++;
}
