import type { Graph, IRNode } from "../ir";

/**
 * Ops kept even when nothing reads their outputs.
 */
const EFFECTFUL_OPS = new Set(["print", "raise", "store"]);

export function isEffectful(op: string): boolean {
  return EFFECTFUL_OPS.has(op);
}

function hasEffects(graph: Graph, node: IRNode): boolean {
  if (isEffectful(node.op)) return true;
  return node.blocks.some((blockId) =>
    graph.nodesOf(blockId).some((inner) => hasEffects(graph, inner)),
  );
}

export type DCEOptions = {
  /** Also clean nested blocks (default true) */
  recurse?: boolean;
};

/**
 * Remove nodes whose outputs are unused and that have no effects.
 * Walks the block backwards so whole dead chains go in one sweep.
 * Returns the number of nodes removed.
 */
export function eliminateDeadCode(
  graph: Graph,
  blockId: number = graph.topBlock,
  options: DCEOptions = {},
): number {
  const { recurse = true } = options;
  let removed = 0;
  const nodes = graph.nodesOf(blockId);
  for (let i = nodes.length - 1; i >= 0; i--) {
    const node = nodes[i];
    if (recurse) {
      for (const child of node.blocks) {
        removed += eliminateDeadCode(graph, child, options);
      }
    }
    const used = node.outputs.some((output) => graph.getValue(output).uses.length > 0);
    if (used || hasEffects(graph, node)) continue;
    graph.removeAllInputs(node.id);
    graph.destroyNode(node.id);
    removed += 1;
  }
  return removed;
}
