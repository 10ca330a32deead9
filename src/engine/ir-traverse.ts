import type { Graph, IRBlock } from "./ir";

/**
 * Visit every block reachable from `blockId`, nested blocks before the
 * block that owns them. Node lists are snapshotted, so `visit` may insert
 * or destroy nodes in the block it is given.
 */
export function forEachBlockPostOrder(
  graph: Graph,
  blockId: number,
  visit: (block: IRBlock) => void,
): void {
  for (const nodeId of graph.getBlock(blockId).nodes.slice()) {
    if (!graph.hasNode(nodeId)) continue;
    for (const child of graph.getNode(nodeId).blocks) {
      forEachBlockPostOrder(graph, child, visit);
    }
  }
  visit(graph.getBlock(blockId));
}

/**
 * All block ids under (and including) `blockId`, in post-order.
 */
export function collectBlocks(graph: Graph, blockId: number = graph.topBlock): number[] {
  const out: number[] = [];
  forEachBlockPostOrder(graph, blockId, (block) => out.push(block.id));
  return out;
}
