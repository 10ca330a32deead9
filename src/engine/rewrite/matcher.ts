import type { Graph, IRNode } from "../ir";
import { ivaluesEqual } from "../ir-types";
import { collectBlocks } from "../ir-traverse";
import { type Pattern, type PatternNode, patternUseCounts } from "./pattern";

/**
 * One occurrence of a pattern in a graph.
 */
export type Match = {
  /** Graph node bound to the pattern's output node */
  anchor: number;
  /** Pattern name (parameter or node output) -> graph value id */
  values: Map<string, number>;
  /** Pattern node output name -> graph node id */
  nodes: Map<string, number>;
};

/**
 * Post-match predicate deciding whether a structurally matched occurrence
 * may be rewritten.
 */
export type MatchFilter = (match: Match, graph: Graph) => boolean;

export function matchValue(match: Match, name: string): number {
  const value = match.values.get(name);
  if (value === undefined) {
    throw new Error(`match has no binding for "${name}"`);
  }
  return value;
}

/**
 * Try to match `pattern` with its output node bound to `anchor`.
 *
 * Rules:
 * 1. Pattern nodes bind one-to-one to graph nodes in the anchor's block
 * 2. Op, input count and single output must agree; constants must be equal
 * 3. Values internal to the pattern have exactly the pattern's uses
 * 4. A parameter binds one graph value, never one the match itself produces
 */
export function matchAt(graph: Graph, pattern: Pattern, anchor: IRNode): Match | null {
  const producers = new Map<string, PatternNode>();
  for (const node of pattern.nodes) producers.set(node.output, node);
  const useCounts = patternUseCounts(pattern);
  const values = new Map<string, number>();
  const nodes = new Map<string, number>();
  const boundNodes = new Set<number>();

  const bind = (name: string, valueId: number): boolean => {
    const bound = values.get(name);
    if (bound !== undefined) return bound === valueId;

    const patternNode = producers.get(name);
    if (!patternNode) {
      values.set(name, valueId);
      return true;
    }

    const graphNode = graph.producerOf(valueId);
    if (!graphNode || graphNode.owningBlock !== anchor.owningBlock) return false;
    if (boundNodes.has(graphNode.id)) return false;
    if (
      graphNode.op !== patternNode.op ||
      graphNode.inputs.length !== patternNode.inputs.length ||
      graphNode.outputs.length !== 1 ||
      graphNode.blocks.length > 0
    ) {
      return false;
    }
    if (patternNode.value !== undefined) {
      if (graphNode.value === undefined || !ivaluesEqual(graphNode.value, patternNode.value)) {
        return false;
      }
    }
    if (
      name !== pattern.output &&
      graph.getValue(valueId).uses.length !== (useCounts.get(name) ?? 0)
    ) {
      return false;
    }

    values.set(name, valueId);
    nodes.set(name, graphNode.id);
    boundNodes.add(graphNode.id);
    return patternNode.inputs.every((input, i) => bind(input, graphNode.inputs[i]));
  };

  if (anchor.outputs.length !== 1 || !bind(pattern.output, anchor.outputs[0])) {
    return null;
  }
  for (const param of pattern.params) {
    const valueId = values.get(param);
    if (valueId === undefined) return null;
    const producer = graph.producerOf(valueId);
    if (producer && boundNodes.has(producer.id)) return null;
  }
  return { anchor: anchor.id, values, nodes };
}

/**
 * Find non-overlapping occurrences of `pattern`, scanning blocks
 * innermost first and nodes in program order.
 */
export function findMatches(
  graph: Graph,
  pattern: Pattern,
  filter?: MatchFilter,
): Match[] {
  const anchorOp = producerOp(pattern);
  const claimed = new Set<number>();
  const matches: Match[] = [];
  for (const blockId of collectBlocks(graph)) {
    for (const node of graph.nodesOf(blockId)) {
      if (node.op !== anchorOp || claimed.has(node.id)) continue;
      const match = matchAt(graph, pattern, node);
      if (!match) continue;
      if ([...match.nodes.values()].some((id) => claimed.has(id))) continue;
      if (filter && !filter(match, graph)) continue;
      for (const id of match.nodes.values()) claimed.add(id);
      matches.push(match);
    }
  }
  return matches;
}

function producerOp(pattern: Pattern): string {
  const node = pattern.nodes.find((candidate) => candidate.output === pattern.output);
  if (!node) {
    throw new Error(`pattern output "${pattern.output}" is not produced by a node`);
  }
  return node.op;
}
