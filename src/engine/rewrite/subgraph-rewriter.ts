import { debugLog } from "../debug-config";
import { GraphInvariantError } from "../engine-errors";
import type { Graph } from "../ir";
import { ivalueType } from "../ir-types";
import type { PassOptions } from "../trace";
import { findMatches, type Match, type MatchFilter } from "./matcher";
import { type Pattern, validatePatternPair } from "./pattern";

type RewritePattern = {
  name: string;
  match: Pattern;
  replacement: Pattern;
};

/**
 * Find-and-replace over structural patterns.
 *
 * Each registered pattern is applied in registration order: all of its
 * non-overlapping matches are collected first, then each is replaced by
 * the replacement pattern instantiated in front of the matched output
 * node. Matched nodes are unlinked and destroyed afterwards.
 */
export class SubgraphRewriter {
  private readonly patterns: RewritePattern[] = [];

  registerRewritePattern(match: Pattern, replacement: Pattern, name = "pattern"): void {
    validatePatternPair(match, replacement);
    this.patterns.push({ name, match, replacement });
  }

  get patternCount(): number {
    return this.patterns.length;
  }

  /**
   * Apply every registered pattern. Returns the number of rewrites.
   */
  runOnGraph(graph: Graph, filter?: MatchFilter, options: PassOptions = {}): number {
    let rewrites = 0;
    for (const pattern of this.patterns) {
      const matches = findMatches(graph, pattern.match, filter);
      // Values replaced by an earlier rewrite in this sweep
      const replaced = new Map<number, number>();
      for (const match of matches) {
        applyReplacement(graph, pattern, match, replaced);
        options.trace?.record({
          type: "pattern_rewritten",
          pattern: pattern.name,
          anchorNodeId: match.anchor,
        });
        rewrites += 1;
      }
      if (matches.length > 0) {
        debugLog(`${pattern.name}: ${matches.length} rewrite(s)`, options);
      }
    }
    return rewrites;
  }
}

function resolve(replaced: Map<number, number>, valueId: number): number {
  let current = valueId;
  let next = replaced.get(current);
  while (next !== undefined) {
    current = next;
    next = replaced.get(current);
  }
  return current;
}

function applyReplacement(
  graph: Graph,
  pattern: RewritePattern,
  match: Match,
  replaced: Map<number, number>,
): void {
  const { replacement } = pattern;
  const matchedOutput = graph.getNode(match.anchor).outputs[0];
  const env = new Map<string, number>();
  for (const param of replacement.params) {
    const bound = match.values.get(param);
    if (bound === undefined) {
      throw new GraphInvariantError(`${pattern.name}: parameter "${param}" is unbound`);
    }
    env.set(param, resolve(replaced, bound));
  }

  for (const node of replacement.nodes) {
    const inputs = node.inputs.map((name) => {
      const valueId = env.get(name);
      if (valueId === undefined) {
        throw new GraphInvariantError(`${pattern.name}: "${name}" is undefined`);
      }
      return valueId;
    });
    const type =
      node.type ??
      (node.value !== undefined ? ivalueType(node.value) : undefined) ??
      (node.output === replacement.output ? graph.typeOf(matchedOutput) : undefined);
    if (type === undefined) {
      throw new GraphInvariantError(`${pattern.name}: replacement node "${node.output}" has no type`);
    }
    const created = graph.insertNode({ before: match.anchor }, node.op, inputs, [type], node.value);
    env.set(node.output, created.outputs[0]);
  }

  const newOutput = env.get(replacement.output);
  if (newOutput === undefined) {
    throw new GraphInvariantError(`${pattern.name}: replacement output is undefined`);
  }
  graph.replaceAllUsesWith(matchedOutput, newOutput);
  replaced.set(matchedOutput, newOutput);

  const matchedNodes = [...match.nodes.values()];
  for (const nodeId of matchedNodes) graph.removeAllInputs(nodeId);
  for (const nodeId of matchedNodes) graph.destroyNode(nodeId);
}
