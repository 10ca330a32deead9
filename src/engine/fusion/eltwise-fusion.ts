import type { Graph } from "../ir";
import { SubgraphRewriter } from "../rewrite/subgraph-rewriter";
import type { PassOptions } from "../trace";
import {
  buildEltwiseMatchPattern,
  buildEltwiseReplacementPattern,
} from "./pattern-templates";
import { NO_FUSION } from "./packed-ops";
import { createFusionRuleTable, type FusionRuleTable } from "./rule-table";

/**
 * Fold each elementwise op that directly follows an unfused conv2d_run
 * into its prepack, one rewriter per rule table entry. Returns the number
 * of rewrites.
 */
export function fuseEltwiseWithPackedOps(
  graph: Graph,
  rules: FusionRuleTable = createFusionRuleTable(),
  options: PassOptions = {},
): number {
  let rewrites = 0;
  for (const rule of rules.values()) {
    if (rule.op === NO_FUSION) continue;
    const rewriter = new SubgraphRewriter();
    rewriter.registerRewritePattern(
      buildEltwiseMatchPattern(rule),
      buildEltwiseReplacementPattern(rule),
      `conv2d_${rule.op}`,
    );
    rewrites += rewriter.runOnGraph(graph, rule.filter, options);
  }
  return rewrites;
}
