import { debugLog, graphDebug } from "../debug-config";
import type { Graph } from "../ir";
import { constantPropagation } from "../passes/constant-propagation";
import { eliminateDeadCode } from "../passes/dce";
import { replaceConvolutionWithConv2d } from "../passes/canonicalize-conv";
import type { PassOptions } from "../trace";
import { fuseAddReluWithPackedOps } from "./add-relu-fusion";
import type { EligibilityOracles } from "./eligibility";
import { fuseEltwiseWithPackedOps } from "./eltwise-fusion";
import { foldPrePackingOps } from "./prepack-folding";
import { insertPrePackedConvOps } from "./prepack-insertion";
import { createFusionRuleTable, type FusionRuleTable } from "./rule-table";

export type FusionOptions = PassOptions & {
  rules?: FusionRuleTable;
  oracles?: EligibilityOracles;
};

export type FusionStats = {
  canonicalized: number;
  prepacksInserted: number;
  eltwiseFused: number;
  addFused: number;
  constantsPropagated: number;
  prepacksFolded: number;
};

/**
 * Lower eligible CPU convolutions to prepack/run pairs and fold the
 * elementwise and residual-add ops that follow them into the packed
 * context. Mutates `graph` in place.
 *
 * Stages: canonicalize _convolution, insert prepacks, fuse elementwise
 * ops, fuse residual adds, propagate constants, fold prepacks.
 */
export function fuseConvWithEltwise(graph: Graph, options: FusionOptions = {}): FusionStats {
  const rules = options.rules ?? createFusionRuleTable();
  graphDebug(graph, "before conv fusion", options);

  const canonicalized = replaceConvolutionWithConv2d(graph, options);
  const prepacksInserted = insertPrePackedConvOps(graph, options);
  graphDebug(graph, "after inserting prepacked conv ops", options);

  const eltwiseFused = fuseEltwiseWithPackedOps(graph, rules, options);
  graphDebug(graph, "after fusing elementwise ops", options);

  const addFused = fuseAddReluWithPackedOps(graph, options);
  graphDebug(graph, "after fusing add/relu", options);

  const constantsPropagated = constantPropagation(graph, options);
  graphDebug(graph, "after constant propagation", options);

  const prepacksFolded = foldPrePackingOps(graph, options);
  eliminateDeadCode(graph);
  graphDebug(graph, "after folding prepack ops", options);

  const stats: FusionStats = {
    canonicalized,
    prepacksInserted,
    eltwiseFused,
    addFused,
    constantsPropagated,
    prepacksFolded,
  };
  debugLog(
    `conv fusion: ${prepacksInserted} prepacked, ${eltwiseFused} eltwise, ` +
      `${addFused} add, ${prepacksFolded} folded`,
    options,
  );
  return stats;
}
