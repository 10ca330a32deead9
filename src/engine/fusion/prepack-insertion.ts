import { concreteSizes } from "../../core/shape";
import { debugLog } from "../debug-config";
import type { Graph, IRNode } from "../ir";
import {
  INT_LIST_TYPE,
  isTensorType,
  NONE_VALUE,
  OPTIONAL_STR_TYPE,
  PACKED_CONV_TYPE,
  SCALAR_LIST_TYPE,
  STR_TYPE,
} from "../ir-types";
import { forEachBlockPostOrder } from "../ir-traverse";
import { eliminateDeadCode } from "../passes/dce";
import type { PassOptions } from "../trace";
import {
  DEFAULT_ELIGIBILITY_ORACLES,
  type EligibilityOracles,
  isEligibleConvNode,
} from "./eligibility";
import {
  CONV2D_INPUT,
  CONV2D_OP,
  NO_FUSION,
  PREPACK_OP,
  RUN_OP,
} from "./packed-ops";

export type PrepackInsertionOptions = PassOptions & {
  oracles?: EligibilityOracles;
};

/**
 * Replace one eligible conv2d with a prepack/run pair. The conv2d itself
 * is left in place with no uses; dead-code elimination removes it.
 * Returns false when the activation's sizes are not fully known.
 */
export function insertPrePackedConvOpForNode(
  graph: Graph,
  node: IRNode,
  options: PassOptions = {},
): boolean {
  const activation = node.inputs[CONV2D_INPUT];
  const activationType = graph.typeOf(activation);
  const inputSize = isTensorType(activationType) ? concreteSizes(activationType.sizes) : null;
  if (!inputSize) {
    options.trace?.record({
      type: "conv_skipped",
      nodeId: node.id,
      reason: "input_size_not_concrete",
    });
    return false;
  }

  const at = { before: node.id };
  const inputSizeValue = graph.insertConstant({ kind: "int_list", value: inputSize }, at, INT_LIST_TYPE);
  const attr = graph.insertConstant({ kind: "str", value: NO_FUSION }, at, STR_TYPE);
  const scalars = graph.insertConstant({ kind: "scalar_list", value: [] }, at, SCALAR_LIST_TYPE);
  const algorithm = graph.insertConstant(NONE_VALUE, at, OPTIONAL_STR_TYPE);

  const prepack = graph.insertNode(
    at,
    PREPACK_OP,
    [...node.inputs.slice(CONV2D_INPUT + 1), inputSizeValue, attr, scalars, algorithm],
    [PACKED_CONV_TYPE],
  );
  const run = graph.insertNode(
    at,
    RUN_OP,
    [activation, prepack.outputs[0]],
    [graph.typeOf(node.outputs[0])],
  );
  graph.replaceAllUsesWith(node.outputs[0], run.outputs[0]);

  options.trace?.record({
    type: "prepack_inserted",
    convNodeId: node.id,
    prepackNodeId: prepack.id,
    runNodeId: run.id,
  });
  return true;
}

/**
 * Split every eligible CPU conv2d into conv2d_prepack + conv2d_run,
 * innermost blocks first, cleaning each block once its nested blocks
 * are done. Returns the number of convolutions rewritten.
 */
export function insertPrePackedConvOps(
  graph: Graph,
  options: PrepackInsertionOptions = {},
): number {
  const oracles = options.oracles ?? DEFAULT_ELIGIBILITY_ORACLES;
  let inserted = 0;
  forEachBlockPostOrder(graph, graph.topBlock, (block) => {
    for (const node of graph.nodesOf(block.id)) {
      if (node.op !== CONV2D_OP || node.inputs.length !== 7) continue;
      if (!isEligibleConvNode(graph, node, oracles, options)) continue;
      if (insertPrePackedConvOpForNode(graph, node, options)) inserted += 1;
    }
    eliminateDeadCode(graph, block.id, { recurse: false });
  });
  debugLog(`inserted ${inserted} prepacked conv2d op(s)`, options);
  return inserted;
}
