import { shapesEqual, concreteSizes } from "../../core/shape";
import type { Graph } from "../ir";
import { isTensorType, PACKED_CONV_TYPE, SCALAR_LIST_TYPE } from "../ir-types";
import { type MatchFilter, matchValue } from "../rewrite/matcher";
import { constantNode, opNode, type Pattern } from "../rewrite/pattern";
import { SubgraphRewriter } from "../rewrite/subgraph-rewriter";
import type { PassOptions } from "../trace";
import {
  LIST_CONSTRUCT_OP,
  NO_FUSION,
  PREPACK_CONV_PARAMS,
  PREPACK_OP,
  RUN_OP,
  SUM_FUSION,
  SUM_RELU_FUSION,
  SUM_RUN_OP,
} from "./packed-ops";

// ============================================================================
// Residual add fusion
//
//   add(conv2d_run(x, packed), accumu, alpha)   -> conv2d_sum_run(x, accumu, packed')
//   add(accumu, conv2d_run(x, packed), 1)       -> conv2d_sum_run(x, accumu, packed')
//   relu(conv2d_sum_run(x, accumu, packed))     -> conv2d_sum_run(x, accumu, packed'')
//
// packed' carries attr "sum" with scalars [alpha]; packed'' carries
// "sum_relu" and keeps the scalars it had.
// ============================================================================

const ADD_PARAMS = [
  "input",
  ...PREPACK_CONV_PARAMS,
  "accumu",
  "alpha",
  "input_size",
  "scalars_placeholder",
  "algorithm_placeholder",
];

const SUM_RELU_PARAMS = [
  "input",
  ...PREPACK_CONV_PARAMS,
  "accumu",
  "input_size",
  "scalars",
  "algorithm",
];

function unfusedRunNodes(): Pattern["nodes"] {
  return [
    constantNode("attr_placeholder", { kind: "str", value: NO_FUSION }),
    opNode(
      PREPACK_OP,
      [
        ...PREPACK_CONV_PARAMS,
        "input_size",
        "attr_placeholder",
        "scalars_placeholder",
        "algorithm_placeholder",
      ],
      "packed",
    ),
    opNode(RUN_OP, ["input", "packed"], "conv_out"),
  ];
}

function addMatchPattern(runOnLeft: boolean): Pattern {
  const operands = runOnLeft ? ["conv_out", "accumu"] : ["accumu", "conv_out"];
  return {
    params: ADD_PARAMS,
    nodes: [...unfusedRunNodes(), opNode("add", [...operands, "alpha"], "res")],
    output: "res",
  };
}

const addReplacementPattern: Pattern = {
  params: ADD_PARAMS,
  nodes: [
    constantNode("attr", { kind: "str", value: SUM_FUSION }),
    opNode(LIST_CONSTRUCT_OP, ["alpha"], "scalars", SCALAR_LIST_TYPE),
    opNode(
      PREPACK_OP,
      [...PREPACK_CONV_PARAMS, "input_size", "attr", "scalars", "algorithm_placeholder"],
      "packed",
      PACKED_CONV_TYPE,
    ),
    opNode(SUM_RUN_OP, ["input", "accumu", "packed"], "res"),
  ],
  output: "res",
};

function sumReluPattern(attr: string, withRelu: boolean): Pattern {
  const prepack = opNode(
    PREPACK_OP,
    [...PREPACK_CONV_PARAMS, "input_size", "attr", "scalars", "algorithm"],
    "packed",
    withRelu ? undefined : PACKED_CONV_TYPE,
  );
  const nodes = [constantNode("attr", { kind: "str", value: attr }), prepack];
  if (withRelu) {
    nodes.push(opNode(SUM_RUN_OP, ["input", "accumu", "packed"], "sum_out"));
    nodes.push(opNode("relu", ["sum_out"], "res"));
  } else {
    nodes.push(opNode(SUM_RUN_OP, ["input", "accumu", "packed"], "res"));
  }
  return { params: SUM_RELU_PARAMS, nodes, output: "res" };
}

/**
 * The accumulator is a distinct tensor whose sizes are known and equal to
 * the convolution output's, so it can be summed into that buffer.
 */
function accumulatorFitsOutput(graph: Graph, convOut: number, accumu: number): boolean {
  if (convOut === accumu) return false;
  const producer = graph.producerOf(convOut);
  if (producer?.op !== RUN_OP) return false;
  const outType = graph.typeOf(convOut);
  const accType = graph.typeOf(accumu);
  if (!isTensorType(outType) || !isTensorType(accType)) return false;
  const outSizes = concreteSizes(outType.sizes);
  const accSizes = concreteSizes(accType.sizes);
  return outSizes !== null && accSizes !== null && shapesEqual(outSizes, accSizes);
}

export const addAccumulatorOnRight: MatchFilter = (match, graph) =>
  accumulatorFitsOutput(graph, matchValue(match, "conv_out"), matchValue(match, "accumu"));

/**
 * With the accumulator on the left, `accumu + alpha * conv_out` equals the
 * fused `conv_out + alpha * accumu` only for alpha == 1.
 */
export const addAccumulatorOnLeft: MatchFilter = (match, graph) => {
  const alpha = graph.constantValue(matchValue(match, "alpha"));
  const isOne =
    (alpha?.kind === "int" || alpha?.kind === "float") && alpha.value === 1;
  return isOne && addAccumulatorOnRight(match, graph);
};

/**
 * Fuse residual adds into the preceding conv2d_run, then fold a relu that
 * follows a summed run. Returns the number of rewrites.
 */
export function fuseAddReluWithPackedOps(graph: Graph, options: PassOptions = {}): number {
  let rewrites = 0;

  const runOnLeft = new SubgraphRewriter();
  runOnLeft.registerRewritePattern(addMatchPattern(true), addReplacementPattern, "conv2d_add");
  rewrites += runOnLeft.runOnGraph(graph, addAccumulatorOnRight, options);

  const runOnRight = new SubgraphRewriter();
  runOnRight.registerRewritePattern(
    addMatchPattern(false),
    addReplacementPattern,
    "conv2d_add_swapped",
  );
  rewrites += runOnRight.runOnGraph(graph, addAccumulatorOnLeft, options);

  const sumRelu = new SubgraphRewriter();
  sumRelu.registerRewritePattern(
    sumReluPattern(SUM_FUSION, true),
    sumReluPattern(SUM_RELU_FUSION, false),
    "conv2d_add_relu",
  );
  rewrites += sumRelu.runOnGraph(graph, undefined, options);

  return rewrites;
}
