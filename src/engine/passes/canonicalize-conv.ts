import type { Graph } from "../ir";
import { isTensorType } from "../ir-types";
import { type MatchFilter, matchValue } from "../rewrite/matcher";
import { opNode, type Pattern } from "../rewrite/pattern";
import { SubgraphRewriter } from "../rewrite/subgraph-rewriter";
import type { PassOptions } from "../trace";

const CONVOLUTION_PARAMS = [
  "input",
  "weight",
  "bias",
  "stride",
  "padding",
  "dilation",
  "transposed",
  "output_padding",
  "groups",
  "benchmark",
  "deterministic",
  "cudnn_enabled",
  "allow_tf32",
];

const convolutionPattern: Pattern = {
  params: CONVOLUTION_PARAMS,
  nodes: [opNode("_convolution", CONVOLUTION_PARAMS, "res")],
  output: "res",
};

const conv2dPattern: Pattern = {
  params: CONVOLUTION_PARAMS,
  nodes: [
    opNode(
      "conv2d",
      ["input", "weight", "bias", "stride", "padding", "dilation", "groups"],
      "res",
    ),
  ],
  output: "res",
};

function hasRank(graph: Graph, valueId: number, rank: number): boolean {
  const type = graph.typeOf(valueId);
  return isTensorType(type) && type.sizes?.length === rank;
}

/**
 * Only plain (non-transposed) 2-D convolutions with all-zero output padding
 * become conv2d.
 */
const isPlainConv2d: MatchFilter = (match, graph) => {
  const transposed = graph.constantValue(matchValue(match, "transposed"));
  if (transposed?.kind !== "bool" || transposed.value) return false;
  const outputPadding = graph.constantValue(matchValue(match, "output_padding"));
  if (outputPadding?.kind !== "int_list" || outputPadding.value.some((v) => v !== 0)) {
    return false;
  }
  return (
    hasRank(graph, matchValue(match, "input"), 4) &&
    hasRank(graph, matchValue(match, "weight"), 4)
  );
};

/**
 * Rewrite generic `_convolution` calls into the canonical `conv2d` form.
 */
export function replaceConvolutionWithConv2d(graph: Graph, options: PassOptions = {}): number {
  const rewriter = new SubgraphRewriter();
  rewriter.registerRewritePattern(convolutionPattern, conv2dPattern, "convolution_to_conv2d");
  return rewriter.runOnGraph(graph, isPlainConv2d, options);
}
