import { checkContiguous } from "../../backend/types";
import { concreteSizes } from "../../core/shape";
import type { Graph, IRNode } from "../ir";
import { isTensorType, type IRType } from "../ir-types";
import type { ConvSkipReason, PassOptions } from "../trace";
import { CONV2D_INPUT, CONV2D_WEIGHT } from "./packed-ops";

/**
 * Layout and kernel-selection questions the filter delegates.
 */
export type EligibilityOracles = {
  isChannelsLastContiguous(type: IRType): boolean;
  /** True when another kernel path already handles this convolution better */
  isHandledElsewhere(graph: Graph, node: IRNode): boolean;
};

/**
 * Contiguous in channels-last order with fully known sizes and strides.
 */
export function isChannelsLastContiguous(type: IRType): boolean {
  if (!isTensorType(type)) return false;
  const sizes = concreteSizes(type.sizes);
  const strides = concreteSizes(type.strides);
  if (!sizes || !strides || sizes.length !== 4) return false;
  return checkContiguous(sizes, strides, "channels_last");
}

function constantIntList(graph: Graph, valueId: number): number[] | null {
  const value = graph.constantValue(valueId);
  return value?.kind === "int_list" ? value.value : null;
}

function isPair(values: number[] | null, allowed: number[]): boolean {
  if (!values) return false;
  const [first, second = first] = values;
  return values.length <= 2 && first === second && allowed.includes(first);
}

/**
 * Depthwise 3x3 convolutions (padding 1, stride 1 or 2, no dilation) with
 * constant hyperparameters and known shapes, which the vectorized
 * depthwise kernel covers.
 */
export function isDepthwiseConvHandledElsewhere(graph: Graph, node: IRNode): boolean {
  if (node.inputs.length !== 7) return false;
  const [input, weight, , stride, padding, dilation, groups] = node.inputs;
  const inputType = graph.typeOf(input);
  const weightType = graph.typeOf(weight);
  if (!isTensorType(inputType) || !isTensorType(weightType)) return false;
  const inputSizes = concreteSizes(inputType.sizes);
  const weightSizes = concreteSizes(weightType.sizes);
  if (!inputSizes || !weightSizes || inputSizes.length !== 4 || weightSizes.length !== 4) {
    return false;
  }
  const groupsValue = graph.constantValue(groups);
  if (groupsValue?.kind !== "int") return false;
  const channels = inputSizes[1];
  const [outChannels, inPerGroup, kh, kw] = weightSizes;
  if (groupsValue.value !== channels || outChannels !== channels || inPerGroup !== 1) {
    return false;
  }
  if (kh !== 3 || kw !== 3) return false;
  return (
    isPair(constantIntList(graph, stride), [1, 2]) &&
    isPair(constantIntList(graph, padding), [1]) &&
    isPair(constantIntList(graph, dilation), [1])
  );
}

export const DEFAULT_ELIGIBILITY_ORACLES: EligibilityOracles = {
  isChannelsLastContiguous,
  isHandledElsewhere: isDepthwiseConvHandledElsewhere,
};

/**
 * Every tensor input must carry a device, and it must be the CPU.
 */
export function isTensorTypeCPU(graph: Graph, node: IRNode): boolean {
  for (const input of node.inputs) {
    const type = graph.typeOf(input);
    if (!isTensorType(type)) continue;
    if (type.device !== "cpu") return false;
  }
  return true;
}

/**
 * Reason a conv2d node may not be prepacked, or null when it may.
 */
export function convIneligibility(
  graph: Graph,
  node: IRNode,
  oracles: EligibilityOracles = DEFAULT_ELIGIBILITY_ORACLES,
): ConvSkipReason | null {
  if (!isTensorTypeCPU(graph, node)) return "non_cpu_device";
  if (!oracles.isChannelsLastContiguous(graph.typeOf(node.inputs[CONV2D_INPUT]))) {
    return "input_not_channels_last";
  }
  if (!oracles.isChannelsLastContiguous(graph.typeOf(node.inputs[CONV2D_WEIGHT]))) {
    return "weight_not_channels_last";
  }
  if (oracles.isHandledElsewhere(graph, node)) return "depthwise_handled_elsewhere";
  return null;
}

export function isEligibleConvNode(
  graph: Graph,
  node: IRNode,
  oracles: EligibilityOracles = DEFAULT_ELIGIBILITY_ORACLES,
  options: PassOptions = {},
): boolean {
  const reason = convIneligibility(graph, node, oracles);
  if (reason !== null) {
    options.trace?.record({ type: "conv_skipped", nodeId: node.id, reason });
    return false;
  }
  return true;
}
