import {
  computeChannelsLastStrides,
  computeContiguousStrides,
  type DeviceKind,
  type MemoryFormat,
} from "../../src/backend/types";
import { conv2dOutputShape, Tensor, tensorFromArray } from "../../src/backend/cpu";
import { Graph, type IRNode } from "../../src/engine/ir";
import {
  BOOL_TYPE,
  expectTensor,
  INT_LIST_TYPE,
  INT_TYPE,
  type IRType,
  type IValue,
  tensorType,
  type TensorType,
} from "../../src/engine/ir-types";
import { runGraph } from "../../src/engine/interpreter";

/**
 * Deterministic values in [-1, 1) (mulberry32).
 */
export function seededValues(count: number, seed: number): number[] {
  let state = seed >>> 0;
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    out.push(unit * 2 - 1);
  }
  return out;
}

export function seededTensor(shape: number[], seed: number): Tensor {
  return tensorFromArray(seededValues(shape.reduce((a, b) => a * b, 1), seed), shape);
}

export function layoutType(
  sizes: number[],
  format: MemoryFormat = "channels_last",
  device: DeviceKind = "cpu",
): TensorType {
  const strides =
    format === "channels_last" && sizes.length === 4
      ? computeChannelsLastStrides(sizes)
      : computeContiguousStrides(sizes);
  return tensorType({ sizes, strides, device, dtype: "f32" });
}

export type ConvLayer = {
  outChannels: number;
  kernel?: number;
  stride?: number[];
  padding?: number[];
  dilation?: number[];
  groups?: number;
  bias?: boolean;
  seed?: number;
  weightFormat?: MemoryFormat;
  device?: DeviceKind;
  /** Take the weight as a graph input instead of a literal */
  weightAsInput?: boolean;
  /** Emit _convolution instead of conv2d */
  convolution?: boolean;
  transposed?: boolean;
  block?: number;
};

export type ConvResult = {
  node: IRNode;
  output: number;
  outputSizes: number[];
  weight: Tensor;
};

function append(graph: Graph, block: number, op: string, inputs: number[], type: IRType): number {
  return graph.insertNode({ block }, op, inputs, [type]).outputs[0];
}

export function appendConstant(graph: Graph, value: IValue, block?: number, type?: IRType): number {
  return graph.insertConstant(value, { block: block ?? graph.topBlock }, type);
}

/**
 * Append a convolution reading `input` (which must carry concrete NCHW
 * sizes in `inputSizes`). Hyperparameters are emitted as literals.
 */
export function appendConv(
  graph: Graph,
  input: number,
  inputSizes: number[],
  layer: ConvLayer,
): ConvResult {
  const block = layer.block ?? graph.topBlock;
  const kernel = layer.kernel ?? 3;
  const groups = layer.groups ?? 1;
  const stride = layer.stride ?? [1, 1];
  const padding = layer.padding ?? [0, 0];
  const dilation = layer.dilation ?? [1, 1];
  const device = layer.device ?? "cpu";
  const seed = layer.seed ?? 1;
  const weightShape = [layer.outChannels, inputSizes[1] / groups, kernel, kernel];
  const weight = seededTensor(weightShape, seed);
  const weightType = layoutType(weightShape, layer.weightFormat ?? "channels_last", device);

  const weightValue = layer.weightAsInput
    ? graph.addGraphInput(weightType, "weight")
    : appendConstant(graph, { kind: "tensor", tensor: weight }, block, weightType);
  const biasValue =
    layer.bias === false
      ? appendConstant(graph, { kind: "none" }, block)
      : appendConstant(
          graph,
          { kind: "tensor", tensor: seededTensor([layer.outChannels], seed + 1000) },
          block,
          tensorType({ sizes: [layer.outChannels], device, dtype: "f32" }),
        );
  const intList = (value: number[]) =>
    appendConstant(graph, { kind: "int_list", value }, block, INT_LIST_TYPE);
  const strideValue = intList(stride);
  const paddingValue = intList(padding);
  const dilationValue = intList(dilation);

  const outputSizes = conv2dOutputShape(inputSizes, weightShape, {
    stride,
    padding,
    dilation,
    groups,
  });
  const outputType = layoutType(outputSizes, "channels_last", device);

  let inputs: number[];
  if (layer.convolution) {
    const bool = (value: boolean) =>
      appendConstant(graph, { kind: "bool", value }, block, BOOL_TYPE);
    inputs = [
      input,
      weightValue,
      biasValue,
      strideValue,
      paddingValue,
      dilationValue,
      bool(layer.transposed ?? false),
      intList([0, 0]),
      appendConstant(graph, { kind: "int", value: groups }, block, INT_TYPE),
      bool(false),
      bool(false),
      bool(true),
      bool(true),
    ];
  } else {
    inputs = [
      input,
      weightValue,
      biasValue,
      strideValue,
      paddingValue,
      dilationValue,
      appendConstant(graph, { kind: "int", value: groups }, block, INT_TYPE),
    ];
  }
  const node = graph.insertNode(
    { block },
    layer.convolution ? "_convolution" : "conv2d",
    inputs,
    [outputType],
  );
  return { node, output: node.outputs[0], outputSizes, weight };
}

/**
 * Append `op(input, ...operands)` producing a tensor of the same type.
 */
export function appendEltwise(
  graph: Graph,
  op: string,
  input: number,
  operands: IValue[] = [],
  block?: number,
): number {
  const at = block ?? graph.topBlock;
  const operandValues = operands.map((value) => appendConstant(graph, value, at));
  return append(graph, at, op, [input, ...operandValues], graph.typeOf(input));
}

export function appendAdd(
  graph: Graph,
  self: number,
  other: number,
  alpha: IValue = { kind: "int", value: 1 },
  block?: number,
): number {
  const at = block ?? graph.topBlock;
  const alphaValue = appendConstant(graph, alpha, at);
  return append(graph, at, "add", [self, other, alphaValue], graph.typeOf(self));
}

export type Tail =
  | { kind: "none" }
  | { kind: "eltwise"; op: string; operands: IValue[] }
  | { kind: "add"; alpha: number; swapped: boolean; relu: boolean };

export type SingleConvGraph = {
  graph: Graph;
  inputs: IValue[];
  conv: ConvResult;
};

/**
 * x -> conv -> tail, returning the graph and a matching set of inputs.
 * An add tail takes its accumulator as a second graph input.
 */
export function buildSingleConvGraph(
  inputSizes: number[],
  layer: ConvLayer,
  tail: Tail = { kind: "none" },
  seed = 7,
): SingleConvGraph {
  const graph = new Graph();
  const x = graph.addGraphInput(layoutType(inputSizes, "channels_last", layer.device), "x");
  const inputs: IValue[] = [{ kind: "tensor", tensor: seededTensor(inputSizes, seed) }];
  const conv = appendConv(graph, x, inputSizes, layer);
  if (layer.weightAsInput) inputs.push({ kind: "tensor", tensor: conv.weight });

  let result = conv.output;
  if (tail.kind === "eltwise") {
    result = appendEltwise(graph, tail.op, conv.output, tail.operands);
  } else if (tail.kind === "add") {
    const acc = graph.addGraphInput(layoutType(conv.outputSizes), "acc");
    inputs.push({ kind: "tensor", tensor: seededTensor(conv.outputSizes, seed + 1) });
    const alpha: IValue = Number.isInteger(tail.alpha)
      ? { kind: "int", value: tail.alpha }
      : { kind: "float", value: tail.alpha };
    result = tail.swapped
      ? appendAdd(graph, acc, conv.output, alpha)
      : appendAdd(graph, conv.output, acc, alpha);
    if (tail.relu) result = appendEltwise(graph, "relu", result);
  }
  graph.registerOutput(result);
  return { graph, inputs, conv };
}

export function runToArray(graph: Graph, inputs: IValue[]): number[] {
  const [out] = runGraph(graph, inputs);
  return expectTensor(out, "graph output").toArray();
}

/** Ops of a block in program order, constants left out. */
export function opsOf(graph: Graph, block: number = graph.topBlock): string[] {
  return graph
    .nodesOf(block)
    .map((node) => node.op)
    .filter((op) => op !== "constant");
}

export function nodesWithOp(graph: Graph, op: string, block: number = graph.topBlock): IRNode[] {
  return graph.nodesOf(block).filter((node) => node.op === op);
}
