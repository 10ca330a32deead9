import { shapesEqual } from "../../core/shape";
import {
  add,
  conv2d,
  type Conv2dParams,
  gelu,
  hardtanh,
  leakyRelu,
  mapUnary,
  relu,
  type Tensor,
} from "./numeric";

// ============================================================================
// Packed convolution context
// Weight, bias and hyperparameters captured once by a prepack op and reused
// by every run op that consumes it. The fusion attribute selects the
// post-op the run applies to the convolution result.
// ============================================================================

export type ConvOpContext = Conv2dParams & {
  weight: Tensor;
  bias: Tensor | null;
  /** Expected activation size, NCHW */
  inputSize: number[];
  /** Fusion attribute, e.g. "none", "relu", "sum" */
  attr: string;
  /** Post-op scalar operands, in rule order */
  scalars: (number | null)[];
  /** Post-op algorithm selector (e.g. gelu approximation) */
  algorithm: string | null;
};

/**
 * A packed context either owned by the evaluation that produced it, or
 * frozen into a graph constant. Both run the same way.
 */
export type PackedConvHandle =
  | { kind: "live"; context: ConvOpContext }
  | { kind: "frozen"; context: Readonly<ConvOpContext> };

type PostOp = (x: number, scalars: (number | null)[], algorithm: string | null) => number;

function scalarAt(scalars: (number | null)[], index: number, attr: string): number {
  const value = scalars[index];
  if (value === undefined || value === null) {
    throw new Error(`fusion attribute "${attr}" requires scalar operand ${index}`);
  }
  return value;
}

const POST_OPS = new Map<string, PostOp>([
  ["none", (x) => x],
  ["relu", (x) => relu(x)],
  ["leaky_relu", (x, scalars) => leakyRelu(x, scalarAt(scalars, 0, "leaky_relu"))],
  [
    "hardtanh",
    (x, scalars) =>
      hardtanh(x, scalarAt(scalars, 0, "hardtanh"), scalarAt(scalars, 1, "hardtanh")),
  ],
  ["gelu", (x, _scalars, algorithm) => gelu(x, algorithm === "tanh" ? "tanh" : "none")],
]);

const SUM_ATTRS = new Set(["sum", "sum_relu"]);

const SCALAR_ARITY: Record<string, number> = {
  leaky_relu: 1,
  hardtanh: 2,
  sum: 1,
  sum_relu: 1,
};

export function isKnownFusionAttr(attr: string): boolean {
  return POST_OPS.has(attr) || SUM_ATTRS.has(attr);
}

export function isSumFusionAttr(attr: string): boolean {
  return SUM_ATTRS.has(attr);
}

/**
 * Validate and capture a convolution into a live packed handle.
 */
export function createPackedConv(context: ConvOpContext): PackedConvHandle {
  if (context.weight.shape.length !== 4) {
    throw new Error(`prepack expects a 4-D weight, got [${context.weight.shape}]`);
  }
  if (context.inputSize.length !== 4) {
    throw new Error(`prepack expects a 4-D input size, got [${context.inputSize}]`);
  }
  if (!isKnownFusionAttr(context.attr)) {
    throw new Error(`unsupported fusion attribute "${context.attr}"`);
  }
  const arity = SCALAR_ARITY[context.attr] ?? 0;
  if (context.scalars.length !== arity) {
    throw new Error(
      `fusion attribute "${context.attr}" takes ${arity} scalar operand(s), got ${context.scalars.length}`,
    );
  }
  if (context.attr === "gelu" && context.algorithm !== null && context.algorithm !== "none" && context.algorithm !== "tanh") {
    throw new Error(`unsupported gelu approximation "${context.algorithm}"`);
  }
  return {
    kind: "live",
    context: {
      ...context,
      stride: context.stride.slice(),
      padding: context.padding.slice(),
      dilation: context.dilation.slice(),
      inputSize: context.inputSize.slice(),
      scalars: context.scalars.slice(),
    },
  };
}

/**
 * Detach a handle from the evaluation that produced it so it can be
 * embedded in a graph as a literal.
 */
export function freezePackedHandle(handle: PackedConvHandle): PackedConvHandle {
  if (handle.kind === "frozen") return handle;
  const { context } = handle;
  return {
    kind: "frozen",
    context: Object.freeze({
      ...context,
      stride: context.stride.slice(),
      padding: context.padding.slice(),
      dilation: context.dilation.slice(),
      inputSize: context.inputSize.slice(),
      scalars: context.scalars.slice(),
    }),
  };
}

function checkInputSize(context: Readonly<ConvOpContext>, input: Tensor): void {
  if (!shapesEqual(input.shape, context.inputSize)) {
    throw new Error(
      `packed conv2d expects input [${context.inputSize}], got [${input.shape}]`,
    );
  }
}

function convolve(context: Readonly<ConvOpContext>, input: Tensor): Tensor {
  checkInputSize(context, input);
  return conv2d(input, context.weight, context.bias, context);
}

export function runPackedConv(handle: PackedConvHandle, input: Tensor): Tensor {
  const { context } = handle;
  const postOp = POST_OPS.get(context.attr);
  if (!postOp) {
    throw new Error(`conv2d_run cannot apply fusion attribute "${context.attr}"`);
  }
  const out = convolve(context, input);
  if (context.attr === "none") return out;
  return mapUnary(out, (x) => postOp(x, context.scalars, context.algorithm));
}

/**
 * out = conv(input) + alpha * accumulator, then relu for "sum_relu".
 */
export function runPackedConvSum(
  handle: PackedConvHandle,
  input: Tensor,
  accumulator: Tensor,
): Tensor {
  const { context } = handle;
  if (!isSumFusionAttr(context.attr)) {
    throw new Error(`conv2d_sum_run cannot apply fusion attribute "${context.attr}"`);
  }
  const out = convolve(context, input);
  if (!shapesEqual(out.shape, accumulator.shape)) {
    throw new Error(
      `conv2d_sum_run accumulator [${accumulator.shape}] does not match output [${out.shape}]`,
    );
  }
  const summed = add(out, accumulator, scalarAt(context.scalars, 0, context.attr));
  return context.attr === "sum_relu" ? mapUnary(summed, relu) : summed;
}
