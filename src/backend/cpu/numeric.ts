import { broadcastShapes, shapesEqual, sizeOf } from "../../core/shape";
import { computeContiguousStrides, type Shape } from "../types";

/**
 * Dense row-major f32 tensor. Kernels here are reference loops; they
 * favour a predictable evaluation order over speed so that fused and
 * unfused graphs produce bit-identical results.
 */
export class Tensor {
  readonly shape: Shape;
  readonly data: Float32Array;

  constructor(shape: Shape, data: Float32Array) {
    if (sizeOf(shape) !== data.length) {
      throw new Error("Tensor data length does not match shape");
    }
    this.shape = shape.slice();
    this.data = data;
  }

  get size(): number {
    return this.data.length;
  }

  toArray(): number[] {
    return Array.from(this.data);
  }
}

export function tensorFromArray(values: number[] | Float32Array, shape: Shape): Tensor {
  return new Tensor(
    shape,
    values instanceof Float32Array ? values.slice() : Float32Array.from(values),
  );
}

// ============================================================================
// Elementwise
// ============================================================================

export function relu(x: number): number {
  return x > 0 ? x : 0;
}

export function leakyRelu(x: number, negativeSlope: number): number {
  return x > 0 ? x : x * negativeSlope;
}

export function hardtanh(x: number, minVal: number, maxVal: number): number {
  if (x < minVal) return minVal;
  if (x > maxVal) return maxVal;
  return x;
}

// Abramowitz–Stegun 7.1.26, |error| < 1.5e-7
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const poly =
    ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t +
      0.254829592) *
    t;
  return sign * (1 - poly * Math.exp(-ax * ax));
}

export type GeluApproximation = "none" | "tanh";

export function gelu(x: number, approximate: GeluApproximation): number {
  if (approximate === "tanh") {
    const inner = Math.sqrt(2 / Math.PI) * (x + 0.044715 * x * x * x);
    return 0.5 * x * (1 + Math.tanh(inner));
  }
  return 0.5 * x * (1 + erf(x / Math.SQRT2));
}

export function mapUnary(a: Tensor, fn: (x: number) => number): Tensor {
  const out = new Float32Array(a.size);
  for (let i = 0; i < a.size; i++) {
    out[i] = fn(a.data[i]);
  }
  return new Tensor(a.shape, out);
}

function broadcastIndex(
  linear: number,
  outShape: number[],
  inShape: number[],
  inStrides: number[],
): number {
  let index = 0;
  let rem = linear;
  const offset = outShape.length - inShape.length;
  for (let d = outShape.length - 1; d >= 0; d--) {
    const coord = rem % outShape[d];
    rem = Math.floor(rem / outShape[d]);
    const inDim = d - offset;
    if (inDim >= 0 && inShape[inDim] !== 1) {
      index += coord * inStrides[inDim];
    }
  }
  return index;
}

/**
 * out = a + alpha * b, with broadcasting.
 */
export function add(a: Tensor, b: Tensor, alpha = 1): Tensor {
  if (shapesEqual(a.shape, b.shape)) {
    const out = new Float32Array(a.size);
    for (let i = 0; i < a.size; i++) {
      out[i] = a.data[i] + alpha * b.data[i];
    }
    return new Tensor(a.shape, out);
  }
  const shape = broadcastShapes(a.shape, b.shape);
  const aStrides = computeContiguousStrides(a.shape);
  const bStrides = computeContiguousStrides(b.shape);
  const out = new Float32Array(sizeOf(shape));
  for (let i = 0; i < out.length; i++) {
    const av = a.data[broadcastIndex(i, shape, a.shape, aStrides)];
    const bv = b.data[broadcastIndex(i, shape, b.shape, bStrides)];
    out[i] = av + alpha * bv;
  }
  return new Tensor(shape, out);
}

// ============================================================================
// Convolution
// ============================================================================

export type Conv2dParams = {
  stride: number[];
  padding: number[];
  dilation: number[];
  groups: number;
};

function pair(values: number[], what: string): [number, number] {
  if (values.length === 1) return [values[0], values[0]];
  if (values.length === 2) return [values[0], values[1]];
  throw new Error(`conv2d ${what} must have 1 or 2 elements, got ${values.length}`);
}

export function conv2dOutputShape(
  inputShape: number[],
  weightShape: number[],
  params: Conv2dParams,
): number[] {
  const [n, , h, w] = inputShape;
  const [cOut, , kh, kw] = weightShape;
  const [sh, sw] = pair(params.stride, "stride");
  const [ph, pw] = pair(params.padding, "padding");
  const [dh, dw] = pair(params.dilation, "dilation");
  const outH = Math.floor((h + 2 * ph - dh * (kh - 1) - 1) / sh) + 1;
  const outW = Math.floor((w + 2 * pw - dw * (kw - 1) - 1) / sw) + 1;
  return [n, cOut, outH, outW];
}

/**
 * Direct NCHW convolution with OIHW weights.
 */
export function conv2d(
  input: Tensor,
  weight: Tensor,
  bias: Tensor | null,
  params: Conv2dParams,
): Tensor {
  if (input.shape.length !== 4 || weight.shape.length !== 4) {
    throw new Error(
      `conv2d expects 4-D input and weight, got [${input.shape}] and [${weight.shape}]`,
    );
  }
  const { groups } = params;
  const [n, cIn, h, w] = input.shape;
  const [cOut, cInPerGroup, kh, kw] = weight.shape;
  if (groups < 1 || cIn !== cInPerGroup * groups || cOut % groups !== 0) {
    throw new Error(
      `conv2d channel mismatch: input ${cIn}, weight [${weight.shape}], groups ${groups}`,
    );
  }
  if (bias && (bias.shape.length !== 1 || bias.shape[0] !== cOut)) {
    throw new Error(`conv2d bias must have shape [${cOut}], got [${bias.shape}]`);
  }
  const [sh, sw] = pair(params.stride, "stride");
  const [ph, pw] = pair(params.padding, "padding");
  const [dh, dw] = pair(params.dilation, "dilation");
  const outShape = conv2dOutputShape(input.shape, weight.shape, params);
  const [, , outH, outW] = outShape;
  if (outH <= 0 || outW <= 0) {
    throw new Error(`conv2d output would be empty: [${outShape}]`);
  }
  const cOutPerGroup = cOut / groups;
  const out = new Float32Array(sizeOf(outShape));

  for (let b = 0; b < n; b++) {
    for (let oc = 0; oc < cOut; oc++) {
      const g = Math.floor(oc / cOutPerGroup);
      for (let oy = 0; oy < outH; oy++) {
        for (let ox = 0; ox < outW; ox++) {
          let acc = bias ? bias.data[oc] : 0;
          for (let ic = 0; ic < cInPerGroup; ic++) {
            const inChannel = g * cInPerGroup + ic;
            for (let ky = 0; ky < kh; ky++) {
              const iy = oy * sh - ph + ky * dh;
              if (iy < 0 || iy >= h) continue;
              for (let kx = 0; kx < kw; kx++) {
                const ix = ox * sw - pw + kx * dw;
                if (ix < 0 || ix >= w) continue;
                const inIdx = ((b * cIn + inChannel) * h + iy) * w + ix;
                const wIdx = ((oc * cInPerGroup + ic) * kh + ky) * kw + kx;
                acc += input.data[inIdx] * weight.data[wIdx];
              }
            }
          }
          out[((b * cOut + oc) * outH + oy) * outW + ox] = acc;
        }
      }
    }
  }
  return new Tensor(outShape, out);
}
