export type Shape = number[];

export type DeviceKind = "cpu" | "gpu";

export type DType = "f16" | "f32" | "i32" | "u32" | "bool";

/**
 * Physical ordering of a 4-D NCHW tensor.
 * "channels_last" stores it as NHWC while keeping the logical NCHW shape.
 */
export type MemoryFormat = "contiguous" | "channels_last";

/**
 * Compute strides in elements for a contiguous tensor.
 * Returns row-major (C-style) strides: last dimension is contiguous.
 */
export function computeContiguousStrides(shape: number[]): number[] {
  if (shape.length === 0) return [];
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/**
 * Strides of a logical NCHW shape stored as NHWC.
 */
export function computeChannelsLastStrides(shape: number[]): number[] {
  if (shape.length !== 4) {
    throw new Error(`channels_last requires a 4-D shape, got [${shape}]`);
  }
  const [, c, h, w] = shape;
  return [h * w * c, 1, w * c, c];
}

export function computeStridesFor(shape: number[], format: MemoryFormat): number[] {
  return format === "channels_last"
    ? computeChannelsLastStrides(shape)
    : computeContiguousStrides(shape);
}

/**
 * Check if strides represent a dense layout in the given memory format.
 * Size-1 dimensions don't affect contiguity since stride doesn't matter.
 */
export function checkContiguous(
  shape: number[],
  strides: number[],
  format: MemoryFormat = "contiguous",
): boolean {
  if (shape.length !== strides.length) return false;
  if (format === "channels_last" && shape.length !== 4) return false;
  const expected = computeStridesFor(shape, format);
  for (let i = 0; i < shape.length; i++) {
    if (shape[i] <= 1) continue;
    if (strides[i] !== expected[i]) return false;
  }
  return true;
}
