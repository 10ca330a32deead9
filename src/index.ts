export * from "./engine";
export type { Shape, DType, DeviceKind, MemoryFormat } from "./backend/types";
export {
  computeChannelsLastStrides,
  computeContiguousStrides,
  computeStridesFor,
} from "./backend/types";
export {
  conv2d,
  conv2dOutputShape,
  type ConvOpContext,
  createPackedConv,
  freezePackedHandle,
  type PackedConvHandle,
  runPackedConv,
  runPackedConvSum,
  Tensor,
  tensorFromArray,
} from "./backend/cpu";
