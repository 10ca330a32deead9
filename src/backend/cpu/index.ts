export {
  add,
  conv2d,
  conv2dOutputShape,
  type Conv2dParams,
  gelu,
  type GeluApproximation,
  hardtanh,
  leakyRelu,
  mapUnary,
  relu,
  Tensor,
  tensorFromArray,
} from "./numeric";
export {
  type ConvOpContext,
  createPackedConv,
  freezePackedHandle,
  isKnownFusionAttr,
  isSumFusionAttr,
  type PackedConvHandle,
  runPackedConv,
  runPackedConvSum,
} from "./conv-context";
