/**
 * Operator surface produced by the convolution fusion passes.
 */
export const CONV2D_OP = "conv2d";
export const PREPACK_OP = "conv2d_prepack";
export const RUN_OP = "conv2d_run";
export const SUM_RUN_OP = "conv2d_sum_run";
export const LIST_CONSTRUCT_OP = "list_construct";

/** Fusion attribute of a prepack that carries no post-op. */
export const NO_FUSION = "none";
export const SUM_FUSION = "sum";
export const SUM_RELU_FUSION = "sum_relu";

export const CONV2D_INPUT = 0;
export const CONV2D_WEIGHT = 1;

/**
 * Prepack inputs taken over from conv2d (everything but the activation),
 * followed by the ones the synthesizer adds.
 */
export const PREPACK_CONV_PARAMS = [
  "weight",
  "bias",
  "stride",
  "padding",
  "dilation",
  "groups",
] as const;
