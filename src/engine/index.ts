export {
  GraphInvariantError,
  IValueMismatchError,
  PatternArityError,
  PrepackFoldError,
  RuleTableError,
  UnsupportedOpError,
} from "./engine-errors";
export {
  checkGraph,
  CONSTANT_OP,
  Graph,
  IF_OP,
  RETURN_OP,
} from "./ir";
export type { InsertPoint, IRBlock, IRNode, IRValue, Use, ValueProducer } from "./ir";
export {
  BOOL_TYPE,
  FLOAT_TYPE,
  formatIValue,
  INT_LIST_TYPE,
  INT_TYPE,
  isTensorType,
  ivaluesEqual,
  ivalueType,
  NONE_TYPE,
  NONE_VALUE,
  OPTIONAL_STR_TYPE,
  PACKED_CONV_TYPE,
  SCALAR_LIST_TYPE,
  STR_TYPE,
  tensorType,
  typeToString,
} from "./ir-types";
export type { IRType, IValue, TensorType } from "./ir-types";
export { collectBlocks, forEachBlockPostOrder } from "./ir-traverse";
export { countOps, printGraph } from "./ir-print";
export { TraceRecorder } from "./trace";
export type { ConvSkipReason, PassOptions, TraceEvent } from "./trace";
export { debugLog, graphDebug, isDebugEnabled } from "./debug-config";
export {
  getOpKernel,
  registerOpKernel,
  runGraph,
  runNodeIfInputsAreConstant,
} from "./interpreter";
export type { OpKernel } from "./interpreter";

export { constantNode, opNode, validatePatternPair } from "./rewrite/pattern";
export type { Pattern, PatternNode } from "./rewrite/pattern";
export { findMatches, matchAt, matchValue } from "./rewrite/matcher";
export type { Match, MatchFilter } from "./rewrite/matcher";
export { SubgraphRewriter } from "./rewrite/subgraph-rewriter";

export { eliminateDeadCode, isEffectful } from "./passes/dce";
export { constantPropagation } from "./passes/constant-propagation";
export { replaceConvolutionWithConv2d } from "./passes/canonicalize-conv";

export * from "./fusion/packed-ops";
export {
  convIneligibility,
  DEFAULT_ELIGIBILITY_ORACLES,
  isChannelsLastContiguous,
  isDepthwiseConvHandledElsewhere,
  isEligibleConvNode,
  isTensorTypeCPU,
} from "./fusion/eligibility";
export type { EligibilityOracles } from "./fusion/eligibility";
export { insertPrePackedConvOpForNode, insertPrePackedConvOps } from "./fusion/prepack-insertion";
export type { PrepackInsertionOptions } from "./fusion/prepack-insertion";
export {
  createFusionRuleTable,
  DEFAULT_FUSION_RULES,
  RESERVED_PATTERN_NAMES,
} from "./fusion/rule-table";
export type { FusionRule, FusionRuleTable } from "./fusion/rule-table";
export {
  buildEltwiseMatchPattern,
  buildEltwiseReplacementPattern,
  buildOperandListFragment,
} from "./fusion/pattern-templates";
export { fuseEltwiseWithPackedOps } from "./fusion/eltwise-fusion";
export {
  addAccumulatorOnLeft,
  addAccumulatorOnRight,
  fuseAddReluWithPackedOps,
} from "./fusion/add-relu-fusion";
export { foldPrePackingOps } from "./fusion/prepack-folding";
export { fuseConvWithEltwise } from "./fusion/conv-eltwise-fusion";
export type { FusionOptions, FusionStats } from "./fusion/conv-eltwise-fusion";
export { fuseConvWithEltwiseInModule } from "./fusion/module";
export type { ModuleFusionResult, ScriptModule } from "./fusion/module";
