import { RuleTableError } from "../engine-errors";
import { type MatchFilter, matchValue } from "../rewrite/matcher";
import { NO_FUSION } from "./packed-ops";

/**
 * How an elementwise op following a conv2d_run folds into the prepack.
 * `scalarOperands` name the op's extra scalar inputs in call order; they
 * become the prepack's scalar list. `algorithm` names a string input that
 * becomes the prepack's algorithm selector.
 */
export type FusionRule = {
  op: string;
  scalarOperands: readonly string[];
  algorithm?: string;
  filter?: MatchFilter;
};

export type FusionRuleTable = ReadonlyMap<string, FusionRule>;

/** Names the generated patterns use for their own values. */
export const RESERVED_PATTERN_NAMES = new Set([
  "input",
  "weight",
  "bias",
  "stride",
  "padding",
  "dilation",
  "groups",
  "input_size",
  "attr",
  "attr_placeholder",
  "scalars",
  "scalars_placeholder",
  "algorithm",
  "algorithm_placeholder",
  "packed",
  "conv_out",
  "res",
]);

const GELU_APPROXIMATIONS = new Set(["none", "tanh"]);

/**
 * The approximation must be a literal the kernel understands.
 */
const isKnownGeluApproximation: MatchFilter = (match, graph) => {
  const value = graph.constantValue(matchValue(match, "approximate"));
  return value?.kind === "str" && GELU_APPROXIMATIONS.has(value.value);
};

export const DEFAULT_FUSION_RULES: readonly FusionRule[] = [
  { op: NO_FUSION, scalarOperands: [] },
  { op: "relu", scalarOperands: [] },
  { op: "leaky_relu", scalarOperands: ["negative_slope"] },
  { op: "hardtanh", scalarOperands: ["min_val", "max_val"] },
  {
    op: "gelu",
    scalarOperands: [],
    algorithm: "approximate",
    filter: isKnownGeluApproximation,
  },
];

/**
 * Build a rule table keyed by op name. The "none" entry is required and
 * must carry no operands; it marks an unfused prepack and never yields a
 * pattern.
 */
export function createFusionRuleTable(
  rules: readonly FusionRule[] = DEFAULT_FUSION_RULES,
): FusionRuleTable {
  const table = new Map<string, FusionRule>();
  for (const rule of rules) {
    if (table.has(rule.op)) {
      throw new RuleTableError(`duplicate fusion rule for "${rule.op}"`);
    }
    const operands = rule.algorithm === undefined
      ? rule.scalarOperands
      : [...rule.scalarOperands, rule.algorithm];
    const seen = new Set<string>();
    for (const operand of operands) {
      if (RESERVED_PATTERN_NAMES.has(operand) || seen.has(operand)) {
        throw new RuleTableError(`fusion rule "${rule.op}" cannot use operand name "${operand}"`);
      }
      seen.add(operand);
    }
    table.set(rule.op, rule);
  }
  const none = table.get(NO_FUSION);
  if (!none) {
    throw new RuleTableError(`fusion rule table needs a "${NO_FUSION}" entry`);
  }
  if (none.scalarOperands.length > 0 || none.algorithm !== undefined) {
    throw new RuleTableError(`the "${NO_FUSION}" entry cannot take operands`);
  }
  return table;
}
