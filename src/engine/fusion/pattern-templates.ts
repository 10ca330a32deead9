import {
  NONE_VALUE,
  OPTIONAL_STR_TYPE,
  PACKED_CONV_TYPE,
  SCALAR_LIST_TYPE,
} from "../ir-types";
import { constantNode, opNode, type Pattern, type PatternNode } from "../rewrite/pattern";
import {
  LIST_CONSTRUCT_OP,
  NO_FUSION,
  PREPACK_CONV_PARAMS,
  PREPACK_OP,
  RUN_OP,
} from "./packed-ops";
import type { FusionRule } from "./rule-table";

// ============================================================================
// Pattern templates for elementwise fusion
//
// match:        packed  = conv2d_prepack(weight, ..., input_size, "none", scalars_placeholder, algorithm_placeholder)
//               conv_out = conv2d_run(input, packed)
//               res     = <op>(conv_out, <scalar operands>, <algorithm>)
// replacement:  attr    = "<op>"
//               scalars = list_construct(<scalar operands>)
//               algorithm = None              (only when the rule has no selector)
//               packed  = conv2d_prepack(weight, ..., input_size, attr, scalars, algorithm)
//               res     = conv2d_run(input, packed)
// ============================================================================

/** Parameters shared by every elementwise pattern, in declaration order. */
export const ELTWISE_BASE_PARAMS = [
  "input",
  ...PREPACK_CONV_PARAMS,
  "input_size",
  "scalars_placeholder",
  "algorithm_placeholder",
];

/** Extra op inputs a rule contributes: scalar operands, then the selector. */
export function ruleOperands(rule: FusionRule): string[] {
  return rule.algorithm === undefined
    ? [...rule.scalarOperands]
    : [...rule.scalarOperands, rule.algorithm];
}

export function eltwisePatternParams(rule: FusionRule): string[] {
  return [...ELTWISE_BASE_PARAMS, ...ruleOperands(rule)];
}

/**
 * Nodes that build the prepack's scalar list and, when the rule has no
 * algorithm selector, a None placeholder so every fused prepack has the
 * same arity.
 */
export function buildOperandListFragment(rule: FusionRule): PatternNode[] {
  const fragment = [
    opNode(LIST_CONSTRUCT_OP, [...rule.scalarOperands], "scalars", SCALAR_LIST_TYPE),
  ];
  if (rule.algorithm === undefined) {
    fragment.push(constantNode("algorithm", NONE_VALUE, OPTIONAL_STR_TYPE));
  }
  return fragment;
}

function prepackInputs(attr: string, scalars: string, algorithm: string): string[] {
  return [...PREPACK_CONV_PARAMS, "input_size", attr, scalars, algorithm];
}

export function buildEltwiseMatchPattern(rule: FusionRule): Pattern {
  return {
    params: eltwisePatternParams(rule),
    nodes: [
      constantNode("attr_placeholder", { kind: "str", value: NO_FUSION }),
      opNode(
        PREPACK_OP,
        prepackInputs("attr_placeholder", "scalars_placeholder", "algorithm_placeholder"),
        "packed",
      ),
      opNode(RUN_OP, ["input", "packed"], "conv_out"),
      opNode(rule.op, ["conv_out", ...ruleOperands(rule)], "res"),
    ],
    output: "res",
  };
}

export function buildEltwiseReplacementPattern(rule: FusionRule): Pattern {
  return {
    params: eltwisePatternParams(rule),
    nodes: [
      constantNode("attr", { kind: "str", value: rule.op }),
      ...buildOperandListFragment(rule),
      opNode(
        PREPACK_OP,
        prepackInputs("attr", "scalars", rule.algorithm ?? "algorithm"),
        "packed",
        PACKED_CONV_TYPE,
      ),
      opNode(RUN_OP, ["input", "packed"], "res"),
    ],
    output: "res",
  };
}
