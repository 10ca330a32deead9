import { PatternArityError } from "../engine-errors";
import { CONSTANT_OP } from "../ir";
import type { IRType, IValue } from "../ir-types";

// ============================================================================
// Structural rewrite patterns
// A pattern is a tiny graph written as data: named parameters (free
// values bound by the matcher) and single-output nodes referring to
// parameters or earlier node outputs by name.
// ============================================================================

export type PatternNode = {
  op: string;
  inputs: string[];
  output: string;
  /** Literal of a constant node; in a match pattern the graph constant must equal it */
  value?: IValue;
  /** Output type of a node created by a replacement pattern */
  type?: IRType;
};

export type Pattern = {
  params: string[];
  nodes: PatternNode[];
  /** Name of the value the pattern produces */
  output: string;
};

export function opNode(
  op: string,
  inputs: string[],
  output: string,
  type?: IRType,
): PatternNode {
  return type === undefined ? { op, inputs, output } : { op, inputs, output, type };
}

export function constantNode(output: string, value: IValue, type?: IRType): PatternNode {
  const node: PatternNode = { op: CONSTANT_OP, inputs: [], output, value };
  if (type !== undefined) node.type = type;
  return node;
}

/**
 * How many times each name is consumed inside the pattern.
 */
export function patternUseCounts(pattern: Pattern): Map<string, number> {
  const counts = new Map<string, number>();
  for (const node of pattern.nodes) {
    for (const input of node.inputs) {
      counts.set(input, (counts.get(input) ?? 0) + 1);
    }
  }
  return counts;
}

function checkDefinitions(pattern: Pattern, role: string): void {
  const defined = new Set<string>();
  for (const param of pattern.params) {
    if (defined.has(param)) {
      throw new PatternArityError(`${role} pattern declares parameter "${param}" twice`);
    }
    defined.add(param);
  }
  for (const node of pattern.nodes) {
    for (const input of node.inputs) {
      if (!defined.has(input)) {
        throw new PatternArityError(
          `${role} pattern node ${node.op} reads "${input}" before it is defined`,
        );
      }
    }
    if (defined.has(node.output)) {
      throw new PatternArityError(`${role} pattern defines "${node.output}" twice`);
    }
    if (node.op === CONSTANT_OP && (node.value === undefined || node.inputs.length > 0)) {
      throw new PatternArityError(`${role} pattern constant "${node.output}" needs a value and no inputs`);
    }
    defined.add(node.output);
  }
  if (!pattern.nodes.some((node) => node.output === pattern.output)) {
    throw new PatternArityError(`${role} pattern output "${pattern.output}" is not produced by a node`);
  }
}

/**
 * Check a match pattern: every parameter is consumed and every node
 * contributes to the output, so a match binds all of them.
 */
export function validateMatchPattern(pattern: Pattern): void {
  checkDefinitions(pattern, "match");
  const uses = patternUseCounts(pattern);
  for (const param of pattern.params) {
    if (!uses.has(param)) {
      throw new PatternArityError(`match pattern parameter "${param}" is never used`);
    }
  }
  const reachable = new Set<string>([pattern.output]);
  for (let i = pattern.nodes.length - 1; i >= 0; i--) {
    const node = pattern.nodes[i];
    if (!reachable.has(node.output)) {
      throw new PatternArityError(
        `match pattern node "${node.output}" does not contribute to "${pattern.output}"`,
      );
    }
    for (const input of node.inputs) reachable.add(input);
  }
}

/**
 * Check a (match, replacement) pair before it is registered. The two
 * sides must declare the same parameters in the same order; anything the
 * replacement adds is a local node.
 */
export function validatePatternPair(match: Pattern, replacement: Pattern): void {
  validateMatchPattern(match);
  checkDefinitions(replacement, "replacement");
  const sameParams =
    match.params.length === replacement.params.length &&
    match.params.every((param, i) => replacement.params[i] === param);
  if (!sameParams) {
    throw new PatternArityError(
      `replacement parameters (${replacement.params.join(", ")}) do not match ` +
        `match parameters (${match.params.join(", ")})`,
    );
  }
  for (const node of replacement.nodes) {
    const typed = node.type !== undefined || node.value !== undefined;
    if (!typed && node.output !== replacement.output) {
      throw new PatternArityError(
        `replacement node "${node.output}" (${node.op}) needs an output type`,
      );
    }
  }
}
