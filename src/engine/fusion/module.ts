import type { Graph } from "../ir";
import { type FusionOptions, type FusionStats, fuseConvWithEltwise } from "./conv-eltwise-fusion";

/**
 * A compiled module: named method graphs plus submodules.
 */
export type ScriptModule = {
  name: string;
  methods: Map<string, Graph>;
  children: ScriptModule[];
};

export type ModuleFusionResult = {
  /** Qualified method name ("parent.child.forward") -> stats */
  methods: Map<string, FusionStats>;
};

/**
 * Run the conv fusion pipeline on every method of `module`, then on its
 * submodules, depth-first and in order.
 */
export function fuseConvWithEltwiseInModule(
  module: ScriptModule,
  options: FusionOptions = {},
): ModuleFusionResult {
  const methods = new Map<string, FusionStats>();
  const visit = (current: ScriptModule, prefix: string): void => {
    const qualified = prefix ? `${prefix}.${current.name}` : current.name;
    for (const [name, graph] of current.methods) {
      methods.set(`${qualified}.${name}`, fuseConvWithEltwise(graph, options));
    }
    for (const child of current.children) visit(child, qualified);
  };
  visit(module, "");
  return { methods };
}
