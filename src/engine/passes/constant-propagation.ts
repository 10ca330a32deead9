import { debugLog } from "../debug-config";
import { CONSTANT_OP, type Graph } from "../ir";
import { getOpKernel, runNodeIfInputsAreConstant } from "../interpreter";
import { forEachBlockPostOrder } from "../ir-traverse";
import type { PassOptions } from "../trace";
import { eliminateDeadCode } from "./dce";

/**
 * Replace pure nodes whose inputs are all literals with the literals they
 * evaluate to, then drop what became dead. Ops registered as impure
 * (prepack, run) are left alone. Returns the number of folded nodes.
 */
export function constantPropagation(graph: Graph, options: PassOptions = {}): number {
  let folded = 0;
  forEachBlockPostOrder(graph, graph.topBlock, (block) => {
    for (const node of graph.nodesOf(block.id)) {
      if (node.op === CONSTANT_OP || node.blocks.length > 0) continue;
      if (!getOpKernel(node.op)?.pure) continue;
      const result = runNodeIfInputsAreConstant(graph, node);
      if (result === null) continue;
      if ("error" in result) {
        debugLog(`constant propagation left ${node.op} (${result.error})`, options);
        continue;
      }
      if (result.outputs.length !== node.outputs.length) continue;
      node.outputs.forEach((output, i) => {
        const literal = graph.insertConstant(
          result.outputs[i],
          { before: node.id },
          graph.typeOf(output),
        );
        graph.replaceAllUsesWith(output, literal);
      });
      graph.removeAllInputs(node.id);
      graph.destroyNode(node.id);
      options.trace?.record({ type: "constant_propagated", nodeId: node.id, op: node.op });
      folded += 1;
    }
  });
  eliminateDeadCode(graph);
  return folded;
}
