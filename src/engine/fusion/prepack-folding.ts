import { freezePackedHandle } from "../../backend/cpu/conv-context";
import { debugLog } from "../debug-config";
import { PrepackFoldError } from "../engine-errors";
import type { Graph } from "../ir";
import { expectPacked } from "../ir-types";
import { runNodeIfInputsAreConstant } from "../interpreter";
import { forEachBlockPostOrder } from "../ir-traverse";
import type { PassOptions } from "../trace";
import { PREPACK_OP } from "./packed-ops";

/**
 * Evaluate every conv2d_prepack whose inputs are all literals and embed
 * the frozen handle as a constant in its place. Prepacks with a runtime
 * input stay. Returns the number of folded prepacks.
 */
export function foldPrePackingOps(graph: Graph, options: PassOptions = {}): number {
  const folded: number[] = [];

  forEachBlockPostOrder(graph, graph.topBlock, (block) => {
    for (const node of graph.nodesOf(block.id)) {
      if (node.op !== PREPACK_OP) continue;
      const result = runNodeIfInputsAreConstant(graph, node);
      if (result === null) continue;
      if ("error" in result) {
        options.trace?.record({
          type: "prepack_fold_skipped",
          nodeId: node.id,
          reason: result.error,
        });
        debugLog(`prepack ${node.id} not folded: ${result.error}`, options);
        continue;
      }
      if (result.outputs.length !== 1 || node.outputs.length !== 1) {
        throw new PrepackFoldError(
          `conv2d_prepack ${node.id} has ${node.outputs.length} output(s) and evaluated to ` +
            `${result.outputs.length} value(s), expected exactly one`,
        );
      }
      const handle = freezePackedHandle(expectPacked(result.outputs[0], "conv2d_prepack result"));
      const output = node.outputs[0];
      const literal = graph.insertConstant(
        { kind: "packed", handle },
        { before: node.id },
        graph.typeOf(output),
      );
      graph.replaceAllUsesWith(output, literal);
      folded.push(node.id);
      options.trace?.record({
        type: "prepack_folded",
        nodeId: node.id,
        attr: handle.context.attr,
      });
    }
  });

  for (const nodeId of folded) graph.removeAllInputs(nodeId);
  for (const nodeId of folded) graph.destroyNode(nodeId);
  debugLog(`folded ${folded.length} prepack op(s)`, options);
  return folded.length;
}
