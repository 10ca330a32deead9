import { describe, expect, it } from "vitest";

import { PrepackFoldError } from "../src/engine/engine-errors";
import { fuseConvWithEltwise } from "../src/engine/fusion/conv-eltwise-fusion";
import { foldPrePackingOps } from "../src/engine/fusion/prepack-folding";
import { insertPrePackedConvOps } from "../src/engine/fusion/prepack-insertion";
import { checkGraph, Graph, IF_OP } from "../src/engine/ir";
import { countOps } from "../src/engine/ir-print";
import {
  BOOL_TYPE,
  INT_LIST_TYPE,
  NONE_VALUE,
  PACKED_CONV_TYPE,
  SCALAR_LIST_TYPE,
  type IValue,
} from "../src/engine/ir-types";
import { TraceRecorder } from "../src/engine/trace";
import {
  appendConstant,
  appendConv,
  appendEltwise,
  buildSingleConvGraph,
  layoutType,
  nodesWithOp,
  opsOf,
  runToArray,
  seededTensor,
} from "./helpers/conv-graph";

/**
 * A hand-built prepack over literal inputs, with the given attribute and
 * number of declared outputs.
 */
function literalPrepack(attr: string, outputs = 1) {
  const graph = new Graph();
  const weightShape = [2, 3, 1, 1];
  const literal = (value: IValue) => appendConstant(graph, value);
  const inputs = [
    appendConstant(graph, { kind: "tensor", tensor: seededTensor(weightShape, 4) }, undefined, layoutType(weightShape)),
    literal(NONE_VALUE),
    literal({ kind: "int_list", value: [1, 1] }),
    literal({ kind: "int_list", value: [0, 0] }),
    literal({ kind: "int_list", value: [1, 1] }),
    literal({ kind: "int", value: 1 }),
    appendConstant(graph, { kind: "int_list", value: [1, 3, 2, 2] }, undefined, INT_LIST_TYPE),
    literal({ kind: "str", value: attr }),
    appendConstant(graph, { kind: "scalar_list", value: [] }, undefined, SCALAR_LIST_TYPE),
    literal(NONE_VALUE),
  ];
  const prepack = graph.insertNode(
    { block: graph.topBlock },
    "conv2d_prepack",
    inputs,
    Array.from({ length: outputs }, () => PACKED_CONV_TYPE),
  );
  for (const output of prepack.outputs) graph.registerOutput(output);
  return { graph, prepack };
}

describe("foldPrePackingOps", () => {
  it("replaces a literal prepack with a frozen handle", () => {
    const trace = new TraceRecorder();
    const { graph, inputs } = buildSingleConvGraph([1, 3, 6, 6], { outChannels: 4 });
    const before = runToArray(graph, inputs);
    insertPrePackedConvOps(graph);
    const [prepack] = nodesWithOp(graph, "conv2d_prepack");

    expect(foldPrePackingOps(graph, { trace })).toBe(1);
    checkGraph(graph);
    expect(countOps(graph).get("conv2d_prepack")).toBeUndefined();

    const [run] = nodesWithOp(graph, "conv2d_run");
    const packed = graph.constantValue(run.inputs[1]);
    expect(packed?.kind).toBe("packed");
    if (packed?.kind === "packed") {
      expect(packed.handle.kind).toBe("frozen");
      expect(packed.handle.context.attr).toBe("none");
      expect(packed.handle.context.inputSize).toEqual([1, 3, 6, 6]);
      expect(Object.isFrozen(packed.handle.context)).toBe(true);
    }
    expect(graph.typeOf(run.inputs[1])).toEqual(PACKED_CONV_TYPE);
    expect(trace.snapshot()).toEqual([
      { type: "prepack_folded", nodeId: prepack.id, attr: "none" },
    ]);
    expect(runToArray(graph, inputs)).toEqual(before);
  });

  it("keeps a prepack with a runtime input", () => {
    const { graph } = buildSingleConvGraph([1, 3, 6, 6], {
      outChannels: 4,
      weightAsInput: true,
    });
    insertPrePackedConvOps(graph);
    expect(foldPrePackingOps(graph)).toBe(0);
    expect(countOps(graph).get("conv2d_prepack")).toBe(1);
  });

  it("traces a prepack that fails to evaluate and leaves it in place", () => {
    const trace = new TraceRecorder();
    const { graph, prepack } = literalPrepack("swish");
    expect(foldPrePackingOps(graph, { trace })).toBe(0);
    expect(graph.hasNode(prepack.id)).toBe(true);
    expect(trace.snapshot()).toEqual([
      {
        type: "prepack_fold_skipped",
        nodeId: prepack.id,
        reason: 'unsupported fusion attribute "swish"',
      },
    ]);
  });

  it("throws when a prepack declares more than one output", () => {
    const { graph } = literalPrepack("none", 2);
    expect(() => foldPrePackingOps(graph)).toThrow(PrepackFoldError);
  });

  it("folds a literal prepack built by hand", () => {
    const { graph, prepack } = literalPrepack("relu");
    expect(foldPrePackingOps(graph)).toBe(1);
    expect(graph.hasNode(prepack.id)).toBe(false);
    const [output] = graph.outputs;
    const value = graph.constantValue(output);
    expect(value?.kind === "packed" ? value.handle.context.attr : null).toBe("relu");
  });

  it("folds prepacks inside both branches of an if", () => {
    const graph = new Graph();
    const cond = graph.addGraphInput(BOOL_TYPE, "cond");
    const x = graph.addGraphInput(layoutType([1, 3, 6, 6]), "x");
    const ifNode = graph.insertNode({ block: graph.topBlock }, IF_OP, [cond], [
      layoutType([1, 3, 6, 6]),
    ]);
    const thenBlock = graph.addBlock(ifNode.id);
    const elseBlock = graph.addBlock(ifNode.id);
    const thenConv = appendConv(graph, x, [1, 3, 6, 6], {
      outChannels: 3,
      padding: [1, 1],
      block: thenBlock,
    });
    const relu = appendEltwise(graph, "relu", thenConv.output, [], thenBlock);
    graph.setBlockReturns(thenBlock, [relu]);
    const elseConv = appendConv(graph, x, [1, 3, 6, 6], {
      outChannels: 3,
      padding: [1, 1],
      seed: 2,
      block: elseBlock,
    });
    graph.setBlockReturns(elseBlock, [elseConv.output]);
    graph.registerOutput(ifNode.outputs[0]);

    const tensor = { kind: "tensor" as const, tensor: seededTensor([1, 3, 6, 6], 5) };
    const branches = [true, false].map((value) => [{ kind: "bool" as const, value }, tensor]);
    const before = branches.map((inputs) => runToArray(graph, inputs));

    const stats = fuseConvWithEltwise(graph);
    checkGraph(graph);
    expect(stats.eltwiseFused).toBe(1);
    expect(stats.prepacksFolded).toBe(2);
    expect(opsOf(graph)).toEqual(["if"]);
    expect(opsOf(graph, thenBlock)).toEqual(["conv2d_run"]);
    expect(opsOf(graph, elseBlock)).toEqual(["conv2d_run"]);
    const [fusedRun] = nodesWithOp(graph, "conv2d_run", thenBlock);
    const packed = graph.constantValue(fusedRun.inputs[1]);
    expect(packed?.kind === "packed" ? packed.handle.context.attr : null).toBe("relu");
    expect(branches.map((inputs) => runToArray(graph, inputs))).toEqual(before);
  });
});
