import { describe, expect, it } from "vitest";

import { GraphInvariantError } from "../src/engine/engine-errors";
import { checkGraph, Graph, IF_OP } from "../src/engine/ir";
import { countOps, printGraph } from "../src/engine/ir-print";
import { BOOL_TYPE, tensorType } from "../src/engine/ir-types";
import { collectBlocks } from "../src/engine/ir-traverse";
import { eliminateDeadCode } from "../src/engine/passes/dce";

function reluGraph() {
  const graph = new Graph();
  const x = graph.addGraphInput(tensorType({ sizes: [2], device: "cpu" }), "x");
  graph.insertConstant({ kind: "float", value: 2 }, { block: graph.topBlock });
  const relu = graph.insertNode({ block: graph.topBlock }, "relu", [x], [graph.typeOf(x)]);
  graph.registerOutput(relu.outputs[0]);
  return { graph, x, relu };
}

describe("Graph arena", () => {
  it("records uses for every input slot", () => {
    const { graph, x, relu } = reluGraph();
    expect(graph.getValue(x).uses).toEqual([{ node: relu.id, index: 0 }]);
    expect(graph.producerOf(relu.outputs[0])?.id).toBe(relu.id);
    expect(graph.producerOf(x)).toBeUndefined();
  });

  it("prints a canonical text form", () => {
    const { graph } = reluGraph();
    expect(printGraph(graph)).toBe(
      [
        "graph(%0 : Tensor([2], cpu)):",
        "  %1 : float = constant[value=2.]()",
        "  %2 : Tensor([2], cpu) = relu(%0)",
        "  -> (%2)",
      ].join("\n"),
    );
  });

  it("refuses to destroy a node whose output is still used", () => {
    const { graph, relu } = reluGraph();
    graph.removeAllInputs(relu.id);
    expect(() => graph.destroyNode(relu.id)).toThrow(GraphInvariantError);
  });

  it("refuses to destroy a node that still has inputs", () => {
    const graph = new Graph();
    const x = graph.addGraphInput(tensorType({ sizes: [2] }));
    const dead = graph.insertNode({ block: graph.topBlock }, "relu", [x], [graph.typeOf(x)]);
    expect(() => graph.destroyNode(dead.id)).toThrow(/still has inputs/);
    graph.removeAllInputs(dead.id);
    graph.destroyNode(dead.id);
    expect(graph.hasNode(dead.id)).toBe(false);
    expect(graph.getValue(x).uses).toEqual([]);
  });

  it("redirects uses with replaceAllUsesWith", () => {
    const { graph, x, relu } = reluGraph();
    const other = graph.insertNode({ before: relu.id }, "relu", [x], [graph.typeOf(x)]);
    graph.replaceAllUsesWith(relu.outputs[0], other.outputs[0]);
    expect(graph.outputs).toEqual([other.outputs[0]]);
    expect(graph.getValue(relu.outputs[0]).uses).toEqual([]);
    checkGraph(graph);
  });

  it("inserts before a node in program order", () => {
    const { graph, relu } = reluGraph();
    const c = graph.insertConstant({ kind: "int", value: 3 }, { before: relu.id });
    expect(graph.nodesOf(graph.topBlock).map((n) => n.outputs[0])).toEqual([
      graph.nodesOf(graph.topBlock)[0].outputs[0],
      c,
      relu.outputs[0],
    ]);
    expect(countOps(graph).get("constant")).toBe(2);
  });

  it("rejects a use that precedes the definition", () => {
    const graph = new Graph();
    const x = graph.addGraphInput(tensorType({ sizes: [2] }));
    const first = graph.insertNode({ block: graph.topBlock }, "relu", [x], [graph.typeOf(x)]);
    const second = graph.insertNode({ before: first.id }, "relu", [first.outputs[0]], [
      graph.typeOf(x),
    ]);
    graph.registerOutput(second.outputs[0]);
    expect(() => checkGraph(graph)).toThrow(GraphInvariantError);
  });
});

describe("nested blocks", () => {
  function ifGraph() {
    const graph = new Graph();
    const cond = graph.addGraphInput(BOOL_TYPE, "cond");
    const x = graph.addGraphInput(tensorType({ sizes: [2] }), "x");
    const ifNode = graph.insertNode({ block: graph.topBlock }, IF_OP, [cond], [graph.typeOf(x)]);
    const thenBlock = graph.addBlock(ifNode.id);
    const elseBlock = graph.addBlock(ifNode.id);
    const relu = graph.insertNode({ block: thenBlock }, "relu", [x], [graph.typeOf(x)]);
    graph.setBlockReturns(thenBlock, [relu.outputs[0]]);
    graph.setBlockReturns(elseBlock, [x]);
    graph.registerOutput(ifNode.outputs[0]);
    return { graph, x, ifNode, thenBlock, elseBlock };
  }

  it("lets nested blocks read values of the enclosing block", () => {
    const { graph } = ifGraph();
    expect(() => checkGraph(graph)).not.toThrow();
  });

  it("lists nested blocks before their owner", () => {
    const { graph, thenBlock, elseBlock } = ifGraph();
    expect(collectBlocks(graph)).toEqual([thenBlock, elseBlock, graph.topBlock]);
  });

  it("releases nested uses when the owning node is destroyed", () => {
    const { graph, x, ifNode } = ifGraph();
    graph.setBlockReturns(graph.topBlock, [x]);
    expect(eliminateDeadCode(graph)).toBe(1);
    expect(graph.hasNode(ifNode.id)).toBe(false);
    expect(graph.getValue(x).uses).toHaveLength(1);
    checkGraph(graph);
  });
});
