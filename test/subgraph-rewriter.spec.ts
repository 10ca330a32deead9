import { describe, expect, it } from "vitest";

import { PatternArityError } from "../src/engine/engine-errors";
import { checkGraph, Graph } from "../src/engine/ir";
import { countOps } from "../src/engine/ir-print";
import { tensorType } from "../src/engine/ir-types";
import { findMatches, matchValue } from "../src/engine/rewrite/matcher";
import { constantNode, opNode, type Pattern } from "../src/engine/rewrite/pattern";
import { SubgraphRewriter } from "../src/engine/rewrite/subgraph-rewriter";
import { TraceRecorder } from "../src/engine/trace";

const doubleRelu: Pattern = {
  params: ["x"],
  nodes: [opNode("relu", ["x"], "inner"), opNode("relu", ["inner"], "res")],
  output: "res",
};

const singleRelu: Pattern = {
  params: ["x"],
  nodes: [opNode("relu", ["x"], "res")],
  output: "res",
};

function reluChain(length: number) {
  const graph = new Graph();
  const x = graph.addGraphInput(tensorType({ sizes: [4] }), "x");
  const values = [x];
  for (let i = 0; i < length; i++) {
    const prev = values[values.length - 1];
    values.push(graph.insertNode({ block: graph.topBlock }, "relu", [prev], [graph.typeOf(x)]).outputs[0]);
  }
  graph.registerOutput(values[values.length - 1]);
  return { graph, values };
}

describe("findMatches", () => {
  it("binds pattern names to graph values", () => {
    const { graph, values } = reluChain(2);
    const matches = findMatches(graph, doubleRelu);
    expect(matches).toHaveLength(1);
    expect(matchValue(matches[0], "x")).toBe(values[0]);
    expect(matchValue(matches[0], "inner")).toBe(values[1]);
    expect(matchValue(matches[0], "res")).toBe(values[2]);
    expect(() => matchValue(matches[0], "missing")).toThrow(/no binding/);
  });

  it("does not let matches overlap", () => {
    const { graph } = reluChain(3);
    expect(findMatches(graph, doubleRelu)).toHaveLength(1);
  });

  it("requires internal values to have no outside uses", () => {
    const { graph, values } = reluChain(2);
    graph.registerOutput(values[1]);
    expect(findMatches(graph, doubleRelu)).toEqual([]);
  });

  it("compares constant literals", () => {
    const graph = new Graph();
    const x = graph.addGraphInput(tensorType({ sizes: [4] }));
    const slope = graph.insertConstant({ kind: "float", value: 0.5 }, { block: graph.topBlock });
    const out = graph.insertNode({ block: graph.topBlock }, "leaky_relu", [x, slope], [
      graph.typeOf(x),
    ]);
    graph.registerOutput(out.outputs[0]);
    const pattern = (value: number): Pattern => ({
      params: ["x"],
      nodes: [
        constantNode("slope", { kind: "float", value }),
        opNode("leaky_relu", ["x", "slope"], "res"),
      ],
      output: "res",
    });
    expect(findMatches(graph, pattern(0.5))).toHaveLength(1);
    expect(findMatches(graph, pattern(0.25))).toEqual([]);
  });

  it("applies the filter after the structural match", () => {
    const { graph } = reluChain(2);
    expect(findMatches(graph, doubleRelu, () => false)).toEqual([]);
  });
});

describe("SubgraphRewriter", () => {
  it("replaces a match and destroys the matched nodes", () => {
    const trace = new TraceRecorder();
    const { graph, values } = reluChain(3);
    const rewriter = new SubgraphRewriter();
    rewriter.registerRewritePattern(doubleRelu, singleRelu, "relu_relu");
    const anchor = graph.producerOf(values[2]);

    expect(rewriter.runOnGraph(graph, undefined, { trace })).toBe(1);
    checkGraph(graph);
    expect(countOps(graph).get("relu")).toBe(2);
    expect(graph.hasValue(values[1])).toBe(false);
    expect(graph.hasValue(values[2])).toBe(false);
    expect(trace.snapshot()).toEqual([
      { type: "pattern_rewritten", pattern: "relu_relu", anchorNodeId: anchor?.id },
    ]);
  });

  it("keeps the matched output type on an untyped replacement output", () => {
    const { graph } = reluChain(2);
    const rewriter = new SubgraphRewriter();
    rewriter.registerRewritePattern(doubleRelu, singleRelu);
    rewriter.runOnGraph(graph);
    expect(graph.typeOf(graph.outputs[0])).toEqual(tensorType({ sizes: [4] }));
  });

  it("rejects pattern pairs whose parameters differ", () => {
    const rewriter = new SubgraphRewriter();
    const renamed: Pattern = { ...singleRelu, params: ["y"], nodes: [opNode("relu", ["y"], "res")] };
    expect(() => rewriter.registerRewritePattern(doubleRelu, renamed)).toThrow(PatternArityError);
    expect(rewriter.patternCount).toBe(0);
  });

  it("rejects a match pattern with an unused parameter", () => {
    const rewriter = new SubgraphRewriter();
    const unused: Pattern = { ...doubleRelu, params: ["x", "y"] };
    expect(() =>
      rewriter.registerRewritePattern(unused, { ...singleRelu, params: ["x", "y"] }),
    ).toThrow(/never used/);
  });

  it("rejects an untyped local node in a replacement", () => {
    const rewriter = new SubgraphRewriter();
    const untyped: Pattern = {
      params: ["x"],
      nodes: [opNode("relu", ["x"], "tmp"), opNode("relu", ["tmp"], "res")],
      output: "res",
    };
    expect(() => rewriter.registerRewritePattern(doubleRelu, untyped)).toThrow(
      /needs an output type/,
    );
  });
});
