import { CONSTANT_OP, type Graph } from "./ir";
import { formatIValue, typeToString } from "./ir-types";

/**
 * Render a graph as text. Values are renamed %0, %1, ... in definition
 * order, so two isomorphic graphs print identically regardless of the ids
 * the arena handed out.
 */
export function printGraph(graph: Graph): string {
  const names = new Map<number, string>();
  const nameOf = (valueId: number): string => {
    const existing = names.get(valueId);
    if (existing !== undefined) return existing;
    const name = `%${names.size}`;
    names.set(valueId, name);
    return name;
  };
  const declare = (valueId: number): string =>
    `${nameOf(valueId)} : ${typeToString(graph.typeOf(valueId))}`;

  const lines: string[] = [];
  const printBlock = (blockId: number, indent: string): void => {
    for (const node of graph.nodesOf(blockId)) {
      const outputs = node.outputs.map(declare).join(", ");
      const attr =
        node.op === CONSTANT_OP && node.value !== undefined
          ? `[value=${formatIValue(node.value)}]`
          : "";
      const call = `${node.op}${attr}(${node.inputs.map(nameOf).join(", ")})`;
      lines.push(`${indent}${outputs.length > 0 ? `${outputs} = ` : ""}${call}`);
      node.blocks.forEach((child, index) => {
        const params = graph.getBlock(child).params.map(declare).join(", ");
        lines.push(`${indent}  block${index}(${params}):`);
        printBlock(child, `${indent}    `);
      });
    }
    lines.push(`${indent}-> (${graph.blockReturns(blockId).map(nameOf).join(", ")})`);
  };

  const header = graph.inputs.map(declare).join(", ");
  lines.push(`graph(${header}):`);
  printBlock(graph.topBlock, "  ");
  return lines.join("\n");
}

/**
 * Count live nodes per op, across nested blocks.
 */
export function countOps(graph: Graph): Map<string, number> {
  const counts = new Map<string, number>();
  const walk = (blockId: number): void => {
    for (const node of graph.nodesOf(blockId)) {
      counts.set(node.op, (counts.get(node.op) ?? 0) + 1);
      for (const child of node.blocks) walk(child);
    }
  };
  walk(graph.topBlock);
  return counts;
}
