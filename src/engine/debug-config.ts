import type { Graph } from "./ir";
import { printGraph } from "./ir-print";
import type { PassOptions } from "./trace";

const ENV_DEBUG =
  typeof process !== "undefined" && process.env?.PACKFUSE_DEBUG === "1";

export function isDebugEnabled(options: PassOptions = {}): boolean {
  return options.debug ?? ENV_DEBUG;
}

/**
 * Record a graph snapshot between pipeline stages. Printing only happens
 * when a recorder is attached or debug logging is on.
 */
export function graphDebug(graph: Graph, stage: string, options: PassOptions = {}): void {
  const debug = isDebugEnabled(options);
  if (!options.trace && !debug) return;
  const text = printGraph(graph);
  options.trace?.record({ type: "graph_debug", stage, graph: text });
  if (debug) console.log(`[graph-debug] ${stage}\n${text}`);
}

export function debugLog(message: string, options: PassOptions = {}): void {
  if (isDebugEnabled(options)) console.log(`[packfuse] ${message}`);
}
