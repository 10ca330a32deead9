import { GraphInvariantError } from "./engine-errors";
import { type IRType, type IValue, ivalueType } from "./ir-types";

// ============================================================================
// Graph IR
// Nodes, values and blocks live in an arena keyed by stable integer ids.
// Values record their uses; a node can only be destroyed once its inputs
// are cleared and none of its outputs is used.
// ============================================================================

export type Use = {
  /** Consuming node (may be a block's return node) */
  node: number;
  /** Input slot on the consuming node */
  index: number;
};

export type ValueProducer =
  | { kind: "node"; node: number; index: number }
  | { kind: "param"; block: number; index: number };

export type IRValue = {
  id: number;
  type: IRType;
  producer: ValueProducer;
  uses: Use[];
  debugName?: string;
};

export type IRNode = {
  id: number;
  op: string;
  inputs: number[];
  outputs: number[];
  blocks: number[];
  owningBlock: number;
  /** Literal carried by "constant" nodes */
  value?: IValue;
};

export type IRBlock = {
  id: number;
  /** Node owning this block, null for the top-level block */
  owningNode: number | null;
  params: number[];
  /** Nodes in program order, excluding the return node */
  nodes: number[];
  /** Node whose inputs are the block outputs */
  returnNode: number;
};

export type InsertPoint = { before: number } | { block: number };

export const CONSTANT_OP = "constant";
export const RETURN_OP = "return";
export const IF_OP = "if";

export class Graph {
  private nextId = 1;
  private readonly nodeMap = new Map<number, IRNode>();
  private readonly valueMap = new Map<number, IRValue>();
  private readonly blockMap = new Map<number, IRBlock>();
  readonly topBlock: number;

  constructor() {
    this.topBlock = this.createBlock(null);
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  getNode(id: number): IRNode {
    const node = this.nodeMap.get(id);
    if (!node) throw new GraphInvariantError(`unknown node ${id}`);
    return node;
  }

  getValue(id: number): IRValue {
    const value = this.valueMap.get(id);
    if (!value) throw new GraphInvariantError(`unknown value ${id}`);
    return value;
  }

  getBlock(id: number): IRBlock {
    const block = this.blockMap.get(id);
    if (!block) throw new GraphInvariantError(`unknown block ${id}`);
    return block;
  }

  hasNode(id: number): boolean {
    return this.nodeMap.has(id);
  }

  hasValue(id: number): boolean {
    return this.valueMap.has(id);
  }

  get inputs(): number[] {
    return this.getBlock(this.topBlock).params.slice();
  }

  get outputs(): number[] {
    return this.blockReturns(this.topBlock);
  }

  /** Snapshot of a block's nodes in program order. */
  nodesOf(blockId: number): IRNode[] {
    return this.getBlock(blockId).nodes.map((id) => this.getNode(id));
  }

  blockReturns(blockId: number): number[] {
    return this.getNode(this.getBlock(blockId).returnNode).inputs.slice();
  }

  typeOf(valueId: number): IRType {
    return this.getValue(valueId).type;
  }

  producerOf(valueId: number): IRNode | undefined {
    const { producer } = this.getValue(valueId);
    return producer.kind === "node" ? this.getNode(producer.node) : undefined;
  }

  /** Literal behind a value, when a constant node produces it. */
  constantValue(valueId: number): IValue | undefined {
    const producer = this.producerOf(valueId);
    return producer?.op === CONSTANT_OP ? producer.value : undefined;
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  addGraphInput(type: IRType, debugName?: string): number {
    return this.addBlockParam(this.topBlock, type, debugName);
  }

  registerOutput(valueId: number): void {
    this.addNodeInput(this.getBlock(this.topBlock).returnNode, valueId);
  }

  addBlock(nodeId: number): number {
    const node = this.getNode(nodeId);
    const blockId = this.createBlock(nodeId);
    node.blocks.push(blockId);
    return blockId;
  }

  addBlockParam(blockId: number, type: IRType, debugName?: string): number {
    const block = this.getBlock(blockId);
    const id = this.allocValue(type, { kind: "param", block: blockId, index: block.params.length });
    if (debugName !== undefined) this.getValue(id).debugName = debugName;
    block.params.push(id);
    return id;
  }

  setBlockReturns(blockId: number, values: number[]): void {
    const returnNode = this.getBlock(blockId).returnNode;
    this.removeAllInputs(returnNode);
    for (const value of values) {
      this.addNodeInput(returnNode, value);
    }
  }

  /**
   * Create a node with the given inputs and output types and place it.
   */
  insertNode(
    at: InsertPoint,
    op: string,
    inputs: number[],
    outputTypes: IRType[],
    value?: IValue,
  ): IRNode {
    const blockId = "block" in at ? at.block : this.getNode(at.before).owningBlock;
    const block = this.getBlock(blockId);
    const node: IRNode = {
      id: this.nextId++,
      op,
      inputs: [],
      outputs: [],
      blocks: [],
      owningBlock: blockId,
    };
    if (value !== undefined) node.value = value;
    this.nodeMap.set(node.id, node);
    if ("block" in at) {
      block.nodes.push(node.id);
    } else {
      const position = block.nodes.indexOf(at.before);
      if (position < 0) {
        throw new GraphInvariantError(`node ${at.before} is not in block ${blockId}`);
      }
      block.nodes.splice(position, 0, node.id);
    }
    for (const input of inputs) {
      this.addNodeInput(node.id, input);
    }
    outputTypes.forEach((type, index) => {
      node.outputs.push(this.allocValue(type, { kind: "node", node: node.id, index }));
    });
    return node;
  }

  /**
   * Insert a constant node and return its output value.
   */
  insertConstant(value: IValue, at: InsertPoint, type: IRType = ivalueType(value)): number {
    return this.insertNode(at, CONSTANT_OP, [], [type], value).outputs[0];
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  addNodeInput(nodeId: number, valueId: number): void {
    const node = this.getNode(nodeId);
    const value = this.getValue(valueId);
    value.uses.push({ node: nodeId, index: node.inputs.length });
    node.inputs.push(valueId);
  }

  removeAllInputs(nodeId: number): void {
    const node = this.getNode(nodeId);
    for (const valueId of new Set(node.inputs)) {
      const value = this.getValue(valueId);
      value.uses = value.uses.filter((use) => use.node !== nodeId);
    }
    node.inputs = [];
  }

  replaceAllUsesWith(from: number, to: number): void {
    if (from === to) return;
    const source = this.getValue(from);
    const target = this.getValue(to);
    for (const use of source.uses) {
      this.getNode(use.node).inputs[use.index] = to;
      target.uses.push(use);
    }
    source.uses = [];
  }

  /**
   * Remove a node from the graph. Its inputs must already be cleared and
   * none of its outputs may still be used.
   */
  destroyNode(nodeId: number): void {
    const node = this.getNode(nodeId);
    if (node.op === RETURN_OP) {
      throw new GraphInvariantError(`return node ${nodeId} cannot be destroyed`);
    }
    if (node.inputs.length > 0) {
      throw new GraphInvariantError(`node ${nodeId} (${node.op}) still has inputs`);
    }
    for (const output of node.outputs) {
      if (this.getValue(output).uses.length > 0) {
        throw new GraphInvariantError(
          `node ${nodeId} (${node.op}) output ${output} still has uses`,
        );
      }
    }
    for (const blockId of node.blocks) {
      this.releaseBlockInputs(blockId);
    }
    for (const blockId of node.blocks) {
      this.deleteBlock(blockId);
    }
    const owner = this.getBlock(node.owningBlock);
    owner.nodes = owner.nodes.filter((id) => id !== nodeId);
    for (const output of node.outputs) {
      this.valueMap.delete(output);
    }
    this.nodeMap.delete(nodeId);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private allocValue(type: IRType, producer: ValueProducer): number {
    const id = this.nextId++;
    this.valueMap.set(id, { id, type, producer, uses: [] });
    return id;
  }

  private createBlock(owningNode: number | null): number {
    const id = this.nextId++;
    const returnNode: IRNode = {
      id: this.nextId++,
      op: RETURN_OP,
      inputs: [],
      outputs: [],
      blocks: [],
      owningBlock: id,
    };
    this.nodeMap.set(returnNode.id, returnNode);
    this.blockMap.set(id, { id, owningNode, params: [], nodes: [], returnNode: returnNode.id });
    return id;
  }

  private releaseBlockInputs(blockId: number): void {
    const block = this.getBlock(blockId);
    for (const nodeId of [...block.nodes, block.returnNode]) {
      const node = this.getNode(nodeId);
      for (const child of node.blocks) this.releaseBlockInputs(child);
      this.removeAllInputs(nodeId);
    }
  }

  private deleteBlock(blockId: number): void {
    const block = this.getBlock(blockId);
    for (const nodeId of block.nodes) {
      const node = this.getNode(nodeId);
      for (const child of node.blocks) this.deleteBlock(child);
      for (const output of node.outputs) this.valueMap.delete(output);
      this.nodeMap.delete(nodeId);
    }
    for (const param of block.params) this.valueMap.delete(param);
    this.nodeMap.delete(block.returnNode);
    this.blockMap.delete(blockId);
  }
}

/**
 * Verify use-def consistency and that every input is defined before use in
 * its own or an enclosing block.
 */
export function checkGraph(graph: Graph): void {
  const visible = new Set<number>();
  const checkInputs = (node: IRNode): void => {
    node.inputs.forEach((valueId, index) => {
      if (!graph.hasValue(valueId) || !visible.has(valueId)) {
        throw new GraphInvariantError(
          `node ${node.id} (${node.op}) input ${index} uses value ${valueId} before its definition`,
        );
      }
      const recorded = graph.getValue(valueId).uses.some(
        (use) => use.node === node.id && use.index === index,
      );
      if (!recorded) {
        throw new GraphInvariantError(
          `value ${valueId} is missing the use by node ${node.id} slot ${index}`,
        );
      }
    });
  };
  const walk = (blockId: number): void => {
    const block = graph.getBlock(blockId);
    const defined: number[] = [...block.params];
    for (const param of block.params) visible.add(param);
    for (const node of graph.nodesOf(blockId)) {
      checkInputs(node);
      for (const child of node.blocks) walk(child);
      for (const output of node.outputs) {
        for (const use of graph.getValue(output).uses) {
          if (!graph.hasNode(use.node) || graph.getNode(use.node).inputs[use.index] !== output) {
            throw new GraphInvariantError(`value ${output} records a stale use`);
          }
        }
        visible.add(output);
        defined.push(output);
      }
    }
    checkInputs(graph.getNode(block.returnNode));
    for (const id of defined) visible.delete(id);
  };
  walk(graph.topBlock);
}
