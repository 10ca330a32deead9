import {
  createPackedConv,
  runPackedConv,
  runPackedConvSum,
} from "../backend/cpu/conv-context";
import {
  add,
  conv2d,
  gelu,
  hardtanh,
  leakyRelu,
  mapUnary,
  relu,
  type Tensor,
} from "../backend/cpu/numeric";
import { UnsupportedOpError } from "./engine-errors";
import { CONSTANT_OP, type Graph, IF_OP, type IRNode } from "./ir";
import {
  expectBool,
  expectInt,
  expectIntList,
  expectOptionalStr,
  expectOptionalTensor,
  expectPacked,
  expectScalar,
  expectScalarList,
  expectStr,
  expectTensor,
  type IValue,
} from "./ir-types";

// ============================================================================
// Op registry
// ============================================================================

export type OpKernel = {
  /** Whether constant propagation may evaluate the op at compile time */
  pure: boolean;
  run(inputs: IValue[]): IValue[];
};

const kernels = new Map<string, OpKernel>();

export function registerOpKernel(op: string, kernel: OpKernel): void {
  kernels.set(op, kernel);
}

export function getOpKernel(op: string): OpKernel | undefined {
  return kernels.get(op);
}

function tensorOut(tensor: Tensor): IValue[] {
  return [{ kind: "tensor", tensor }];
}

function unaryKernel(
  op: string,
  arity: number,
  fn: (inputs: IValue[]) => (x: number) => number,
): OpKernel {
  return {
    pure: true,
    run(inputs) {
      checkArity(op, inputs, arity);
      return tensorOut(mapUnary(expectTensor(inputs[0], `${op} input`), fn(inputs)));
    },
  };
}

function checkArity(op: string, inputs: IValue[], arity: number): void {
  if (inputs.length !== arity) {
    throw new UnsupportedOpError(`${op} takes ${arity} inputs, got ${inputs.length}`);
  }
}

function convParams(op: string, inputs: IValue[], groupsIndex: number) {
  return {
    stride: expectIntList(inputs[3], `${op} stride`),
    padding: expectIntList(inputs[4], `${op} padding`),
    dilation: expectIntList(inputs[5], `${op} dilation`),
    groups: expectInt(inputs[groupsIndex], `${op} groups`),
  };
}

registerOpKernel("conv2d", {
  pure: true,
  run(inputs) {
    checkArity("conv2d", inputs, 7);
    return tensorOut(
      conv2d(
        expectTensor(inputs[0], "conv2d input"),
        expectTensor(inputs[1], "conv2d weight"),
        expectOptionalTensor(inputs[2], "conv2d bias"),
        convParams("conv2d", inputs, 6),
      ),
    );
  },
});

// input, weight, bias, stride, padding, dilation, transposed, output_padding,
// groups, benchmark, deterministic, cudnn_enabled, allow_tf32
registerOpKernel("_convolution", {
  pure: true,
  run(inputs) {
    checkArity("_convolution", inputs, 13);
    if (expectBool(inputs[6], "_convolution transposed")) {
      throw new UnsupportedOpError("transposed _convolution is not supported");
    }
    return tensorOut(
      conv2d(
        expectTensor(inputs[0], "_convolution input"),
        expectTensor(inputs[1], "_convolution weight"),
        expectOptionalTensor(inputs[2], "_convolution bias"),
        convParams("_convolution", inputs, 8),
      ),
    );
  },
});

registerOpKernel("add", {
  pure: true,
  run(inputs) {
    checkArity("add", inputs, 3);
    return tensorOut(
      add(
        expectTensor(inputs[0], "add self"),
        expectTensor(inputs[1], "add other"),
        expectScalar(inputs[2], "add alpha"),
      ),
    );
  },
});

registerOpKernel("relu", unaryKernel("relu", 1, () => relu));
registerOpKernel(
  "leaky_relu",
  unaryKernel("leaky_relu", 2, (inputs) => {
    const slope = expectScalar(inputs[1], "leaky_relu negative_slope");
    return (x) => leakyRelu(x, slope);
  }),
);
registerOpKernel(
  "hardtanh",
  unaryKernel("hardtanh", 3, (inputs) => {
    const minVal = expectScalar(inputs[1], "hardtanh min_val");
    const maxVal = expectScalar(inputs[2], "hardtanh max_val");
    return (x) => hardtanh(x, minVal, maxVal);
  }),
);
registerOpKernel(
  "gelu",
  unaryKernel("gelu", 2, (inputs) => {
    const approximate = expectStr(inputs[1], "gelu approximate");
    if (approximate !== "none" && approximate !== "tanh") {
      throw new UnsupportedOpError(`unsupported gelu approximation "${approximate}"`);
    }
    return (x) => gelu(x, approximate);
  }),
);

registerOpKernel("list_construct", {
  pure: true,
  run(inputs) {
    return [
      {
        kind: "scalar_list",
        value: inputs.map((input, i) =>
          input.kind === "none" ? null : expectScalar(input, `list_construct element ${i}`),
        ),
      },
    ];
  },
});

// weight, bias, stride, padding, dilation, groups, input_size, attr, scalars, algorithm
registerOpKernel("conv2d_prepack", {
  pure: false,
  run(inputs) {
    checkArity("conv2d_prepack", inputs, 10);
    const handle = createPackedConv({
      weight: expectTensor(inputs[0], "conv2d_prepack weight"),
      bias: expectOptionalTensor(inputs[1], "conv2d_prepack bias"),
      stride: expectIntList(inputs[2], "conv2d_prepack stride"),
      padding: expectIntList(inputs[3], "conv2d_prepack padding"),
      dilation: expectIntList(inputs[4], "conv2d_prepack dilation"),
      groups: expectInt(inputs[5], "conv2d_prepack groups"),
      inputSize: expectIntList(inputs[6], "conv2d_prepack input_size"),
      attr: expectStr(inputs[7], "conv2d_prepack attr"),
      scalars: expectScalarList(inputs[8], "conv2d_prepack scalars"),
      algorithm: expectOptionalStr(inputs[9], "conv2d_prepack algorithm"),
    });
    return [{ kind: "packed", handle }];
  },
});

registerOpKernel("conv2d_run", {
  pure: false,
  run(inputs) {
    checkArity("conv2d_run", inputs, 2);
    return tensorOut(
      runPackedConv(
        expectPacked(inputs[1], "conv2d_run packed"),
        expectTensor(inputs[0], "conv2d_run input"),
      ),
    );
  },
});

registerOpKernel("conv2d_sum_run", {
  pure: false,
  run(inputs) {
    checkArity("conv2d_sum_run", inputs, 3);
    return tensorOut(
      runPackedConvSum(
        expectPacked(inputs[2], "conv2d_sum_run packed"),
        expectTensor(inputs[0], "conv2d_sum_run input"),
        expectTensor(inputs[1], "conv2d_sum_run accumulator"),
      ),
    );
  },
});

// ============================================================================
// Evaluation
// ============================================================================

function evaluateNode(node: IRNode, inputs: IValue[]): IValue[] {
  const kernel = kernels.get(node.op);
  if (!kernel) {
    throw new UnsupportedOpError(`no kernel registered for op "${node.op}"`);
  }
  const outputs = kernel.run(inputs);
  if (outputs.length !== node.outputs.length) {
    throw new UnsupportedOpError(
      `op "${node.op}" produced ${outputs.length} outputs, node declares ${node.outputs.length}`,
    );
  }
  return outputs;
}

/**
 * Execute a graph on the CPU kernels and return its outputs.
 */
export function runGraph(graph: Graph, inputs: IValue[]): IValue[] {
  const params = graph.inputs;
  if (inputs.length !== params.length) {
    throw new UnsupportedOpError(
      `graph takes ${params.length} inputs, got ${inputs.length}`,
    );
  }
  const env = new Map<number, IValue>();
  params.forEach((id, i) => env.set(id, inputs[i]));

  const read = (valueId: number): IValue => {
    const value = env.get(valueId);
    if (value === undefined) {
      throw new UnsupportedOpError(`value ${valueId} read before it was computed`);
    }
    return value;
  };

  const runBlock = (blockId: number): IValue[] => {
    for (const node of graph.nodesOf(blockId)) {
      let outputs: IValue[];
      if (node.op === CONSTANT_OP && node.value !== undefined) {
        outputs = [node.value];
      } else if (node.op === IF_OP) {
        const taken = expectBool(read(node.inputs[0]), "if condition") ? 0 : 1;
        outputs = runBlock(node.blocks[taken]);
      } else {
        outputs = evaluateNode(node, node.inputs.map(read));
      }
      node.outputs.forEach((id, i) => env.set(id, outputs[i]));
    }
    return graph.blockReturns(blockId).map(read);
  };

  return runBlock(graph.topBlock);
}

/**
 * Evaluate a node whose inputs are all produced by constant nodes.
 * Returns null when some input is not constant; a kernel failure is
 * reported as `{ error }` rather than thrown.
 */
export function runNodeIfInputsAreConstant(
  graph: Graph,
  node: IRNode,
): { outputs: IValue[] } | { error: string } | null {
  const inputs: IValue[] = [];
  for (const input of node.inputs) {
    const value = graph.constantValue(input);
    if (value === undefined) return null;
    inputs.push(value);
  }
  const kernel = kernels.get(node.op);
  if (!kernel) return { error: `no kernel registered for op "${node.op}"` };
  try {
    return { outputs: kernel.run(inputs) };
  } catch (e) {
    return { error: e instanceof Error ? e.message : String(e) };
  }
}
