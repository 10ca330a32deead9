import type { PackedConvHandle } from "../backend/cpu/conv-context";
import type { Tensor } from "../backend/cpu/numeric";
import type { DeviceKind, DType } from "../backend/types";
import { IValueMismatchError } from "./engine-errors";

// ============================================================================
// Static types carried by IR values
// ============================================================================

export type TensorType = {
  kind: "tensor";
  /** Logical sizes; null marks an unknown dimension */
  sizes?: (number | null)[];
  /** Element strides; null marks an unknown stride */
  strides?: (number | null)[];
  device?: DeviceKind;
  dtype?: DType;
};

export type IRType =
  | TensorType
  | { kind: "int" }
  | { kind: "float" }
  | { kind: "bool" }
  | { kind: "str" }
  | { kind: "none" }
  | { kind: "int_list" }
  | { kind: "scalar_list" }
  | { kind: "optional"; elem: IRType }
  | { kind: "packed_conv" };

export const INT_TYPE: IRType = { kind: "int" };
export const FLOAT_TYPE: IRType = { kind: "float" };
export const BOOL_TYPE: IRType = { kind: "bool" };
export const STR_TYPE: IRType = { kind: "str" };
export const NONE_TYPE: IRType = { kind: "none" };
export const INT_LIST_TYPE: IRType = { kind: "int_list" };
export const SCALAR_LIST_TYPE: IRType = { kind: "scalar_list" };
export const OPTIONAL_STR_TYPE: IRType = { kind: "optional", elem: STR_TYPE };
export const PACKED_CONV_TYPE: IRType = { kind: "packed_conv" };

export function tensorType(init: Omit<TensorType, "kind"> = {}): TensorType {
  return { kind: "tensor", ...init };
}

export function isTensorType(type: IRType): type is TensorType {
  return type.kind === "tensor";
}

export function typeToString(type: IRType): string {
  switch (type.kind) {
    case "tensor": {
      const parts: string[] = [];
      if (type.sizes) parts.push(`[${type.sizes.map((d) => d ?? "*").join(", ")}]`);
      if (type.strides) parts.push(`strides=[${type.strides.map((d) => d ?? "*").join(", ")}]`);
      if (type.dtype) parts.push(type.dtype);
      if (type.device) parts.push(type.device);
      return parts.length > 0 ? `Tensor(${parts.join(", ")})` : "Tensor";
    }
    case "int_list":
      return "int[]";
    case "scalar_list":
      return "Scalar?[]";
    case "optional":
      return `${typeToString(type.elem)}?`;
    case "packed_conv":
      return "ConvOpContext";
    default:
      return type.kind;
  }
}

// ============================================================================
// Runtime and literal values
// ============================================================================

export type IValue =
  | { kind: "tensor"; tensor: Tensor }
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "str"; value: string }
  | { kind: "none" }
  | { kind: "int_list"; value: number[] }
  | { kind: "scalar_list"; value: (number | null)[] }
  | { kind: "packed"; handle: PackedConvHandle };

export const NONE_VALUE: IValue = { kind: "none" };

export function ivalueType(value: IValue): IRType {
  switch (value.kind) {
    case "tensor":
      return tensorType({ sizes: value.tensor.shape.slice(), dtype: "f32", device: "cpu" });
    case "packed":
      return PACKED_CONV_TYPE;
    case "int":
      return INT_TYPE;
    case "float":
      return FLOAT_TYPE;
    case "bool":
      return BOOL_TYPE;
    case "str":
      return STR_TYPE;
    case "none":
      return NONE_TYPE;
    case "int_list":
      return INT_LIST_TYPE;
    case "scalar_list":
      return SCALAR_LIST_TYPE;
  }
}

function listsEqual<T>(a: T[], b: T[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Literal equality. Tensors and packed handles compare by identity.
 */
export function ivaluesEqual(a: IValue, b: IValue): boolean {
  switch (a.kind) {
    case "tensor":
      return b.kind === "tensor" && a.tensor === b.tensor;
    case "packed":
      return b.kind === "packed" && a.handle === b.handle;
    case "none":
      return b.kind === "none";
    case "int_list":
      return b.kind === "int_list" && listsEqual(a.value, b.value);
    case "scalar_list":
      return b.kind === "scalar_list" && listsEqual(a.value, b.value);
    default:
      return b.kind === a.kind && "value" in b && b.value === a.value;
  }
}

function formatNumber(value: number, isFloat: boolean): string {
  return isFloat && Number.isInteger(value) ? `${value}.` : String(value);
}

export function formatIValue(value: IValue): string {
  switch (value.kind) {
    case "tensor":
      return `<Tensor [${value.tensor.shape.join(", ")}]>`;
    case "packed":
      return `<ConvOpContext attr=${value.handle.context.attr} ${value.handle.kind}>`;
    case "none":
      return "None";
    case "str":
      return JSON.stringify(value.value);
    case "float":
      return formatNumber(value.value, true);
    case "int_list":
      return `[${value.value.join(", ")}]`;
    case "scalar_list":
      return `[${value.value.map((v) => (v === null ? "None" : String(v))).join(", ")}]`;
    default:
      return String(value.value);
  }
}

// ============================================================================
// Accessors used by kernels
// ============================================================================

function mismatch(expected: string, got: IValue, what: string): IValueMismatchError {
  return new IValueMismatchError(`${what}: expected ${expected}, got ${got.kind}`);
}

export function expectTensor(value: IValue, what: string): Tensor {
  if (value.kind !== "tensor") throw mismatch("tensor", value, what);
  return value.tensor;
}

export function expectOptionalTensor(value: IValue, what: string): Tensor | null {
  if (value.kind === "none") return null;
  return expectTensor(value, what);
}

export function expectInt(value: IValue, what: string): number {
  if (value.kind !== "int") throw mismatch("int", value, what);
  return value.value;
}

export function expectBool(value: IValue, what: string): boolean {
  if (value.kind !== "bool") throw mismatch("bool", value, what);
  return value.value;
}

/** int or float */
export function expectScalar(value: IValue, what: string): number {
  if (value.kind !== "int" && value.kind !== "float") throw mismatch("scalar", value, what);
  return value.value;
}

export function expectStr(value: IValue, what: string): string {
  if (value.kind !== "str") throw mismatch("str", value, what);
  return value.value;
}

export function expectOptionalStr(value: IValue, what: string): string | null {
  if (value.kind === "none") return null;
  return expectStr(value, what);
}

export function expectIntList(value: IValue, what: string): number[] {
  if (value.kind !== "int_list") throw mismatch("int[]", value, what);
  return value.value;
}

export function expectScalarList(value: IValue, what: string): (number | null)[] {
  if (value.kind !== "scalar_list") throw mismatch("Scalar?[]", value, what);
  return value.value;
}

export function expectPacked(value: IValue, what: string): PackedConvHandle {
  if (value.kind !== "packed") throw mismatch("ConvOpContext", value, what);
  return value.handle;
}
