export class GraphInvariantError extends Error {
  name = "GraphInvariantError";
}

export class PatternArityError extends Error {
  name = "PatternArityError";
}

export class RuleTableError extends Error {
  name = "RuleTableError";
}

export class PrepackFoldError extends Error {
  name = "PrepackFoldError";
}

export class UnsupportedOpError extends Error {
  name = "UnsupportedOpError";
}

export class IValueMismatchError extends Error {
  name = "IValueMismatchError";
}
