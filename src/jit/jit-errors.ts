export class MissingMethodError extends Error {
  name = "MissingMethodError";

  constructor(
    readonly typeName: string,
    readonly methodName: string,
  ) {
    super(`Module '${typeName}' has no method '${methodName}'`);
  }
}

export class UnknownAttributeError extends Error {
  name = "UnknownAttributeError";

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
  ) {
    super(`Module '${typeName}' has no attribute '${attributeName}'`);
  }
}

export class DuplicateAttributeError extends Error {
  name = "DuplicateAttributeError";

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
  ) {
    super(`${typeName} already has an attribute named '${attributeName}'`);
  }
}

export class UninitializedAttributeError extends Error {
  name = "UninitializedAttributeError";

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
  ) {
    super(`attribute '${attributeName}' of ${typeName} was never initialized`);
  }
}

export class NotAModuleError extends Error {
  name = "NotAModuleError";

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
  ) {
    super(`attribute '${attributeName}' of ${typeName} is not a module`);
  }
}

export class RecursiveInlineError extends Error {
  name = "RecursiveInlineError";
}

export class ScriptRuntimeError extends Error {
  name = "ScriptRuntimeError";
}

export class GraphLintError extends Error {
  name = "GraphLintError";
}

export class IRInvariantError extends Error {
  name = "IRInvariantError";
}
