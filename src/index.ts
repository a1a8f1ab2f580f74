export {
  aten,
  Block,
  Graph,
  Node,
  type NodeKind,
  prim,
  type Use,
  Value,
} from "./ir/graph";
export {
  insertConstant,
  isConstant,
  isLiteralValue,
  toIValue,
  tryInsertConstant,
} from "./ir/constants";
export { lintGraph } from "./ir/lint";
export { printGraph } from "./ir/printer";
export {
  Device,
  type IValue,
  isModule,
  isTensor,
  ivaluesEqual,
  ivalueToString,
  OpaqueObject,
  Tuple,
} from "./jit/ivalue";
export {
  DuplicateAttributeError,
  GraphLintError,
  IRInvariantError,
  MissingMethodError,
  NotAModuleError,
  RecursiveInlineError,
  ScriptRuntimeError,
  UninitializedAttributeError,
  UnknownAttributeError,
} from "./jit/jit-errors";
export {
  graphDebug,
  graphDump,
  graphUpdate,
  isJitLogEnabled,
  type JitLogLevel,
  type JitLogPass,
  parseJitLogLevels,
} from "./jit/jit-log";
export { type ModuleHandle, ScriptModule } from "./jit/module";
export {
  BoolT,
  ClassType,
  DeviceT,
  FloatT,
  IntT,
  isClassType,
  isModuleType,
  type JitType,
  listType,
  type Method,
  NoneT,
  opaqueType,
  StringT,
  TensorT,
  tupleType,
  typesEqual,
  typeToString,
} from "./jit/types";
export { inlineCalls } from "./passes/inliner";
export {
  eliminateCommonSubexpressions,
  eliminateDeadCode,
  mayRaise,
  type OptimizeOptions,
  type OptimizeResult,
  poolConstants,
  propagateConstants,
  runOptimization,
} from "./passes/optimize";
export { type RunOptions, runGraph } from "./runtime/interpreter";
export { type DType, Tensor, type TensorCreateOptions } from "./runtime/tensor";
export * from "./freeze";
