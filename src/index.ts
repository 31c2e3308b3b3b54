// src/index.ts
// tailscheme - Public API
//
// Interface for the CLI, embedding hosts and tests.

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & ENVIRONMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Value,
  IntVal,
  FloatVal,
  NumVal,
  SymVal,
  BoolVal,
  ListVal,
  UnitVal,
  ClosureVal,
  NativeVal,
  NativeFn,
  NativeHost,
} from "./core/eval/values";
export {
  VUnit,
  VTrue,
  VFalse,
  int,
  float,
  sym,
  bool,
  list,
  native,
  isNumber,
  isProcedure,
  isUnit,
  isTruthy,
  valuesEqual,
} from "./core/eval/values";
export { Environment, type Binding } from "./core/eval/env";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export type { Expr } from "./core/ast";
export { classify } from "./core/eval/classify";
export {
  Evaluator,
  evaluate,
  applyProcedure,
  DEFAULT_EVAL_OPTIONS,
  type EvalOptions,
} from "./core/eval/evaluate";
export { standardEnvironment, globalEnvironment, type StandardEnvOptions } from "./core/prims";

// ═══════════════════════════════════════════════════════════════════════════════
// READER & PRINTER
// ═══════════════════════════════════════════════════════════════════════════════

export { tokenize, TokenReader, parse, parseAll, parseAtom, readFromTokens } from "./core/reader";
export { sexpToString, floatToString } from "./core/sexp";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  InterpreterError,
  ReaderError,
  UnexpectedCloseParen,
  UnexpectedEndOfSource,
  EvaluatorError,
  UnboundVariable,
  InvalidSyntax,
  PrimitiveInvocationError,
  type PrimitiveFailure,
} from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// RUNNER & REPL
// ═══════════════════════════════════════════════════════════════════════════════

export {
  run,
  runLines,
  runFile,
  envFromArgs,
  sessionEnvironment,
  type RunOptions,
  type TextReader,
} from "./core/run";
export {
  multilineInput,
  multilineRepl,
  QuitRequest,
  EndOfInput,
  type InputFn,
  type ReplOptions,
} from "./repl/repl";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfigs,
  validateConfig,
  type TailschemeConfig,
  type PartialConfig,
} from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export type { TraceEvent, TraceSink } from "./ports/types";
export { NULL_TRACE } from "./ports/types";
export {
  loggingPrimitive,
  withPrimitiveLogging,
  consoleTrace,
  collectingTrace,
  formatTraceEvent,
} from "./adapters/logging";
