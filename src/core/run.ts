// src/core/run.ts
// Batch execution: source text in, values out.

import type { Binding, Environment } from "./eval/env";
import type { Value } from "./eval/values";
import { VUnit } from "./eval/values";
import type { EvalOptions } from "./eval/evaluate";
import { Evaluator } from "./eval/evaluate";
import type { StandardEnvOptions } from "./prims";
import { standardEnvironment } from "./prims";
import { TokenReader, parseAtom, tokenize } from "./reader";
import { NULL_TRACE } from "../ports/types";
import { withPrimitiveLogging } from "../adapters/logging";

export type RunOptions = Partial<EvalOptions> & StandardEnvOptions;

/** Anything with a `read()` returning the whole text, e.g. a file wrapper. */
export interface TextReader {
  read(): string;
}

/**
 * Global environment for one program or REPL session. With a trace sink,
 * every primitive in the standard frame reports its calls to it.
 */
export function sessionEnvironment(overrides: Iterable<Binding> = [], options: RunOptions = {}): Environment {
  const standard = standardEnvironment({ output: options.output });
  if (options.trace && options.trace !== NULL_TRACE) withPrimitiveLogging(standard, options.trace);
  return standard.extend(overrides);
}

/**
 * Evaluate every expression in `source`, in order, in one fresh global
 * environment. Yields each result as it is produced.
 */
export function* runLines(
  source: string,
  overrides: Iterable<Binding> = [],
  options: RunOptions = {}
): Generator<Value, void, undefined> {
  const env = sessionEnvironment(overrides, options);
  const evaluator = new Evaluator(options);
  const reader = new TokenReader(tokenize(source));
  while (!reader.done) {
    yield evaluator.evaluate(reader.read(), env);
  }
}

/** Result of the last expression; the no-value sentinel for empty source. */
export function run(source: string, overrides: Iterable<Binding> = [], options: RunOptions = {}): Value {
  let result: Value = VUnit;
  for (const value of runLines(source, overrides, options)) result = value;
  return result;
}

export function runFile(reader: TextReader, overrides: Iterable<Binding> = [], options: RunOptions = {}): Value {
  return run(reader.read(), overrides, options);
}

/**
 * Bindings from `name=value` command-line arguments. Arguments without
 * exactly one `=`, or with an empty side, are skipped.
 */
export function envFromArgs(args: readonly string[]): Binding[] {
  const bindings: Binding[] = [];
  for (const arg of args) {
    const parts = arg.split("=");
    if (parts.length !== 2) continue;
    const [name, raw] = parts;
    if (!name || !raw) continue;
    bindings.push([name, parseAtom(raw)]);
  }
  return bindings;
}
