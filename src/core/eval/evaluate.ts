// src/core/eval/evaluate.ts
// The evaluator: one loop over (form, env). Tail positions reassign the loop
// state; everything else recurses through `evaluate`.

import type { Environment } from "./env";
import type { ListVal, NativeHost, NativeVal, Value } from "./values";
import { VUnit, isTruthy, list } from "./values";
import type { TraceSink } from "../../ports/types";
import { NULL_TRACE } from "../../ports/types";
import type { Expr } from "../ast";
import { classify } from "./classify";
import { condForm, orForm, andForm } from "./forms";
import { applicationEnv, makeClosure } from "./procedure";
import { sexpToString } from "../sexp/sexp";
import {
  InterpreterError,
  InvalidSyntax,
  PrimitiveInvocationError,
  describeFailure,
} from "../errors";

export type EvalOptions = {
  /** Rewrite calls to closures in place instead of recursing. */
  tailCalls: boolean;
  trace: TraceSink;
};

export const DEFAULT_EVAL_OPTIONS: EvalOptions = {
  tailCalls: true,
  trace: NULL_TRACE,
};

/** Host stack exhaustion is never reported as a primitive failure. */
function isStackOverflow(err: unknown): boolean {
  return err instanceof RangeError && /call stack/i.test(err.message);
}

export class Evaluator implements NativeHost {
  private readonly options: EvalOptions;

  constructor(options: Partial<EvalOptions> = {}) {
    this.options = {
      tailCalls: options.tailCalls ?? DEFAULT_EVAL_OPTIONS.tailCalls,
      trace: options.trace ?? DEFAULT_EVAL_OPTIONS.trace,
    };
  }

  evaluate(x: Value, env: Environment): Value {
    let form: Expr = classify(x);

    for (;;) {
      switch (form.tag) {
        case "Lit":
          return form.value;

        case "Var":
          return env.lookup(form.name);

        case "Quote":
          return form.datum;

        case "If":
          form = classify(isTruthy(this.evaluate(form.test, env)) ? form.conseq : form.alt);
          continue;

        case "Define":
          env.define(form.name, this.evaluate(form.rhs, env));
          this.options.trace.emit({ tag: "E_Define", name: form.name });
          return VUnit;

        case "Set":
          env.mutate(form.name, this.evaluate(form.rhs, env));
          this.options.trace.emit({ tag: "E_Set", name: form.name });
          return VUnit;

        case "DefineProc":
          env.define(form.name, makeClosure(form.params, form.body, env, form.name));
          this.options.trace.emit({ tag: "E_Define", name: form.name });
          return VUnit;

        case "Lambda":
          return makeClosure(form.params, form.body, env);

        case "Cond":
          return condForm(form.clauses, env, this.ev);

        case "Or":
          return orForm(form.exprs, env, this.ev);

        case "And":
          return andForm(form.exprs, env, this.ev);

        case "Begin": {
          const last = form.exprs.length - 1;
          for (let i = 0; i < last; i++) this.evaluate(form.exprs[i], env);
          form = classify(form.exprs[last]);
          continue;
        }

        case "App": {
          const proc = this.evaluate(form.fn, env);
          const args = form.args.map((a) => this.evaluate(a, env));
          if (proc.tag === "Closure" && this.options.tailCalls) {
            this.options.trace.emit({
              tag: "E_TailCall",
              procedure: proc.name ?? "lambda",
              arity: args.length,
            });
            env = applicationEnv(proc, args);
            form = { tag: "Begin", exprs: proc.body };
            continue;
          }
          return this.invoke(proc, args, form.source);
        }

        case "Invalid":
          throw new InvalidSyntax(sexpToString(form.source));
      }
    }
  }

  /**
   * Call a procedure without touching the caller's loop state. Used by
   * primitives that take procedures, and for every call when tail calls are
   * turned off.
   */
  apply(proc: Value, args: Value[]): Value {
    if (proc.tag === "Closure") {
      const env = applicationEnv(proc, args);
      let result: Value = VUnit;
      for (const x of proc.body) result = this.evaluate(x, env);
      return result;
    }
    if (proc.tag === "Native") return proc.fn(args, this);
    throw new TypeError(`${sexpToString(proc)} is not a procedure`);
  }

  private readonly ev = (x: Value, env: Environment): Value => this.evaluate(x, env);

  private invoke(proc: Value, args: Value[], source: ListVal): Value {
    if (proc.tag === "Closure") return this.apply(proc, args);
    if (proc.tag !== "Native") {
      throw this.invocationError(proc, args, source, `TypeError: ${sexpToString(proc)} is not a procedure`);
    }
    return this.callNative(proc, args, source);
  }

  private callNative(proc: NativeVal, args: Value[], source: ListVal): Value {
    try {
      return proc.fn(args, this);
    } catch (err) {
      // Errors from evaluation nested inside the primitive pass through untouched.
      if (err instanceof InterpreterError || isStackOverflow(err)) throw err;
      throw this.invocationError(proc, args, source, describeFailure(err));
    }
  }

  private invocationError(
    proc: Value,
    args: Value[],
    source: ListVal,
    reason: string
  ): PrimitiveInvocationError {
    return new PrimitiveInvocationError(
      { source: sexpToString(source), procedure: proc, args, reason, expression: source },
      `${sexpToString(proc)} ${sexpToString(list(args))}`
    );
  }
}

/** Evaluate one expression in `env`. */
export function evaluate(x: Value, env: Environment, options: Partial<EvalOptions> = {}): Value {
  return new Evaluator(options).evaluate(x, env);
}

/** Apply a procedure (closure or primitive) to already-evaluated arguments. */
export function applyProcedure(proc: Value, args: Value[], options: Partial<EvalOptions> = {}): Value {
  return new Evaluator(options).apply(proc, args);
}
