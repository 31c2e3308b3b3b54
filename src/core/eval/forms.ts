// src/core/eval/forms.ts
// cond / or / and. Operands are evaluated through ordinary recursion.

import type { Environment } from "./env";
import type { Value } from "./values";
import { VUnit, VTrue, VFalse, isTruthy } from "./values";
import { InvalidSyntax } from "../errors";
import { sexpToString } from "../sexp/sexp";

export type EvalFn = (x: Value, env: Environment) => Value;

/** (cond (test body*)* (else body*)?) */
export function condForm(clauses: readonly Value[], env: Environment, ev: EvalFn): Value {
  for (const clause of clauses) {
    if (clause.tag !== "List" || clause.items.length === 0) {
      throw new InvalidSyntax(sexpToString(clause));
    }
    const [head, ...body] = clause.items;
    if (head.tag === "Sym" && head.name === "else") {
      return evalSequence(body, env, ev, VUnit);
    }
    const test = ev(head, env);
    if (isTruthy(test)) {
      return evalSequence(body, env, ev, test);
    }
  }
  return VUnit;
}

/** (or exp*): first truthy value, else the last value, #f when empty. */
export function orForm(exprs: readonly Value[], env: Environment, ev: EvalFn): Value {
  let value: Value = VFalse;
  for (const x of exprs) {
    value = ev(x, env);
    if (isTruthy(value)) return value;
  }
  return value;
}

/** (and exp*): first falsy value, else the last value, #t when empty. */
export function andForm(exprs: readonly Value[], env: Environment, ev: EvalFn): Value {
  let value: Value = VTrue;
  for (const x of exprs) {
    value = ev(x, env);
    if (!isTruthy(value)) return value;
  }
  return value;
}

function evalSequence(body: readonly Value[], env: Environment, ev: EvalFn, empty: Value): Value {
  let result = empty;
  for (const x of body) result = ev(x, env);
  return result;
}
