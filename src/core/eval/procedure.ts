// src/core/eval/procedure.ts
// Closures and their call environments.

import type { Environment, Binding } from "./env";
import type { ClosureVal, Value } from "./values";

export function makeClosure(
  params: readonly string[],
  body: readonly Value[],
  env: Environment,
  name?: string
): ClosureVal {
  return name === undefined
    ? { tag: "Closure", params, body, env }
    : { tag: "Closure", params, body, env, name };
}

/**
 * Fresh frame binding parameters to arguments by position, chained under the
 * defining environment. Only the overlapping prefix is bound: extra arguments
 * are dropped and missing parameters stay unbound.
 */
export function applicationEnv(proc: ClosureVal, args: readonly Value[]): Environment {
  const n = Math.min(proc.params.length, args.length);
  const bindings: Binding[] = [];
  for (let i = 0; i < n; i++) bindings.push([proc.params[i], args[i]]);
  return proc.env.extend(bindings);
}
