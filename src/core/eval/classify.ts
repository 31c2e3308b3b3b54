// src/core/eval/classify.ts
// Turns a raw expression into one of the forms in ast.ts.
// Each list is classified once; the result is cached against the list object.

import type { Expr } from "../ast";
import { KEYWORDS } from "../ast";
import type { ListVal, Value } from "./values";

const cache = new WeakMap<ListVal, Expr>();

export function classify(x: Value): Expr {
  switch (x.tag) {
    case "Int":
    case "Float":
      return { tag: "Lit", value: x };
    case "Sym":
      return { tag: "Var", name: x.name };
    case "List": {
      const hit = cache.get(x);
      if (hit) return hit;
      const form = classifyList(x);
      cache.set(x, form);
      return form;
    }
    default:
      return { tag: "Invalid", source: x };
  }
}

function symbolName(v: Value | undefined): string | undefined {
  return v !== undefined && v.tag === "Sym" ? v.name : undefined;
}

/** Parameter names, or undefined when `v` is not a list of symbols. */
function paramNames(v: Value): string[] | undefined {
  if (v.tag !== "List") return undefined;
  const names: string[] = [];
  for (const p of v.items) {
    if (p.tag !== "Sym") return undefined;
    names.push(p.name);
  }
  return names;
}

function classifyList(x: ListVal): Expr {
  const items = x.items;
  const invalid: Expr = { tag: "Invalid", source: x };
  if (items.length === 0) return invalid;

  const head = symbolName(items[0]);
  if (head === undefined || !KEYWORDS.has(head)) {
    return { tag: "App", fn: items[0], args: items.slice(1), source: x };
  }

  const rest = items.slice(1);
  switch (head) {
    case "quote":
      return rest.length === 1 ? { tag: "Quote", datum: rest[0] } : invalid;

    case "if":
      return rest.length === 3
        ? { tag: "If", test: rest[0], conseq: rest[1], alt: rest[2] }
        : invalid;

    case "define": {
      if (rest.length === 0) return invalid;
      const target = rest[0];
      const name = symbolName(target);
      if (name !== undefined) {
        return rest.length === 2 ? { tag: "Define", name, rhs: rest[1] } : invalid;
      }
      // (define (name param*) body+)
      if (target.tag !== "List" || rest.length < 2) return invalid;
      const signature = paramNames(target);
      if (!signature || signature.length === 0) return invalid;
      const [procName, ...params] = signature;
      return { tag: "DefineProc", name: procName, params, body: rest.slice(1) };
    }

    case "set!": {
      const name = symbolName(rest[0]);
      return name !== undefined && rest.length === 2
        ? { tag: "Set", name, rhs: rest[1] }
        : invalid;
    }

    case "lambda": {
      if (rest.length < 2) return invalid;
      const params = paramNames(rest[0]);
      return params ? { tag: "Lambda", params, body: rest.slice(1) } : invalid;
    }

    case "cond":
      return { tag: "Cond", clauses: rest };

    case "or":
      return { tag: "Or", exprs: rest };

    case "and":
      return { tag: "And", exprs: rest };

    case "begin":
      return rest.length > 0 ? { tag: "Begin", exprs: rest } : invalid;

    default:
      return invalid;
  }
}
