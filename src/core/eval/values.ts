// src/core/eval/values.ts
// Runtime values. Lists are both program text and data.

import type { Environment } from "./env";

export type IntVal = { tag: "Int"; n: bigint };
export type FloatVal = { tag: "Float"; n: number };
export type NumVal = IntVal | FloatVal;
export type SymVal = { tag: "Sym"; name: string };
export type BoolVal = { tag: "Bool"; b: boolean };
export type ListVal = { tag: "List"; items: Value[] };
export type UnitVal = { tag: "Unit" };

/**
 * A user-defined procedure. `env` is the defining environment, shared by
 * reference with whatever else holds it.
 */
export type ClosureVal = {
  readonly tag: "Closure";
  readonly params: readonly string[];
  readonly body: readonly Value[];
  readonly env: Environment;
  /** Set by `(define (name ...) ...)`; only used when printing. */
  readonly name?: string;
};

/**
 * Handle given to primitives that need to call back into procedures
 * (apply, map, filter).
 */
export interface NativeHost {
  apply(proc: Value, args: Value[]): Value;
}

export type NativeFn = (args: Value[], host: NativeHost) => Value;

export type NativeVal = {
  readonly tag: "Native";
  readonly name: string;
  readonly fn: NativeFn;
};

export type Value =
  | IntVal
  | FloatVal
  | SymVal
  | BoolVal
  | ListVal
  | UnitVal
  | ClosureVal
  | NativeVal;

/** The no-value sentinel: result of define, set!, display and friends. */
export const VUnit: UnitVal = { tag: "Unit" };
export const VTrue: BoolVal = { tag: "Bool", b: true };
export const VFalse: BoolVal = { tag: "Bool", b: false };

export function int(n: bigint | number): IntVal {
  return { tag: "Int", n: typeof n === "bigint" ? n : BigInt(n) };
}
export function float(n: number): FloatVal { return { tag: "Float", n }; }
export function sym(name: string): SymVal { return { tag: "Sym", name }; }
export function bool(b: boolean): BoolVal { return b ? VTrue : VFalse; }
export function list(items: Value[]): ListVal { return { tag: "List", items }; }

export function native(name: string, fn: NativeFn): NativeVal {
  return { tag: "Native", name, fn };
}

export function isNumber(v: Value): v is NumVal {
  return v.tag === "Int" || v.tag === "Float";
}

export function isProcedure(v: Value): v is ClosureVal | NativeVal {
  return v.tag === "Closure" || v.tag === "Native";
}

export function isUnit(v: Value): v is UnitVal {
  return v.tag === "Unit";
}

/**
 * Falsy values are exactly: #f, integral or floating zero, and the empty list.
 * Everything else is truthy, the no-value sentinel included.
 */
export function isTruthy(v: Value): boolean {
  switch (v.tag) {
    case "Bool": return v.b;
    case "Int": return v.n !== 0n;
    case "Float": return v.n !== 0;
    case "List": return v.items.length > 0;
    default: return true;
  }
}

/**
 * Exact ordering of an integer against a float: -1, 0 or 1, NaN when `x` is
 * NaN. The integer is never rounded to a float.
 */
export function compareIntFloat(n: bigint, x: number): number {
  if (Number.isNaN(x)) return NaN;
  if (x === Infinity) return -1;
  if (x === -Infinity) return 1;
  const whole = Math.floor(x);
  const w = BigInt(whole);
  if (n < w) return -1;
  if (n > w) return 1;
  return x > whole ? -1 : 0;
}

/** Structural equality; numbers compare by value across both kinds. */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumber(a) && isNumber(b)) {
    if (a.tag === "Int") return b.tag === "Int" ? a.n === b.n : compareIntFloat(a.n, b.n) === 0;
    return b.tag === "Int" ? compareIntFloat(b.n, a.n) === 0 : a.n === b.n;
  }
  switch (a.tag) {
    case "Sym": return b.tag === "Sym" && a.name === b.name;
    case "Bool": return b.tag === "Bool" && a.b === b.b;
    case "Unit": return b.tag === "Unit";
    case "List": {
      if (b.tag !== "List" || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        if (!valuesEqual(a.items[i], b.items[i])) return false;
      }
      return true;
    }
    default:
      return a === b;
  }
}
