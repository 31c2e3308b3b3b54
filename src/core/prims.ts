// src/core/prims.ts
// The standard environment: constants and primitive procedures.
//
// Primitives report bad arity or argument types with TypeError and domain
// problems (division by zero, car of an empty list, ...) with RangeError.
// The evaluator turns both into PrimitiveInvocationError.

import { Environment } from "./eval/env";
import type { NativeFn, NumVal, Value } from "./eval/values";
import {
  VUnit, VTrue, VFalse,
  int, float, bool, list, native,
  isNumber, isProcedure, isTruthy, valuesEqual,
} from "./eval/values";
import {
  expectNumber, expectInteger, toNumber,
  add, sub, mul, negate, divide, floorDiv, modulo, compare, power,
  integral, roundHalfEven,
} from "./numeric";
import { sexpToString } from "./sexp/sexp";

export type StandardEnvOptions = {
  /** Where `display` writes its lines. */
  output?: (line: string) => void;
};

function checkArity(who: string, args: Value[], min: number, max = min): void {
  if (args.length >= min && args.length <= max) return;
  const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
  throw new TypeError(`${who}: expected ${expected} argument(s), got ${args.length}`);
}

function expectList(who: string, v: Value): Value[] {
  if (v.tag !== "List") throw new TypeError(`${who}: expected a list, got ${sexpToString(v)}`);
  return v.items;
}

function numbers(who: string, args: Value[]): NumVal[] {
  return args.map((a) => expectNumber(who, a));
}

/** max/min take either several numbers or a single list of them. */
function extremeOf(who: string, args: Value[], better: (c: number) => boolean): NumVal {
  checkArity(who, args, 1, Infinity);
  const only = args[0];
  const candidates = args.length === 1 && only.tag === "List" ? only.items : args;
  if (candidates.length === 0) throw new RangeError(`${who}: empty sequence`);
  const nums = numbers(who, candidates);
  let best = nums[0];
  for (const n of nums.slice(1)) if (better(compare(n, best))) best = n;
  return best;
}

function comparison(who: string, holds: (c: number) => boolean): NativeFn {
  return (args) => {
    checkArity(who, args, 1, Infinity);
    const nums = numbers(who, args);
    for (let i = 1; i < nums.length; i++) {
      if (!holds(compare(nums[i - 1], nums[i]))) return VFalse;
    }
    return VTrue;
  };
}

/** Number-to-float function of one argument. */
function unaryMath(who: string, fn: (x: number) => number, domain?: (x: number) => boolean): NativeFn {
  return (args) => {
    checkArity(who, args, 1);
    const x = toNumber(expectNumber(who, args[0]));
    if (domain && !domain(x)) throw new RangeError(`${who}: math domain error`);
    return float(fn(x));
  };
}

/** Number-to-integer function of one argument; integers pass through. */
function toIntegral(who: string, fn: (x: number) => number): NativeFn {
  return (args) => {
    checkArity(who, args, 1);
    const v = expectNumber(who, args[0]);
    return v.tag === "Int" ? v : int(integral(who, fn(v.n)));
  };
}

/** Identity for lists and procedures; value for atoms. */
function eqv(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a.tag === "Int" && b.tag === "Int") return a.n === b.n;
  if (a.tag === "Float" && b.tag === "Float") return a.n === b.n;
  if (a.tag === "Sym" && b.tag === "Sym") return a.name === b.name;
  if (a.tag === "Bool" && b.tag === "Bool") return a.b === b.b;
  return a.tag === "Unit" && b.tag === "Unit";
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) [x, y] = [y, x % y];
  return x;
}

export function standardEnvironment(options: StandardEnvOptions = {}): Environment {
  const output = options.output ?? ((line: string) => console.log(line));
  const env = new Environment();

  function def(name: string, v: Value) {
    env.define(name, v);
  }

  function prim(name: string, fn: NativeFn) {
    def(name, native(name, fn));
  }

  // ── constants ──────────────────────────────────────────────────
  def("#t", VTrue);
  def("#f", VFalse);
  def("pi", float(Math.PI));
  def("e", float(Math.E));
  def("tau", float(2 * Math.PI));
  def("inf", float(Infinity));
  def("nan", float(NaN));

  // ── arithmetic ─────────────────────────────────────────────────
  prim("+", (args) => numbers("+", args).reduce<NumVal>(add, int(0)));

  prim("-", (args) => {
    checkArity("-", args, 1, Infinity);
    const [first, ...rest] = numbers("-", args);
    if (rest.length === 0) return negate(first);
    return sub(first, rest.reduce<NumVal>(add, int(0)));
  });

  prim("*", (args) => numbers("*", args).reduce<NumVal>(mul, int(1)));

  prim("/", (args) => {
    checkArity("/", args, 1, Infinity);
    const [first, ...rest] = numbers("/", args);
    if (rest.length === 0) return divide(int(1), first);
    return divide(first, rest.reduce<NumVal>(mul, int(1)));
  });

  prim("quotient", (args) => {
    checkArity("quotient", args, 2);
    const [a, b] = numbers("quotient", args);
    return floorDiv(a, b);
  });

  prim("modulo", (args) => {
    checkArity("modulo", args, 2);
    const [a, b] = numbers("modulo", args);
    return modulo(a, b);
  });

  prim("abs", (args) => {
    checkArity("abs", args, 1);
    const v = expectNumber("abs", args[0]);
    if (v.tag === "Float") return float(Math.abs(v.n));
    return v.n < 0n ? int(-v.n) : v;
  });

  prim("max", (args) => extremeOf("max", args, (c) => c > 0));
  prim("min", (args) => extremeOf("min", args, (c) => c < 0));

  prim("round", (args) => {
    checkArity("round", args, 1, 2);
    const v = expectNumber("round", args[0]);
    if (args.length === 2) {
      const digits = Number(expectInteger("round", args[1]));
      if (v.tag === "Int") return v;
      const scale = 10 ** digits;
      return float(roundHalfEven(v.n * scale) / scale);
    }
    return v.tag === "Int" ? v : int(integral("round", roundHalfEven(v.n)));
  });

  prim("expt", (args) => {
    checkArity("expt", args, 2);
    const [a, b] = numbers("expt", args);
    return power(a, b);
  });

  // ── comparison ─────────────────────────────────────────────────
  prim("=", (args) => {
    checkArity("=", args, 1, Infinity);
    const [first, ...rest] = args;
    return bool(rest.every((x) => valuesEqual(first, x)));
  });
  prim("<", comparison("<", (c) => c < 0));
  prim(">", comparison(">", (c) => c > 0));
  prim("<=", comparison("<=", (c) => c <= 0));
  prim(">=", comparison(">=", (c) => c >= 0));

  // ── lists ──────────────────────────────────────────────────────
  prim("list", (args) => list(args.slice()));

  prim("cons", (args) => {
    checkArity("cons", args, 2);
    return list([args[0], ...expectList("cons", args[1])]);
  });

  prim("car", (args) => {
    checkArity("car", args, 1);
    const items = expectList("car", args[0]);
    if (items.length === 0) throw new RangeError("car: empty list");
    return items[0];
  });

  prim("cdr", (args) => {
    checkArity("cdr", args, 1);
    return list(expectList("cdr", args[0]).slice(1));
  });

  prim("append", (args) => list(args.flatMap((a) => expectList("append", a))));

  prim("length", (args) => {
    checkArity("length", args, 1);
    return int(expectList("length", args[0]).length);
  });

  prim("null?", (args) => {
    checkArity("null?", args, 1);
    const v = args[0];
    return bool(v.tag === "List" && v.items.length === 0);
  });

  prim("list?", (args) => {
    checkArity("list?", args, 1);
    return bool(args[0].tag === "List");
  });

  prim("map", (args, host) => {
    checkArity("map", args, 2, Infinity);
    const [proc, ...seqs] = args;
    const lists = seqs.map((s) => expectList("map", s));
    const n = Math.min(...lists.map((l) => l.length));
    const out: Value[] = [];
    for (let i = 0; i < n; i++) out.push(host.apply(proc, lists.map((l) => l[i])));
    return list(out);
  });

  prim("filter", (args, host) => {
    checkArity("filter", args, 2);
    const [proc, seq] = args;
    return list(expectList("filter", seq).filter((x) => isTruthy(host.apply(proc, [x]))));
  });

  prim("apply", (args, host) => {
    checkArity("apply", args, 2);
    return host.apply(args[0], expectList("apply", args[1]).slice());
  });

  // ── predicates ─────────────────────────────────────────────────
  prim("not", (args) => {
    checkArity("not", args, 1);
    return bool(!isTruthy(args[0]));
  });

  prim("eq?", (args) => {
    checkArity("eq?", args, 2);
    return bool(eqv(args[0], args[1]));
  });

  prim("equal?", (args) => {
    checkArity("equal?", args, 2);
    return bool(valuesEqual(args[0], args[1]));
  });

  prim("number?", (args) => {
    checkArity("number?", args, 1);
    return bool(isNumber(args[0]));
  });

  prim("symbol?", (args) => {
    checkArity("symbol?", args, 1);
    return bool(args[0].tag === "Sym");
  });

  prim("procedure?", (args) => {
    checkArity("procedure?", args, 1);
    return bool(isProcedure(args[0]));
  });

  // ── output ─────────────────────────────────────────────────────
  prim("display", (args) => {
    checkArity("display", args, 1);
    output(sexpToString(args[0]));
    return VUnit;
  });

  // ── math ───────────────────────────────────────────────────────
  prim("sqrt", unaryMath("sqrt", Math.sqrt, (x) => x >= 0));
  prim("sin", unaryMath("sin", Math.sin));
  prim("cos", unaryMath("cos", Math.cos));
  prim("tan", unaryMath("tan", Math.tan));
  prim("asin", unaryMath("asin", Math.asin, (x) => x >= -1 && x <= 1));
  prim("acos", unaryMath("acos", Math.acos, (x) => x >= -1 && x <= 1));
  prim("exp", unaryMath("exp", Math.exp));
  prim("log10", unaryMath("log10", Math.log10, (x) => x > 0));
  prim("log2", unaryMath("log2", Math.log2, (x) => x > 0));

  prim("atan", (args) => {
    checkArity("atan", args, 1, 2);
    const [y, x] = numbers("atan", args).map(toNumber);
    return float(args.length === 1 ? Math.atan(y) : Math.atan2(y, x));
  });

  prim("log", (args) => {
    checkArity("log", args, 1, 2);
    const [x, base] = numbers("log", args).map(toNumber);
    const natural = args.length === 1;
    if (x <= 0 || (!natural && (base <= 0 || base === 1))) {
      throw new RangeError("log: math domain error");
    }
    return float(natural ? Math.log(x) : Math.log(x) / Math.log(base));
  });

  prim("floor", toIntegral("floor", Math.floor));
  prim("ceil", toIntegral("ceil", Math.ceil));
  prim("trunc", toIntegral("trunc", Math.trunc));

  prim("factorial", (args) => {
    checkArity("factorial", args, 1);
    const n = expectInteger("factorial", args[0]);
    if (n < 0n) throw new RangeError("factorial() not defined for negative values");
    let acc = 1n;
    for (let i = 2n; i <= n; i++) acc *= i;
    return int(acc);
  });

  prim("gcd", (args) => int(args.map((a) => expectInteger("gcd", a)).reduce(gcd, 0n)));

  return env;
}

/**
 * Global environment for a program: an empty frame over the standard frame.
 * Overrides are written into the empty frame.
 */
export function globalEnvironment(
  overrides: Iterable<[string, Value]> = [],
  options: StandardEnvOptions = {}
): Environment {
  return standardEnvironment(options).extend(overrides);
}
