// src/core/numeric.ts
// Arithmetic over the two numeric kinds. Integral op integral stays integral;
// anything involving a float is computed in floating point.

import type { NumVal, Value } from "./eval/values";
import { int, float, isNumber, compareIntFloat } from "./eval/values";
import { sexpToString } from "./sexp/sexp";

export function expectNumber(who: string, v: Value): NumVal {
  if (!isNumber(v)) throw new TypeError(`${who}: expected a number, got ${sexpToString(v)}`);
  return v;
}

export function expectInteger(who: string, v: Value): bigint {
  if (v.tag !== "Int") throw new TypeError(`${who}: expected an integer, got ${sexpToString(v)}`);
  return v.n;
}

export function toNumber(v: NumVal): number {
  return Number(v.n);
}

function arith(
  a: NumVal,
  b: NumVal,
  intOp: (x: bigint, y: bigint) => bigint,
  floatOp: (x: number, y: number) => number
): NumVal {
  if (a.tag === "Int" && b.tag === "Int") return int(intOp(a.n, b.n));
  return float(floatOp(toNumber(a), toNumber(b)));
}

export function add(a: NumVal, b: NumVal): NumVal {
  return arith(a, b, (x, y) => x + y, (x, y) => x + y);
}

export function sub(a: NumVal, b: NumVal): NumVal {
  return arith(a, b, (x, y) => x - y, (x, y) => x - y);
}

export function mul(a: NumVal, b: NumVal): NumVal {
  return arith(a, b, (x, y) => x * y, (x, y) => x * y);
}

export function negate(a: NumVal): NumVal {
  return a.tag === "Int" ? int(-a.n) : float(-a.n);
}

export function isZero(a: NumVal): boolean {
  return a.tag === "Int" ? a.n === 0n : a.n === 0;
}

function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

// Quotient first, then the remainder's fraction with both sides scaled
// into float range.
function divideIntegers(a: bigint, b: bigint): number {
  const negative = (a < 0n) !== (b < 0n);
  const x = a < 0n ? -a : a;
  const y = b < 0n ? -b : b;
  const shift = BigInt(Math.max(0, bitLength(y) - 60));
  const result = Number(x / y) + Number((x % y) >> shift) / Number(y >> shift);
  if (!Number.isFinite(result)) throw new RangeError("integer division result too large for a float");
  return negative ? -result : result;
}

/** True division: always floating. */
export function divide(a: NumVal, b: NumVal): NumVal {
  if (isZero(b)) throw new RangeError("division by zero");
  if (a.tag === "Int" && b.tag === "Int") return float(divideIntegers(a.n, b.n));
  return float(toNumber(a) / toNumber(b));
}

/** Division rounded toward negative infinity. */
export function floorDiv(a: NumVal, b: NumVal): NumVal {
  if (isZero(b)) throw new RangeError("integer division or modulo by zero");
  return arith(
    a,
    b,
    (x, y) => {
      const q = x / y;
      return x % y !== 0n && (x < 0n) !== (y < 0n) ? q - 1n : q;
    },
    (x, y) => Math.floor(x / y)
  );
}

/** Remainder with the sign of the divisor. */
export function modulo(a: NumVal, b: NumVal): NumVal {
  if (isZero(b)) throw new RangeError("integer division or modulo by zero");
  return arith(
    a,
    b,
    (x, y) => {
      const r = x % y;
      return r !== 0n && (r < 0n) !== (y < 0n) ? r + y : r;
    },
    (x, y) => {
      const r = x % y;
      return r !== 0 && (r < 0) !== (y < 0) ? r + y : r;
    }
  );
}

/** -1, 0 or 1; NaN when either side is NaN. */
export function compare(a: NumVal, b: NumVal): number {
  if (a.tag === "Int") {
    if (b.tag === "Float") return compareIntFloat(a.n, b.n);
    return a.n < b.n ? -1 : a.n > b.n ? 1 : 0;
  }
  if (b.tag === "Int") {
    const c = compareIntFloat(b.n, a.n);
    return c === 0 || Number.isNaN(c) ? c : -c;
  }
  if (a.n < b.n) return -1;
  if (a.n > b.n) return 1;
  return a.n === b.n ? 0 : NaN;
}

export function power(a: NumVal, b: NumVal): NumVal {
  if (a.tag === "Int" && b.tag === "Int" && b.n >= 0n) return int(a.n ** b.n);
  if (isZero(a) && compare(b, int(0)) < 0) throw new RangeError("0.0 cannot be raised to a negative power");
  return float(Math.pow(toNumber(a), toNumber(b)));
}

/** Float to integer, for floor/ceil/trunc/round results. */
export function integral(who: string, x: number): bigint {
  if (!Number.isFinite(x)) throw new RangeError(`${who}: cannot convert ${x} to integer`);
  return BigInt(x);
}

/** Round half to even. */
export function roundHalfEven(x: number): number {
  const r = Math.round(x);
  // Math.round rounds .5 up; pull exact halves back to the even neighbour.
  return Math.abs(x % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}
