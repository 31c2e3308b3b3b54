// src/core/sexp/sexp.ts
// Printer: values back to s-expression text.
// Not an exact inverse of the reader: booleans print as #t/#f and floats
// always carry a fraction or an exponent so they never read back as integers.

import type { Value } from "../eval/values";

export function sexpToString(x: Value): string {
  switch (x.tag) {
    case "Bool": return x.b ? "#t" : "#f";
    case "List": return `(${x.items.map(sexpToString).join(" ")})`;
    case "Sym": return x.name;
    case "Int": return x.n.toString();
    case "Float": return floatToString(x.n);
    case "Closure": return x.name ? `#<procedure ${x.name}>` : "#<procedure>";
    case "Native": return `#<primitive ${x.name}>`;
    case "Unit": return "#<void>";
  }
}

export function floatToString(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (n === 0) return Object.is(n, -0) ? "-0.0" : "0.0";

  const abs = Math.abs(n);
  if (abs >= 1e16 || abs < 1e-4) {
    // 1e-5 -> 1e-05, 1.5e+16 stays as is
    return n.toExponential().replace(/e([+-])(\d)$/, (_m, sign: string, d: string) => `e${sign}0${d}`);
  }
  const s = String(n);
  return Number.isInteger(n) ? `${s}.0` : s;
}
