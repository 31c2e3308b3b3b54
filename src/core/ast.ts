// src/core/ast.ts
// Classified expression forms. Sub-expressions stay as raw values: they are
// classified when (and if) the evaluator reaches them.

import type { IntVal, FloatVal, ListVal, Value } from "./eval/values";

export type Expr =
  | { tag: "Lit"; value: IntVal | FloatVal }
  | { tag: "Var"; name: string }
  | { tag: "Quote"; datum: Value }
  | { tag: "If"; test: Value; conseq: Value; alt: Value }
  | { tag: "Define"; name: string; rhs: Value }
  | { tag: "Set"; name: string; rhs: Value }
  | { tag: "DefineProc"; name: string; params: string[]; body: Value[] }
  | { tag: "Lambda"; params: string[]; body: Value[] }
  | { tag: "Cond"; clauses: Value[] }
  | { tag: "Or"; exprs: Value[] }
  | { tag: "And"; exprs: Value[] }
  | { tag: "Begin"; exprs: readonly Value[] }
  | { tag: "App"; fn: Value; args: Value[]; source: ListVal }
  | { tag: "Invalid"; source: Value };

export const KEYWORDS: ReadonlySet<string> = new Set([
  "quote", "if", "define", "lambda", "set!", "cond", "or", "and", "begin",
]);
