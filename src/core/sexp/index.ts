// src/core/sexp/index.ts
// S-expression printing

export { sexpToString, floatToString } from "./sexp";
