// src/core/reader/index.ts
// Reader: source text to expressions

export { tokenize, BRACKETS, OPEN_BRACKETS, CLOSE_BRACKETS } from "./tokenize";
export { TokenReader, parse, parseAll, parseAtom, readFromTokens } from "./parse";
