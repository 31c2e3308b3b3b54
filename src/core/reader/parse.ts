// src/core/reader/parse.ts
// Tokens to expressions.

import type { Value } from "../eval/values";
import { int, float, sym, list } from "../eval/values";
import { UnexpectedCloseParen, UnexpectedEndOfSource } from "../errors";
import { BRACKETS, CLOSE_BRACKETS, tokenize } from "./tokenize";

const INTEGER = /^[+-]?\d+$/;
// Checked after INTEGER, so a bare digit run only gets here with an exponent.
const DECIMAL = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

/** Integer if it reads as one, else float if it reads as one, else symbol. */
export function parseAtom(token: string): Value {
  if (INTEGER.test(token)) return int(BigInt(token));
  if (DECIMAL.test(token)) return float(Number(token));
  const special = SPECIAL_FLOAT.exec(token);
  if (special) {
    const [, sign, word] = special;
    if (word.toLowerCase() === "nan") return float(NaN);
    return float(sign === "-" ? -Infinity : Infinity);
  }
  return sym(token);
}

/**
 * Reads expressions one at a time from a token sequence.
 */
export class TokenReader {
  private i = 0;

  constructor(private readonly toks: readonly string[]) {}

  get done(): boolean {
    return this.i >= this.toks.length;
  }

  /** Number of tokens consumed so far. */
  get position(): number {
    return this.i;
  }

  read(): Value {
    const t = this.toks[this.i];
    if (t === undefined) throw new UnexpectedEndOfSource();
    this.i++;

    const close = BRACKETS.get(t);
    if (close !== undefined) {
      const items: Value[] = [];
      for (;;) {
        const u = this.toks[this.i];
        if (u === undefined) throw new UnexpectedEndOfSource();
        if (u === close) { this.i++; break; }
        items.push(this.read());
      }
      return list(items);
    }

    if (CLOSE_BRACKETS.has(t)) throw new UnexpectedCloseParen();
    return parseAtom(t);
  }
}

/** Consume one expression from the front of `tokens`. */
export function readFromTokens(tokens: string[]): Value {
  const reader = new TokenReader(tokens);
  const value = reader.read();
  tokens.splice(0, reader.position);
  return value;
}

/** The first complete expression in `source`; anything after it is ignored. */
export function parse(source: string): Value {
  return new TokenReader(tokenize(source)).read();
}

export function parseAll(source: string): Value[] {
  const reader = new TokenReader(tokenize(source));
  const out: Value[] = [];
  while (!reader.done) out.push(reader.read());
  return out;
}
