// src/core/reader/tokenize.ts
// Source text to tokens. Three interchangeable bracket pairs delimit lists.

export const BRACKETS: ReadonlyMap<string, string> = new Map([
  ["(", ")"],
  ["[", "]"],
  ["{", "}"],
]);

export const OPEN_BRACKETS: ReadonlySet<string> = new Set(BRACKETS.keys());
export const CLOSE_BRACKETS: ReadonlySet<string> = new Set(BRACKETS.values());

export function tokenize(src: string): string[] {
  let padded = src;
  for (const [open, close] of BRACKETS) {
    padded = padded.split(open).join(` ${open} `).split(close).join(` ${close} `);
  }
  return padded.split(/\s+/).filter((t) => t.length > 0);
}
