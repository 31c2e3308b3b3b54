// test/core/eval/env.spec.ts
// Environment chains: lookup, define, mutate, extend

import { describe, it, expect } from "vitest";
import { Environment } from "../../../src/core/eval/env";
import { int, sym } from "../../../src/core/eval/values";
import { UnboundVariable } from "../../../src/core/errors";

describe("Environment", () => {
  it("looks names up through the chain, innermost first", () => {
    const outer = new Environment([["x", int(1)], ["y", int(2)]]);
    const inner = outer.extend([["x", int(10)]]);

    expect(inner.lookup("x")).toEqual(int(10));
    expect(inner.lookup("y")).toEqual(int(2));
    expect(outer.lookup("x")).toEqual(int(1));
  });

  it("throws UnboundVariable for a missing name", () => {
    const env = new Environment().extend([]);
    expect(() => env.lookup("nope")).toThrow(UnboundVariable);
    expect(() => env.lookup("nope")).toThrow("Unbound variable: 'nope'");
  });

  it("define writes only to the local frame", () => {
    const outer = new Environment([["x", int(1)]]);
    const inner = outer.extend([]);
    inner.define("x", int(99));

    expect(inner.lookup("x")).toEqual(int(99));
    expect(outer.lookup("x")).toEqual(int(1));
  });

  it("mutate overwrites the nearest frame holding the name", () => {
    const outer = new Environment([["x", int(1)]]);
    const middle = outer.extend([["x", int(2)]]);
    const inner = middle.extend([]);
    inner.mutate("x", int(3));

    expect(middle.lookup("x")).toEqual(int(3));
    expect(outer.lookup("x")).toEqual(int(1));
    expect(inner.ownNames()).toEqual([]);
  });

  it("mutate of a name bound nowhere throws UnboundVariable", () => {
    const env = new Environment([["x", int(1)]]);
    expect(() => env.mutate("y", int(2))).toThrow(UnboundVariable);
    expect(env.has("y")).toBe(false);
  });

  it("frames are shared by reference between children", () => {
    const parent = new Environment();
    const a = parent.extend([]);
    const b = parent.extend([]);
    parent.define("shared", sym("v1"));
    a.mutate("shared", sym("v2"));

    expect(b.lookup("shared")).toEqual(sym("v2"));
  });

  it("reports depth and own names in insertion order", () => {
    const env = new Environment([["a", int(1)]]).extend([["b", int(2)], ["c", int(3)]]);
    expect(env.depth).toBe(2);
    expect(env.ownNames()).toEqual(["b", "c"]);
    expect(env.has("a")).toBe(true);
  });
});
