// test/core/numeric.spec.ts
// Arithmetic over integral and floating numbers

import { describe, it, expect } from "vitest";
import {
  add, sub, mul, negate, divide, floorDiv, modulo, compare, power, roundHalfEven, integral,
  expectNumber, expectInteger,
} from "../../src/core/numeric";
import { int, float, sym } from "../../src/core/eval/values";

describe("numeric", () => {
  it("keeps integral results integral", () => {
    expect(add(int(2), int(3))).toEqual(int(5));
    expect(sub(int(2), int(3))).toEqual(int(-1));
    expect(mul(int(4), int(5))).toEqual(int(20));
    expect(negate(int(4))).toEqual(int(-4));
  });

  it("goes floating as soon as one side is floating", () => {
    expect(add(int(2), float(0.5))).toEqual(float(2.5));
    expect(mul(float(2), int(3))).toEqual(float(6));
  });

  it("true division is always floating", () => {
    expect(divide(int(6), int(3))).toEqual(float(2));
    expect(divide(int(1), int(4))).toEqual(float(0.25));
    expect(() => divide(int(1), float(0))).toThrow(RangeError);
    expect(divide(int(-7), int(2))).toEqual(float(-3.5));
  });

  it("divides integers too large for a float", () => {
    expect(divide(power(int(10), int(400)), power(int(10), int(399)))).toEqual(float(10));
    expect(() => divide(power(int(10), int(400)), int(3))).toThrow("integer division result too large for a float");
  });

  it("floor division and modulo round toward negative infinity", () => {
    expect(floorDiv(int(7), int(2))).toEqual(int(3));
    expect(floorDiv(int(-7), int(2))).toEqual(int(-4));
    expect(floorDiv(int(7), int(-2))).toEqual(int(-4));
    expect(modulo(int(-7), int(2))).toEqual(int(1));
    expect(modulo(int(7), int(-2))).toEqual(int(-1));
    expect(modulo(float(7.5), int(2))).toEqual(float(1.5));
    expect(() => modulo(int(1), int(0))).toThrow("integer division or modulo by zero");
  });

  it("compares across kinds", () => {
    expect(compare(int(1), float(1.5))).toBe(-1);
    expect(compare(float(2), int(2))).toBe(0);
    expect(compare(int(10n ** 30n), int(10n ** 29n))).toBe(1);
    expect(Number.isNaN(compare(float(NaN), int(1)))).toBe(true);
  });

  it("compares integers beyond 2^53 with floats exactly", () => {
    expect(compare(int(9007199254740993n), float(9007199254740992))).toBe(1);
    expect(compare(float(9007199254740992), int(9007199254740993n))).toBe(-1);
    expect(compare(int(9007199254740992n), float(9007199254740992))).toBe(0);
    expect(compare(int(2), float(2.5))).toBe(-1);
    expect(compare(int(-3), float(-2.5))).toBe(-1);
    expect(compare(int(10n ** 400n), float(Infinity))).toBe(-1);
    expect(compare(float(-Infinity), int(-(10n ** 400n)))).toBe(-1);
  });

  it("raises integers exactly and everything else in floating point", () => {
    expect(power(int(2), int(100))).toEqual(int(1267650600228229401496703205376n));
    expect(power(int(2), int(-1))).toEqual(float(0.5));
    expect(power(float(9), float(0.5))).toEqual(float(3));
    expect(() => power(int(0), int(-1))).toThrow(RangeError);
  });

  it("rounds halves to even", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(2.6)).toBe(3);
  });

  it("refuses to turn non-finite floats into integers", () => {
    expect(integral("floor", 3)).toBe(3n);
    expect(() => integral("floor", Infinity)).toThrow("floor: cannot convert Infinity to integer");
  });

  it("checks argument kinds", () => {
    expect(() => expectNumber("+", sym("a"))).toThrow("+: expected a number, got a");
    expect(() => expectInteger("gcd", float(1))).toThrow("gcd: expected an integer, got 1.0");
  });
});
