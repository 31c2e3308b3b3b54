// test/core/eval/evaluate.spec.ts
// Evaluator: special forms, closures, tail calls and error reporting

import { describe, it, expect } from "vitest";
import { evaluate, applyProcedure } from "../../../src/core/eval/evaluate";
import type { Environment } from "../../../src/core/eval/env";
import type { Value } from "../../../src/core/eval/values";
import { VUnit, VTrue, VFalse, int, float, sym, list, native } from "../../../src/core/eval/values";
import { globalEnvironment } from "../../../src/core/prims";
import { parse, parseAll } from "../../../src/core/reader";
import { sexpToString } from "../../../src/core/sexp";
import {
  EvaluatorError,
  InvalidSyntax,
  PrimitiveInvocationError,
  UnboundVariable,
} from "../../../src/core/errors";
import { collectingTrace } from "../../../src/adapters/logging";

/** Evaluate every expression of `src` in `env`, returning the last result. */
function evalAll(src: string, env: Environment = globalEnvironment(), tailCalls = true): Value {
  let result: Value = VUnit;
  for (const x of parseAll(src)) result = evaluate(x, env, { tailCalls });
  return result;
}

function show(src: string): string {
  return sexpToString(evalAll(src));
}

describe("evaluate: atoms and quote", () => {
  it("numeric literals evaluate to themselves, kind preserved", () => {
    expect(evalAll("7")).toEqual(int(7));
    expect(evalAll("7.0")).toEqual(float(7));
    expect(evalAll("-2.5")).toEqual(float(-2.5));
  });

  it("symbols evaluate to their binding", () => {
    const env = globalEnvironment([["x", int(42)]]);
    expect(evaluate(sym("x"), env)).toEqual(int(42));
  });

  it("quote returns its operand unevaluated", () => {
    expect(show("(quote (+ 1 2))")).toBe("(+ 1 2)");
    expect(evalAll("(quote x)")).toEqual(sym("x"));
  });

  it("quote returns the very list that was read", () => {
    const datum = list([sym("a"), int(1)]);
    const x = list([sym("quote"), datum]);
    expect(evaluate(x, globalEnvironment())).toBe(datum);
  });
});

describe("evaluate: if", () => {
  it("evaluates only the chosen branch", () => {
    expect(evalAll("(if #t 1 undefined-name)")).toEqual(int(1));
    expect(evalAll("(if #f undefined-name 2)")).toEqual(int(2));
  });

  it("uses truthiness for the test", () => {
    expect(evalAll("(if 0 (quote yes) (quote no))")).toEqual(sym("no"));
    expect(evalAll("(if 0.0 (quote yes) (quote no))")).toEqual(sym("no"));
    expect(evalAll("(if (quote ()) (quote yes) (quote no))")).toEqual(sym("no"));
    expect(evalAll("(if -1 (quote yes) (quote no))")).toEqual(sym("yes"));
    expect(evalAll("(if (quote (0)) (quote yes) (quote no))")).toEqual(sym("yes"));
    expect(evalAll("(if car (quote yes) (quote no))")).toEqual(sym("yes"));
  });
});

describe("evaluate: define and set!", () => {
  it("define returns no value and binds in the current frame", () => {
    const env = globalEnvironment();
    expect(evalAll("(define x 10)", env)).toBe(VUnit);
    expect(env.ownNames()).toEqual(["x"]);
  });

  it("set! updates an existing binding", () => {
    expect(evalAll("(define x 10) (set! x (+ x 5)) x")).toEqual(int(15));
  });

  it("set! on an enclosing binding mutates it in place", () => {
    const src = `
      (define counter 0)
      (define (bump) (set! counter (+ counter 1)))
      (bump) (bump) (bump)
      counter`;
    expect(evalAll(src)).toEqual(int(3));
  });

  it("set! of a never-defined name fails with UnboundVariable", () => {
    expect(() => evalAll("(set! ghost 1)")).toThrow(UnboundVariable);
  });

  it("define inside a procedure body is local to that call", () => {
    const env = globalEnvironment();
    evalAll("(define x 1) (define (f) (define x 2) x)", env);
    expect(evalAll("(f)", env)).toEqual(int(2));
    expect(evalAll("x", env)).toEqual(int(1));
  });

  it("(define (name params) body) creates a named closure", () => {
    expect(show("(define (square x) (* x x)) square")).toBe("#<procedure square>");
    expect(evalAll("(define (square x) (* x x)) (square 12)")).toEqual(int(144));
  });
});

describe("evaluate: lambda and application", () => {
  it("lambda creates an anonymous closure", () => {
    expect(show("(lambda (x) x)")).toBe("#<procedure>");
    expect(evalAll("((lambda (x y) (- x y)) 10 3)")).toEqual(int(7));
  });

  it("closures capture their defining environment", () => {
    const src = `
      (define (make-adder n) (lambda (x) (+ x n)))
      (define add5 (make-adder 5))
      (add5 10)`;
    expect(evalAll(src)).toEqual(int(15));
  });

  it("closures share captured state with later mutation", () => {
    const src = `
      (define (make-counter)
        (define n 0)
        (lambda () (set! n (+ n 1)) n))
      (define c (make-counter))
      (c) (c) (c)`;
    expect(evalAll(src)).toEqual(int(3));
  });

  it("each call gets a fresh frame", () => {
    const src = `
      (define (f x) (define y (* x 2)) y)
      (list (f 1) (f 2))`;
    expect(show(src)).toBe("(2 4)");
  });

  it("binds the overlapping prefix when arity does not match", () => {
    expect(evalAll("((lambda (a b) a) 1 2 3)")).toEqual(int(1));
    expect(() => evalAll("((lambda (a b) b) 1)")).toThrow(UnboundVariable);
  });

  it("body expressions run in order and the last value is returned", () => {
    expect(show("((lambda () (display 1) (quote done)))")).toBe("done");
  });

  it("factorial of 5 is 120", () => {
    const src = `
      (define (fact n) (if (<= n 1) 1 (* n (fact (- n 1)))))
      (fact 5)`;
    expect(evalAll(src)).toEqual(int(120));
  });

  it("integers are arbitrary precision", () => {
    const src = `
      (define (fact n) (if (<= n 1) 1 (* n (fact (- n 1)))))
      (fact 25)`;
    expect(show(src)).toBe("15511210043330985984000000");
  });

  it("higher-order primitives call back into closures", () => {
    expect(show("(map (lambda (x) (* x x)) (list 1 2 3))")).toBe("(1 4 9)");
    expect(show("(filter (lambda (x) (> x 1)) (list 1 2 3))")).toBe("(2 3)");
    expect(evalAll("(apply (lambda (a b) (+ a b)) (list 3 4))")).toEqual(int(7));
  });
});

describe("evaluate: cond, or, and, begin", () => {
  it("cond picks the first truthy clause", () => {
    expect(evalAll("(cond (#f 1) (#t 2) (else 3))")).toEqual(int(2));
    expect(evalAll("(cond (#f 1) (0 2) (else 3))")).toEqual(int(3));
  });

  it("cond evaluates every body expression and returns the last", () => {
    const env = globalEnvironment();
    expect(evalAll("(define x 0) (cond (#t (set! x 5) (+ x 1)))", env)).toEqual(int(6));
  });

  it("cond with no matching clause returns no value", () => {
    expect(evalAll("(cond (#f 1))")).toBe(VUnit);
    expect(evalAll("(cond)")).toBe(VUnit);
  });

  it("a cond clause without body yields its test value", () => {
    expect(evalAll("(cond (#f 1) (7))")).toEqual(int(7));
  });

  it("a malformed cond clause is invalid syntax", () => {
    expect(() => evalAll("(cond 5)")).toThrow(InvalidSyntax);
    expect(() => evalAll("(cond ())")).toThrow(InvalidSyntax);
  });

  it("or returns the first truthy value", () => {
    expect(evalAll("(or #f 0 5)")).toEqual(int(5));
    expect(evalAll("(or #f 0)")).toEqual(int(0));
    expect(evalAll("(or)")).toBe(VFalse);
  });

  it("or stops at the first truthy value", () => {
    expect(evalAll("(or 1 undefined-name)")).toEqual(int(1));
  });

  it("and returns the first falsy value", () => {
    expect(evalAll("(and 0 2)")).toEqual(int(0));
    expect(evalAll("(and 1 2)")).toEqual(int(2));
    expect(evalAll("(and)")).toBe(VTrue);
    expect(evalAll("(and #f undefined-name)")).toBe(VFalse);
  });

  it("begin evaluates in order and returns the last value", () => {
    expect(evalAll("(define x 1) (begin (set! x (+ x 1)) (set! x (* x 10)) x)")).toEqual(int(20));
  });
});

describe("evaluate: tail calls", () => {
  const countdown = `
    (define (countdown n) (if (= n 0) (quote done) (countdown (- n 1))))
    (countdown 100000)`;

  it("tail-recursive countdown from 100000 completes", () => {
    expect(evalAll(countdown)).toEqual(sym("done"));
  });

  it("a call in tail position of a begin body runs in constant space", () => {
    const src = `
      (define (loop n acc)
        (begin
          (if (= n 0)
              acc
              (loop (- n 1) (+ acc 1)))))
      (loop 100000 0)`;
    expect(evalAll(src)).toEqual(int(100000));
  });

  it("mutual tail recursion completes", () => {
    const src = `
      (define (even? n) (if (= n 0) #t (odd? (- n 1))))
      (define (odd? n) (if (= n 0) #f (even? (- n 1))))
      (even? 100001)`;
    expect(evalAll(src)).toBe(VFalse);
  });

  it("without tail calls deep recursion exhausts the host stack", () => {
    expect(() => evalAll(countdown, globalEnvironment(), false)).toThrow(RangeError);
  });

  it("without tail calls shallow programs still work", () => {
    const src = `
      (define (fact n) (if (<= n 1) 1 (* n (fact (- n 1)))))
      (fact 10)`;
    expect(evalAll(src, globalEnvironment(), false)).toEqual(int(3628800));
  });

  it("reports each rewrite to the trace sink", () => {
    const trace = collectingTrace();
    const env = globalEnvironment();
    for (const x of parseAll("(define (f n) (if (= n 0) 0 (f (- n 1)))) (f 2)")) {
      evaluate(x, env, { trace });
    }
    expect(trace.events).toEqual([
      { tag: "E_Define", name: "f" },
      { tag: "E_TailCall", procedure: "f", arity: 1 },
      { tag: "E_TailCall", procedure: "f", arity: 1 },
      { tag: "E_TailCall", procedure: "f", arity: 1 },
    ]);
  });
});

describe("evaluate: errors", () => {
  it("an unbound symbol raises UnboundVariable carrying the name", () => {
    try {
      evalAll("(+ 1 missing)");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnboundVariable);
      expect(err).toBeInstanceOf(EvaluatorError);
      if (err instanceof UnboundVariable) expect(err.symbol).toBe("missing");
    }
  });

  it.each([
    ["()", "()"],
    ["(if 1 2)", "(if 1 2)"],
    ["(lambda (x))", "(lambda (x))"],
    ["(define)", "(define)"],
  ])("%s raises InvalidSyntax", (src, shown) => {
    expect(() => evalAll(src)).toThrow(InvalidSyntax);
    expect(() => evalAll(src)).toThrow(`Invalid syntax: '${shown}'`);
  });

  it("evaluating a boolean value directly is invalid syntax", () => {
    expect(() => evaluate(VTrue, globalEnvironment())).toThrow("Invalid syntax: '#t'");
  });

  it("wraps host failures inside primitives", () => {
    try {
      evalAll("(/ 1 0)");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PrimitiveInvocationError);
      if (err instanceof PrimitiveInvocationError) {
        expect(err.source).toBe("(/ 1 0)");
        expect(err.args).toEqual([int(1), int(0)]);
        expect(err.reason).toBe("RangeError: division by zero");
        expect(sexpToString(err.procedure)).toBe("#<primitive />");
        expect(err.message).toBe(
          "Primitive invocation failed: RangeError: division by zero\n" +
            "invoking: #<primitive /> (1 0)\n" +
            "source: (/ 1 0)"
        );
      }
    }
  });

  it("calling a non-procedure is a primitive invocation failure", () => {
    try {
      evalAll("(5 1)");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PrimitiveInvocationError);
      if (err instanceof PrimitiveInvocationError) {
        expect(err.reason).toBe("TypeError: 5 is not a procedure");
        expect(err.expression).toEqual(parse("(5 1)"));
      }
    }
  });

  it("errors raised by closures called from primitives pass through unwrapped", () => {
    expect(() => evalAll("(map (lambda (x) missing) (list 1))")).toThrow(UnboundVariable);
  });
});

describe("applyProcedure", () => {
  it("applies closures and primitives to evaluated arguments", () => {
    const env = globalEnvironment();
    const square = evalAll("(lambda (x) (* x x))", env);
    expect(applyProcedure(square, [int(9)])).toEqual(int(81));
    expect(applyProcedure(env.lookup("+"), [int(1), int(2)])).toEqual(int(3));
  });

  it("rejects non-procedures", () => {
    expect(() => applyProcedure(int(1), [])).toThrow(TypeError);
  });

  it("passes itself to primitives as their host", () => {
    const twice = native("twice", (args, host) => host.apply(args[0], [host.apply(args[0], [args[1]])]));
    const env = globalEnvironment([["twice", twice]]);
    expect(evalAll("(twice (lambda (x) (+ x 1)) 5)", env)).toEqual(int(7));
  });
});
