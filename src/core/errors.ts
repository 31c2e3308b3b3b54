// src/core/errors.ts
// Error taxonomy shared by the reader, the evaluator and the runners.

import type { Value } from "./eval/values";

/**
 * Base of every error the interpreter raises on purpose.
 * The message is the class description, followed by the offending value when
 * there is one: `Unbound variable: 'x'`.
 */
export class InterpreterError extends Error {
  constructor(
    public readonly description: string,
    public readonly value = ""
  ) {
    super(formatMessage(description, value));
    this.name = "InterpreterError";
  }
}

function formatMessage(description: string, value: string): string {
  if (!value) return `${description}.`;
  // Values that carry quotes or span lines are shown as-is.
  const shown = value.includes("'") || value.includes("\n") ? value : `'${value}'`;
  return `${description}: ${shown}`;
}

// ─────────────────────────────────────────────────────────────────
// Reader errors
// ─────────────────────────────────────────────────────────────────

export class ReaderError extends InterpreterError {
  constructor(description: string, value = "") {
    super(description, value);
    this.name = "ReaderError";
  }
}

export class UnexpectedCloseParen extends ReaderError {
  constructor(value = "") {
    super("Unexpected close parenthesis", value);
    this.name = "UnexpectedCloseParen";
  }
}

export class UnexpectedEndOfSource extends ReaderError {
  constructor(value = "") {
    super("Unexpected end of source code", value);
    this.name = "UnexpectedEndOfSource";
  }
}

// ─────────────────────────────────────────────────────────────────
// Evaluator errors
// ─────────────────────────────────────────────────────────────────

export class EvaluatorError extends InterpreterError {
  constructor(description = "Exception while evaluating", value = "") {
    super(description, value);
    this.name = "EvaluatorError";
  }
}

export class UnboundVariable extends EvaluatorError {
  constructor(public readonly symbol: string) {
    super("Unbound variable", symbol);
    this.name = "UnboundVariable";
  }
}

export class InvalidSyntax extends EvaluatorError {
  constructor(public readonly source: string) {
    super("Invalid syntax", source);
    this.name = "InvalidSyntax";
  }
}

export type PrimitiveFailure = {
  /** Printed form of the call that failed. */
  source: string;
  /** The callee, already evaluated. */
  procedure: Value;
  /** Evaluated arguments, as passed to the callee. */
  args: Value[];
  /** Description of the host failure. */
  reason: string;
  /** The raw call expression. */
  expression: Value;
};

export class PrimitiveInvocationError extends EvaluatorError {
  public readonly source: string;
  public readonly procedure: Value;
  public readonly args: Value[];
  public readonly reason: string;
  public readonly expression: Value;

  constructor(failure: PrimitiveFailure, invoking: string) {
    super(
      "Primitive invocation failed",
      `${failure.reason}\ninvoking: ${invoking}\nsource: ${failure.source}`
    );
    this.name = "PrimitiveInvocationError";
    this.source = failure.source;
    this.procedure = failure.procedure;
    this.args = failure.args;
    this.reason = failure.reason;
    this.expression = failure.expression;
  }
}

/** Description of a thrown host value, as `Name: message`. */
export function describeFailure(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
