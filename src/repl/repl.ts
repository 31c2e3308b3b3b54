// src/repl/repl.ts
// Multi-line read-eval-print loop over an injectable line source.

import type { Binding, Environment } from "../core/eval/env";
import type { EvalOptions } from "../core/eval/evaluate";
import { Evaluator } from "../core/eval/evaluate";
import { isUnit } from "../core/eval/values";
import { InterpreterError, UnexpectedCloseParen, describeFailure } from "../core/errors";
import type { ReplConfig } from "../core/config";
import { DEFAULT_REPL_CONFIG } from "../core/config";
import { OPEN_BRACKETS, CLOSE_BRACKETS, parseAll } from "../core/reader";
import { sexpToString } from "../core/sexp";
import { sessionEnvironment } from "../core/run";

/** Raised by `multilineInput` when the quit command is entered. */
export class QuitRequest extends Error {
  constructor() {
    super("Quit requested");
    this.name = "QuitRequest";
  }
}

/** Raised by `multilineInput` when the line source is exhausted. */
export class EndOfInput extends Error {
  constructor() {
    super("End of input");
    this.name = "EndOfInput";
  }
}

/** Prompts, then resolves the next line, or null at end of input. */
export type InputFn = (prompt: string) => Promise<string | null>;

const ELLIPSIS = "…";
const MAX_SHOWN = 16;

function unexpectedClose(line: string): UnexpectedCloseParen {
  const shown = line.length < MAX_SHOWN ? line : ELLIPSIS + line.slice(-(MAX_SHOWN - 1));
  return new UnexpectedCloseParen(shown);
}

/**
 * Read lines until brackets balance. The first line is prompted with
 * `prompt1`, continuation lines with `prompt2`.
 */
export async function multilineInput(
  prompt1: string,
  prompt2: string,
  options: { quitCommand?: string; inputFn: InputFn }
): Promise<string> {
  const quitCommand = options.quitCommand ?? DEFAULT_REPL_CONFIG.quitCommand;
  const lines: string[] = [];
  let depth = 0;
  let prompt = prompt1;

  for (;;) {
    const raw = await options.inputFn(prompt);
    if (raw === null) throw new EndOfInput();
    const line = raw.trimEnd();
    if (line === quitCommand) throw new QuitRequest();

    for (const ch of line) {
      if (OPEN_BRACKETS.has(ch)) depth++;
      else if (CLOSE_BRACKETS.has(ch)) depth--;
      if (depth < 0) throw unexpectedClose(line);
    }

    lines.push(line);
    prompt = prompt2;
    if (depth === 0) break;
  }

  return lines.join("\n");
}

export type ReplOptions = Partial<ReplConfig> & {
  inputFn: InputFn;
  /** Results, `display` output and reported errors. */
  print?: (line: string) => void;
  /** Greeting. */
  printError?: (line: string) => void;
  evalOptions?: Partial<EvalOptions>;
  overrides?: Iterable<Binding>;
};

const REPL_HELP = [
  "Commands:",
  "  :env     List names defined in this session",
  "  :help    Show this help",
];

function replCommand(command: string, env: Environment, mark: string): string[] {
  switch (command) {
    case ":env": {
      const names = env.ownNames();
      return names.length === 0 ? ["(no definitions)"] : names;
    }
    case ":help":
      return REPL_HELP;
    default:
      return [`${mark}Unknown command: ${command}`];
  }
}

/**
 * Interactive loop with one persistent global environment. Returns when the
 * quit command is entered or input ends.
 */
export async function multilineRepl(options: ReplOptions): Promise<void> {
  const cfg: ReplConfig = {
    prompt1: options.prompt1 ?? DEFAULT_REPL_CONFIG.prompt1,
    prompt2: options.prompt2 ?? DEFAULT_REPL_CONFIG.prompt2,
    errorMark: options.errorMark ?? DEFAULT_REPL_CONFIG.errorMark,
    quitCommand: options.quitCommand ?? DEFAULT_REPL_CONFIG.quitCommand,
  };
  const print = options.print ?? ((line: string) => console.log(line));
  const printError = options.printError ?? ((line: string) => console.error(line));

  const env = sessionEnvironment(options.overrides, { ...options.evalOptions, output: print });
  const evaluator = new Evaluator(options.evalOptions);

  printError(`To exit type ${cfg.quitCommand}`);

  for (;;) {
    // ── read ──
    let source: string;
    try {
      source = await multilineInput(cfg.prompt1, cfg.prompt2, {
        quitCommand: cfg.quitCommand,
        inputFn: options.inputFn,
      });
    } catch (err) {
      if (err instanceof QuitRequest || err instanceof EndOfInput) return;
      if (err instanceof UnexpectedCloseParen) {
        print(`${cfg.errorMark}${err.message}`);
        continue;
      }
      throw err;
    }

    const trimmed = source.trim();
    if (!trimmed) continue;

    if (trimmed.startsWith(":")) {
      for (const line of replCommand(trimmed, env, cfg.errorMark)) print(line);
      continue;
    }

    // ── eval / print ──
    try {
      for (const expr of parseAll(source)) {
        const result = evaluator.evaluate(expr, env);
        if (!isUnit(result)) print(sexpToString(result));
      }
    } catch (err) {
      if (err instanceof InterpreterError) {
        print(`${cfg.errorMark}${err.message}`);
      } else if (err instanceof Error) {
        // Host failures outside primitives, e.g. stack exhaustion with tail calls off.
        print(`${cfg.errorMark}${describeFailure(err)}`);
      } else {
        throw err;
      }
    }
  }
}
