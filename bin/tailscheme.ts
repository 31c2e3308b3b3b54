#!/usr/bin/env npx tsx
// bin/tailscheme.ts
// tailscheme CLI: interactive REPL, file execution, expression evaluation.
//
// Run:  npx tsx bin/tailscheme.ts [options] [file] [name=value ...]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  unboundVariableHint,
} from "./tailscheme-cli-lib";
import type { CliConfig } from "./tailscheme-cli-lib";
import type { InputFn, RunOptions, TailschemeConfig } from "../src";
import {
  InterpreterError,
  UnboundVariable,
  consoleTrace,
  envFromArgs,
  isUnit,
  loadConfig,
  multilineRepl,
  run,
  runFile,
  sexpToString,
  validateConfig,
} from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const cliArgs = parseCliArgs(argv);

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const config = buildConfig(cliArgs);
  const settings = loadConfig({ configFile: config.configFile, overrides: config.overrides });

  const validation = validateConfig(settings);
  for (const warning of validation.warnings) {
    if (config.verbose) console.error(`warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const error of validation.errors) console.error(`config error: ${error}`);
    process.exit(1);
  }

  const runOptions: RunOptions = {
    tailCalls: settings.runtime.tailCalls,
    trace: settings.runtime.trace ? consoleTrace() : undefined,
  };

  if (config.mode === "exec") {
    process.exitCode = executeMode(config, settings, runOptions, argv);
  } else {
    await replMode(settings, runOptions);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(config: CliConfig, settings: TailschemeConfig, options: RunOptions, argv: string[]): number {
  const overrides = envFromArgs(config.defines);
  const mark = settings.repl.errorMark;

  try {
    if (config.file) {
      const file = config.file;
      runFile({ read: () => fs.readFileSync(file, "utf8") }, overrides, options);
    } else {
      const result = run(config.code ?? "", overrides, options);
      if (!isUnit(result)) console.log(sexpToString(result));
    }
    return 0;
  } catch (error) {
    if (error instanceof UnboundVariable) {
      for (const line of unboundVariableHint(mark, error.symbol, argv)) console.error(line);
      return 1;
    }
    if (error instanceof InterpreterError) {
      console.error(`${mark}${error.message}`);
      return 1;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (config.verbose) console.error(error.stack);
      return 1;
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(settings: TailschemeConfig, options: RunOptions): Promise<void> {
  const isTTY = Boolean(process.stdin.isTTY);
  const rl = readline.createInterface({
    input: process.stdin,
    output: isTTY ? process.stdout : undefined,
    terminal: isTTY,
  });
  const lines = rl[Symbol.asyncIterator]();

  const inputFn: InputFn = async (prompt) => {
    if (isTTY) {
      rl.setPrompt(prompt);
      rl.prompt();
    }
    const next = await lines.next();
    return next.done ? null : next.value;
  };

  try {
    await multilineRepl({ ...settings.repl, inputFn, evalOptions: options });
  } finally {
    rl.close();
    process.stdin.pause();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
