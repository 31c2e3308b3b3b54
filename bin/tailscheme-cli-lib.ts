// bin/tailscheme-cli-lib.ts
// Shared CLI utilities for the tailscheme command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { PartialConfig } from "../src/core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  verbose?: boolean;
  noTco?: boolean;
  config?: string;
  /** `name=value` arguments, in order. */
  defines: string[];
  mode?: "repl" | "exec";
};

export type CliConfig = {
  mode: "repl" | "exec";
  verbose: boolean;
  code?: string;
  file?: string;
  configFile?: string;
  defines: string[];
  /** Settings given on the command line; they win over every other layer. */
  overrides: PartialConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { defines: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--no-tco") {
      result.noTco = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] || "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (!arg.startsWith("-")) {
      if (arg.includes("=")) {
        result.defines.push(arg);
      } else if (!result.file) {
        // First non-flag argument is the file
        result.file = arg;
        result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  // Default mode is REPL if no exec mode was set
  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
tailscheme - a small Scheme with proper tail calls

USAGE:
  tailscheme [options]                      Start the interactive REPL
  tailscheme [options] <file> [name=value]  Run a program file
  tailscheme --eval <code> [name=value]     Evaluate code and print the result

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Evaluate code and exit
  -c, --config <file>                Read settings from a JSON or YAML file
  --verbose                          Trace defines, tail calls and primitive calls to stderr
  --no-tco                           Evaluate calls recursively (no tail-call elimination)

REPL COMMANDS:
  :env                               List names defined in this session
  :help                              Show REPL help
  .q                                 Exit the REPL

ENVIRONMENT:
  TAILSCHEME_PROMPT1, TAILSCHEME_PROMPT2, TAILSCHEME_ERROR_MARK,
  TAILSCHEME_QUIT_COMMAND, TAILSCHEME_TAIL_CALLS, TAILSCHEME_TRACE

EXAMPLES:
  tailscheme                                 # Start REPL
  tailscheme examples/countdown.scm n=100000 # Run a file with n bound to 100000
  tailscheme --no-tco examples/countdown.scm n=100000  # Same, without tail calls
  tailscheme --eval "(+ 1 2)"                # Evaluate expression
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `tailscheme v${pkg.version}`;
    }
    return "tailscheme v0.1.0";
  } catch {
    return "tailscheme v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const mode = detectMode(args);

  const runtime: NonNullable<PartialConfig["runtime"]> = {};
  if (args.noTco) runtime.tailCalls = false;
  if (args.verbose) runtime.trace = true;

  const config: CliConfig = {
    mode,
    verbose: args.verbose || false,
    defines: args.defines ?? [],
    overrides: { runtime },
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lines shown when a batch run hits an unbound variable: the name, and the
 * command line that would bind it.
 */
export function unboundVariableHint(errorMark: string, symbol: string, argv: string[]): string[] {
  const cmd = ["tailscheme", ...argv].join(" ");
  return [
    `${errorMark}'${symbol}' was not defined.`,
    "    You can define it as an option:",
    `    $ ${cmd} ${symbol}=<value>`,
  ];
}
