// src/core/config/config.ts
// Configuration for the interpreter, its REPL and its CLI.
// Priority: CLI overrides > config file > environment > defaults

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReplConfig = {
  /** Prompt for the first line of an expression */
  prompt1: string;
  /** Prompt for continuation lines */
  prompt2: string;
  /** Prefix for reported errors */
  errorMark: string;
  /** Line that ends the REPL */
  quitCommand: string;
};

export type RuntimeConfig = {
  /** Rewrite tail calls in place instead of recursing */
  tailCalls: boolean;
  /** Emit trace events (defines, tail calls, primitive calls) */
  trace: boolean;
};

export type TailschemeConfig = {
  repl: ReplConfig;
  runtime: RuntimeConfig;
};

export type PartialConfig = {
  repl?: Partial<ReplConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt1: "▷  ",
  prompt2: "⋯    ",
  errorMark: "\u{1F6A8} ",
  quitCommand: ".q",
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  tailCalls: true,
  trace: false,
};

export const DEFAULT_CONFIG: TailschemeConfig = {
  repl: DEFAULT_REPL_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "tailscheme.config.json",
  "tailscheme.config.yaml",
  "tailscheme.config.yml",
];

// =========================================================================
// Configuration Loading
// =========================================================================

export function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  switch (raw.trim().toLowerCase()) {
    case "1": case "true": case "yes": case "on": return true;
    case "0": case "false": case "no": case "off": return false;
    default: return undefined;
  }
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "TAILSCHEME"): TailschemeConfig {
  const env = process.env;
  return {
    repl: {
      prompt1: env[`${prefix}_PROMPT1`] ?? DEFAULT_REPL_CONFIG.prompt1,
      prompt2: env[`${prefix}_PROMPT2`] ?? DEFAULT_REPL_CONFIG.prompt2,
      errorMark: env[`${prefix}_ERROR_MARK`] ?? DEFAULT_REPL_CONFIG.errorMark,
      quitCommand: env[`${prefix}_QUIT_COMMAND`] || DEFAULT_REPL_CONFIG.quitCommand,
    },
    runtime: {
      tailCalls: parseBool(env[`${prefix}_TAIL_CALLS`]) ?? DEFAULT_RUNTIME_CONFIG.tailCalls,
      trace: parseBool(env[`${prefix}_TRACE`]) ?? DEFAULT_RUNTIME_CONFIG.trace,
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** First string found under any of `keys`. */
function pickString(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

function pickBool(obj: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "boolean") return v;
    if (typeof v === "string") {
      const b = parseBool(v);
      if (b !== undefined) return b;
    }
  }
  return undefined;
}

/**
 * Create a partial configuration from a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys. Keys that are absent stay absent.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const replData = isRecord(data.repl) ? data.repl : {};
  const runtimeData = isRecord(data.runtime) ? data.runtime : {};

  const repl: Partial<ReplConfig> = {};
  const prompt1 = pickString(replData, "prompt1", "prompt_1");
  if (prompt1 !== undefined) repl.prompt1 = prompt1;
  const prompt2 = pickString(replData, "prompt2", "prompt_2");
  if (prompt2 !== undefined) repl.prompt2 = prompt2;
  const errorMark = pickString(replData, "errorMark", "error_mark");
  if (errorMark !== undefined) repl.errorMark = errorMark;
  const quitCommand = pickString(replData, "quitCommand", "quit_command");
  if (quitCommand !== undefined) repl.quitCommand = quitCommand;

  const runtime: Partial<RuntimeConfig> = {};
  const tailCalls = pickBool(runtimeData, "tailCalls", "tail_calls");
  if (tailCalls !== undefined) runtime.tailCalls = tailCalls;
  const trace = pickBool(runtimeData, "trace");
  if (trace !== undefined) runtime.trace = trace;

  return { repl, runtime };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: TailschemeConfig, ...configs: PartialConfig[]): TailschemeConfig {
  let result: TailschemeConfig = { repl: { ...base.repl }, runtime: { ...base.runtime } };

  for (const cfg of configs) {
    result = {
      repl: { ...result.repl, ...cfg.repl },
      runtime: { ...result.runtime, ...cfg.runtime },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
}): TailschemeConfig {
  // Start with env config (includes defaults)
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true" || value === "false") {
      parent[key] = value === "true";
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TailschemeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const quit = config.repl.quitCommand;
  if (quit.trim() === "") {
    errors.push("quitCommand must not be empty");
  } else if (/[()[\]{}]/.test(quit)) {
    errors.push(`quitCommand must not contain brackets: ${quit}`);
  }

  if (config.repl.prompt1 === "") {
    warnings.push("prompt1 is empty, the REPL will show no prompt");
  }
  if (!config.runtime.tailCalls) {
    warnings.push("tailCalls is disabled, deep tail recursion will exhaust the stack");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
