import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { type Config, type ConfigInput, ConfigSchema } from "./schema.js";
import { ConfigError, errorMessage } from "../utils/errors.js";

export const CONFIG_FILE = ".fmtlatex.json";

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

let _cfgCache: Config | null = null;

function describeIssues(source: string, err: z.ZodError): string {
  const details = err.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
  return `Invalid configuration in ${source}: ${details.join("; ")}`;
}

function validate(source: string, input: unknown): Config {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(describeIssues(source, parsed.error));
  return parsed.data;
}

function readJsonIfExists(p: string): Record<string, unknown> | null {
  if (!fs.existsSync(p)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read ${p}: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(`Invalid configuration in ${p}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(data));
}

function parseIntVar(name: string, value: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new ConfigError(`Invalid configuration in environment: ${name} must be an integer, got "${value}"`);
  }
  return n;
}

function parseBoolVar(value: string): boolean {
  const v = value.toLowerCase();
  return v === "1" || v === "true" || v === "on" || v === "yes";
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const cfg: ConfigInput = {};
  if (env.WORKSPACE_ROOT) cfg.workspaceRoot = path.resolve(env.WORKSPACE_ROOT);
  if (env.FMTLATEX_WIDTH !== undefined) cfg.width = parseIntVar("FMTLATEX_WIDTH", env.FMTLATEX_WIDTH);
  if (env.FMTLATEX_MAX_BLANK_LINES !== undefined) {
    cfg.maxBlankLines = parseIntVar("FMTLATEX_MAX_BLANK_LINES", env.FMTLATEX_MAX_BLANK_LINES);
  }
  if (env.FMTLATEX_DEBUG !== undefined) cfg.debug = parseBoolVar(env.FMTLATEX_DEBUG);
  return cfg;
}

/**
 * Defaults, then `.fmtlatex.json` in the workspace root (or `cwd`), then the
 * environment. The result is cached until `reloadConfig`.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  if (_cfgCache) return _cfgCache;
  const env = fromEnv(options.env ?? process.env);
  const ws = env.workspaceRoot ?? options.cwd ?? process.cwd();
  const file = path.join(ws, CONFIG_FILE);
  const fileCfg = readJsonIfExists(file);

  if (fileCfg) validate(file, fileCfg);
  const merged = validate("environment", { ...fileCfg, ...env });
  // A relative root in the project file is taken relative to the file itself
  if (merged.workspaceRoot && !env.workspaceRoot) merged.workspaceRoot = path.resolve(ws, merged.workspaceRoot);
  _cfgCache = merged;
  return merged;
}

export function reloadConfig(options: LoadConfigOptions = {}): Config {
  _cfgCache = null;
  return loadConfig(options);
}

/** Apply per-call overrides (command-line flags, tool arguments) on top of `config`. */
export function withOverrides(config: Config, overrides: ConfigInput, source = "arguments"): Config {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  return validate(source, { ...config, ...defined });
}
