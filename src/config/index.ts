/**
 * Configuration system for gfx-prune.
 *
 * Precedence: CLI flags > environment > config.yaml > built-in defaults.
 * The config file is --config, else $GFX_PRUNE_CONFIG, else
 * ~/.gfx-prune/config.yaml when it exists.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { errorMessage, isRecord, isStringArray } from "../shared/guards.js";
import type { LogLevel } from "../shared/types.js";
import { normalizeLogLevel } from "../logging/levels.js";
import { BASEDIRS, DIRTREES, validateTemplate } from "../prune/templates.js";
import { DEFAULT_PYTHON } from "../prune/torch.js";

const STATE_DIRNAME = ".gfx-prune";
const CONFIG_FILENAME = "config.yaml";

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GFX_PRUNE_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new Error(
        `Invalid GFX_PRUNE_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new Error(`Invalid GFX_PRUNE_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export interface GfxPruneConfig {
  /** Library directory templates whose kernel files are pruned. */
  basedirs: string[];
  /** Generation tree templates removed as a whole. */
  dirtrees: string[];
  /** Sysroot prefixed to every path, e.g. a mounted image. */
  root?: string;
  /** Interpreter used to locate torch. */
  python: string;
  logLevel: LogLevel;
}

export type ConfigFile = Partial<GfxPruneConfig>;

/** Values that win over file and environment (CLI flags). */
export interface ConfigOverrides {
  root?: string;
  python?: string;
  logLevel?: string;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Load and validate a config file.
 *
 * @throws Error naming the file and the offending key.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    throw new Error(`Config file ${filePath} is not valid YAML: ${errorMessage(error)}`);
  }

  // An empty file parses to null.
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error(`Config file ${filePath} must be a mapping`);
  }

  const config: ConfigFile = {};

  for (const key of ["basedirs", "dirtrees"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isStringArray(value)) {
      throw new Error(`Config file ${filePath}: "${key}" must be a list of path templates`);
    }
    for (const template of value) {
      try {
        validateTemplate(template);
      } catch (error: unknown) {
        throw new Error(`Config file ${filePath}: "${key}": ${errorMessage(error)}`);
      }
    }
    config[key] = value;
  }

  for (const key of ["root", "python"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || !value.trim()) {
      throw new Error(`Config file ${filePath}: "${key}" must be a non-empty string`);
    }
    config[key] = value;
  }

  const logLevel = raw.logLevel;
  if (logLevel !== undefined) {
    if (typeof logLevel !== "string") {
      throw new Error(`Config file ${filePath}: "logLevel" must be a string`);
    }
    try {
      config.logLevel = normalizeLogLevel(logLevel);
    } catch (error: unknown) {
      throw new Error(`Config file ${filePath}: ${errorMessage(error)}`);
    }
  }

  return config;
}

/** Pick the config file to read, or null when none applies. */
export function locateConfigFile(options: LoadConfigOptions = {}): string | null {
  if (options.configPath) return path.resolve(options.configPath);

  const env = options.env ?? process.env;
  const fromEnv = env.GFX_PRUNE_CONFIG?.trim();
  if (fromEnv) return path.resolve(fromEnv);

  const fallback = resolveConfigPath(resolveStateDir(env));
  return fs.existsSync(fallback) ? fallback : null;
}

export function loadConfig(options: LoadConfigOptions = {}): GfxPruneConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const configFile = locateConfigFile(options);
  const file: ConfigFile = configFile ? loadConfigFile(configFile) : {};

  const root = overrides.root ?? nonEmpty(env.GFX_PRUNE_ROOT) ?? file.root;
  const levelName = overrides.logLevel ?? nonEmpty(env.GFX_PRUNE_LOG_LEVEL);

  return {
    basedirs: file.basedirs ?? [...BASEDIRS],
    dirtrees: file.dirtrees ?? [...DIRTREES],
    root: root ? path.resolve(root) : undefined,
    python: overrides.python ?? nonEmpty(env.GFX_PRUNE_PYTHON) ?? file.python ?? DEFAULT_PYTHON,
    logLevel: levelName ? normalizeLogLevel(levelName) : (file.logLevel ?? "info"),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
