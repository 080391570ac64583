import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { BootstrapError, errorMessage } from "../core/errors.js";
import type { ConfigOverrides, StrataConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "STRATA_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new BootstrapError("CONFIG_MISSING", `Config file is not valid YAML (${filePath}): ${errorMessage(e)}`, {
      details: { path: filePath },
      cause: e,
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new BootstrapError("CONFIG_MISSING", `Config file must hold a mapping: ${filePath}`, {
      details: { path: filePath },
    });
  }
  return parsed;
}

/**
 * STRATA_LINK_MODE=hardlink -> link_mode: "hardlink".
 * Values are read as YAML scalars so STRATA_COMPILE_BYTECODE=1 and =true both work.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // STRATA_ENV is exported into launched processes, not a config key
    if (key === "STRATA_ENV") continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    out[configKey] = parseScalar(value);
  }
  return out;
}

function parseScalar(value: string): unknown {
  if (value === "") return "";
  try {
    const parsed: unknown = YAML.parse(value);
    return typeof parsed === "object" && parsed !== null ? value : parsed ?? value;
  } catch {
    return value;
  }
}

function dropUndefined(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
}

export type LoadConfigOptions = {
  /** Environment layer: loads `<configDir>/<envName>.yaml` over base.yaml. */
  envName?: string;
  configDir?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml <- <env>.yaml <- STRATA_* variables <- overrides.
 * An invalid result is a CONFIG_MISSING bootstrap error.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<StrataConfig> {
  const dir = opts.configDir ?? CONFIG_DIR;

  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new BootstrapError("CONFIG_MISSING", `Base config not found: ${basePath}`, { details: { path: basePath } });
  }

  let merged = loadYaml(basePath);
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));
  merged = deepMerge(merged, dropUndefined(opts.overrides ?? {}));

  const res = await validateConfig(merged);
  if (!res.valid) {
    throw new BootstrapError("CONFIG_MISSING", `Config invalid: ${res.errors}`, { details: { configDir: dir } });
  }
  return res.config;
}

/** Absolute cache root: configured value, else ~/.cache/strata. Leading ~ expands to the home dir. */
export function resolveCacheDir(config: StrataConfig, projectRoot: string): string {
  const raw = config.cache_dir.trim();
  if (raw === "") return path.join(os.homedir(), ".cache", "strata");
  if (raw === "~" || raw.startsWith("~/")) return path.join(os.homedir(), raw.slice(1));
  return path.resolve(projectRoot, raw);
}
