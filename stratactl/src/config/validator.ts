import { loadAjv } from "../schema/ajv.js";
import type { StrataConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "manifest", "lockfile", "env_dir"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manifest: { type: "string", minLength: 1 },
    lockfile: { type: "string", minLength: 1 },
    env_dir: { type: "string", minLength: 1 },
    cache_dir: { type: "string", default: "" },
    frozen: { type: "boolean", default: true },
    no_dev: { type: "boolean", default: false },
    compile_bytecode: { type: "boolean", default: false },
    link_mode: { type: "string", enum: ["copy", "hardlink"], default: "copy" },
    no_sync: { type: "boolean", default: false },
    concurrency: { type: "integer", minimum: 1, maximum: 64, default: 4 },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: StrataConfig; errors: null }
  | { valid: false; config: null; errors: string };

/**
 * Validate a merged config. Missing optional keys receive their defaults and
 * string scalars are coerced, both in place.
 */
export async function validateConfig(config: Record<string, unknown>): Promise<ConfigValidationResult> {
  const ajv = await loadAjv({ coerceTypes: true, useDefaults: true });
  const validate = ajv.compile(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config: config as unknown as StrataConfig, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors) };
}
