import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/**
 * `coerceTypes` lets config values that arrive as strings (env vars, YAML
 * scalars) validate as the booleans and integers the schema declares.
 * Coercion mutates the validated object in place.
 */
export async function loadAjv(opts?: { coerceTypes?: boolean; useDefaults?: boolean }): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({
    allErrors: true,
    strict: true,
    coerceTypes: opts?.coerceTypes ?? false,
    useDefaults: opts?.useDefaults ?? false,
  });
  add(ajv);

  return ajv;
}
