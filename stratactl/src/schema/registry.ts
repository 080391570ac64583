import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaName = "manifest" | "lockfile";

/**
 * Schema registry: discovers *.schema.json files and compiles validators on demand.
 */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      // "lockfile.schema.json" -> "lockfile"
      this.schemas.set(file.replace(/\.schema\.json$/, ""), schema);
    }

    this.ajv = await loadAjv();
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) this.ajv = await loadAjv();
    return this.ajv;
  }

  private async validator(name: SchemaName): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = (await this.instance()).compile(schema);
    this.validators.set(name, validate);
    return validate;
  }

  async validate(name: SchemaName, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.validator(name);
    const valid = validate(data);
    const ajv = await this.instance();
    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors),
    };
  }
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}
