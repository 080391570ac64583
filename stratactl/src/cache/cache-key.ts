import { computeSha256FromContent } from "./checksum.js";

const KEY_FORMAT = 1;

export type CacheKeyInput = {
  /** Layer cache scope the key belongs to. */
  scope: string;
  name: string;
  version: string;
  integrity: string;
  compileBytecode: boolean;
  /** Runtime ABI tag; only meaningful when compiled output is part of the artifact. */
  runtime: string | null;
};

/** V8 code caches are only valid for the ABI that produced them. */
export function runtimeTag(): string {
  return `node-abi${process.versions.modules}-v8-${process.versions.v8}`;
}

/** Sorted-key JSON, so property order never changes a key. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function deriveCacheKey(input: CacheKeyInput): string {
  return computeSha256FromContent(
    canonicalJson({
      format: KEY_FORMAT,
      scope: input.scope,
      name: input.name,
      version: input.version,
      integrity: input.integrity,
      compile_bytecode: input.compileBytecode,
      runtime: input.compileBytecode ? input.runtime : null,
    }),
  );
}
