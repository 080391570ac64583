import fs from "node:fs/promises";
import path from "node:path";
import { canonicalJson } from "../cache/cache-key.js";
import { atomicWriteText } from "../cache/tree.js";
import { errnoCode } from "../core/errors.js";
import type { EnvironmentRecord } from "../types/environment.js";

export const RECORD_FILE = "strata-env.json";

export function envPaths(envDir: string): { bin: string; lib: string; record: string } {
  return {
    bin: path.join(envDir, "bin"),
    lib: path.join(envDir, "lib", "node_modules"),
    record: path.join(envDir, RECORD_FILE),
  };
}

export function emptyRecord(lockDigest: string, projectName: string): EnvironmentRecord {
  return {
    version: 1,
    lock_digest: lockDigest,
    project: { name: projectName, linked: false },
    packages: {},
    layers: {},
  };
}

function isRecord(v: unknown): v is EnvironmentRecord {
  if (typeof v !== "object" || v === null) return false;
  if (!("version" in v) || v.version !== 1) return false;
  if (!("packages" in v) || typeof v.packages !== "object" || v.packages === null) return false;
  return "project" in v && typeof v.project === "object" && v.project !== null;
}

/** Existing record, or null for a fresh or unrecognised environment. */
export async function readRecord(envDir: string): Promise<EnvironmentRecord | null> {
  let raw: string;
  try {
    raw = await fs.readFile(envPaths(envDir).record, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return null;
    throw e;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? { ...parsed, layers: parsed.layers ?? {} } : null;
  } catch {
    // Corrupted record: rebuild from scratch
    return null;
  }
}

/** Canonical JSON so identical environments produce identical bytes. */
export async function writeRecord(envDir: string, record: EnvironmentRecord): Promise<void> {
  const pretty = JSON.stringify(JSON.parse(canonicalJson(record)), null, 2);
  await atomicWriteText(envPaths(envDir).record, pretty);
}
