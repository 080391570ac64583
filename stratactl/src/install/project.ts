import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { computeSha256FromContent } from "../cache/checksum.js";
import { BootstrapError, errnoCode, errorMessage } from "../core/errors.js";
import { createRegistry, type SchemaName, type SchemaRegistry } from "../schema/registry.js";
import type { StrataConfig } from "../types/config.js";
import type { Lockfile } from "../types/lockfile.js";
import type { Manifest } from "../types/manifest.js";

export type LoadedProject = {
  root: string;
  manifestPath: string;
  lockfilePath: string;
  manifest: Manifest;
  lockfile: Lockfile;
  /** SHA-256 of the lockfile bytes. */
  lockDigest: string;
};

async function readInput(filePath: string, kind: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new BootstrapError("CONFIG_MISSING", `${kind} not found: ${filePath}`, { details: { path: filePath } });
    }
    throw new BootstrapError("CONFIG_MISSING", `${kind} unreadable (${filePath}): ${errorMessage(e)}`, {
      details: { path: filePath },
      cause: e,
    });
  }
}

async function parseDocument<T>(
  registry: SchemaRegistry,
  schema: SchemaName,
  raw: string,
  filePath: string,
  kind: string,
): Promise<T> {
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new BootstrapError("CONFIG_MISSING", `${kind} is not valid YAML (${filePath}): ${errorMessage(e)}`, {
      details: { path: filePath },
      cause: e,
    });
  }
  const { valid, errors } = await registry.validate(schema, doc);
  if (!valid) {
    throw new BootstrapError("CONFIG_MISSING", `${kind} invalid (${filePath}): ${errors}`, {
      details: { path: filePath },
    });
  }
  return doc as T;
}

/** Read and schema-check the manifest and lockfile. Nothing is written. */
export async function loadProject(
  root: string,
  config: Pick<StrataConfig, "manifest" | "lockfile">,
  registry?: SchemaRegistry,
): Promise<LoadedProject> {
  const reg = registry ?? (await createRegistry());
  const manifestPath = path.resolve(root, config.manifest);
  const lockfilePath = path.resolve(root, config.lockfile);

  const manifestRaw = await readInput(manifestPath, "Manifest");
  const lockRaw = await readInput(lockfilePath, "Lockfile");

  const manifest = await parseDocument<Manifest>(reg, "manifest", manifestRaw, manifestPath, "Manifest");
  const lockfile = await parseDocument<Lockfile>(reg, "lockfile", lockRaw, lockfilePath, "Lockfile");

  return {
    root: path.resolve(root),
    manifestPath,
    lockfilePath,
    manifest,
    lockfile,
    lockDigest: computeSha256FromContent(lockRaw),
  };
}
