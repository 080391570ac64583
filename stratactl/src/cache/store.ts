import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { errnoCode, errorMessage } from "../core/errors.js";
import { digestTree } from "./checksum.js";
import { copyTree, pathExists } from "./tree.js";

export type CacheEntryMeta = {
  name: string;
  version: string;
  digest: string;
};

/**
 * Content-addressed artifact cache. Injected into the installer, never a
 * process-wide singleton.
 */
export interface CacheStore {
  /** Directory holding the entry's files, or null on miss. */
  fetch(key: string): Promise<string | null>;
  /** Publish a copy of `sourceDir` under `key`; returns the entry's files directory. */
  store(key: string, sourceDir: string, meta: CacheEntryMeta): Promise<string>;
}

const KEY_PATTERN = /^[a-f0-9]{64}$/;

/** A published entry whose files no longer match the digest recorded at store time. */
export class CacheIntegrityError extends Error {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(message);
    this.name = "CacheIntegrityError";
  }
}

function readDigest(raw: string): string | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && "digest" in parsed && typeof parsed.digest === "string") {
    return parsed.digest;
  }
  return null;
}

/**
 * Durable cache on the local filesystem:
 *   <root>/entries/<key>/files/...   published artifact tree
 *   <root>/entries/<key>/entry.json  metadata
 *   <root>/tmp/                      staging for in-flight writes
 *
 * Entries appear only through rename of a complete staging directory, so an
 * interrupted store never leaves a visible hit. A fetch re-digests the files
 * and evicts an entry that was modified after publication.
 */
export class FsCacheStore implements CacheStore {
  constructor(private readonly root: string) {}

  entryDir(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    return path.join(this.root, "entries", key);
  }

  async fetch(key: string): Promise<string | null> {
    const dir = this.entryDir(key);
    const metaFile = path.join(dir, "entry.json");
    if (!(await pathExists(metaFile))) return null;

    const files = path.join(dir, "files");
    let expected: string | null;
    let actual: string | null = null;
    try {
      expected = readDigest(await fs.readFile(metaFile, "utf8"));
      if (expected !== null) actual = await digestTree(files);
    } catch (e) {
      await this.evict(key);
      throw new CacheIntegrityError(key, `Cache entry ${key} is unreadable: ${errorMessage(e)}`);
    }

    if (expected === null || actual !== expected) {
      await this.evict(key);
      throw new CacheIntegrityError(
        key,
        `Cache entry ${key} was modified after publication: recorded ${expected ?? "no digest"}, found ${actual ?? "nothing"}`,
      );
    }
    return files;
  }

  /** Take an entry out of view with one rename, then delete it. */
  private async evict(key: string): Promise<void> {
    const dir = this.entryDir(key);
    const tmpRoot = path.join(this.root, "tmp");
    await fs.mkdir(tmpRoot, { recursive: true });
    const doomed = path.join(tmpRoot, `${key}.evict.${randomBytes(4).toString("hex")}`);
    try {
      await fs.rename(dir, doomed);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return;
      throw e;
    }
    await fs.rm(doomed, { recursive: true, force: true });
  }

  async store(key: string, sourceDir: string, meta: CacheEntryMeta): Promise<string> {
    const dest = this.entryDir(key);
    if (await pathExists(path.join(dest, "entry.json"))) {
      return path.join(dest, "files");
    }

    const tmpRoot = path.join(this.root, "tmp");
    await fs.mkdir(tmpRoot, { recursive: true });
    await fs.mkdir(path.dirname(dest), { recursive: true });
    const staging = path.join(tmpRoot, `${key}.${process.pid}.${randomBytes(4).toString("hex")}`);

    try {
      await copyTree(sourceDir, path.join(staging, "files"), "copy");
      await fs.writeFile(
        path.join(staging, "entry.json"),
        JSON.stringify({ key, ...meta }, null, 2) + "\n",
        "utf8",
      );
      try {
        await fs.rename(staging, dest);
      } catch (e) {
        // Another writer published this key first. Same key means same content.
        const code = errnoCode(e);
        if (code !== "ENOTEMPTY" && code !== "EEXIST") throw e;
      }
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }

    return path.join(dest, "files");
  }

  /** Keys of every published entry. */
  async keys(): Promise<string[]> {
    const dir = path.join(this.root, "entries");
    if (!(await pathExists(dir))) return [];
    const names = await fs.readdir(dir);
    return names.filter((n) => KEY_PATTERN.test(n)).sort();
  }
}
