import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { listFiles } from "./tree.js";

/** Compute SHA256 hash of a file. */
export async function computeSha256(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Tree digest: "<relpath>\0<sha256>\n" per regular file in path order,
 * hashed again. Symlinks and empty directories do not contribute.
 */
export async function digestTree(root: string): Promise<string> {
  const files = await listFiles(root);
  const outer = createHash("sha256");
  for (const rel of files) {
    const sha = await computeSha256(path.join(root, rel));
    outer.update(`${rel}\0${sha}\n`);
  }
  return `sha256-${outer.digest("hex")}`;
}
