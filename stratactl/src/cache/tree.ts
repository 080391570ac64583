import fs from "node:fs/promises";
import path from "node:path";
import { errnoCode } from "../core/errors.js";

/** Regular files under `root`, as sorted POSIX relative paths. Symlinks are not followed. */
export async function listFiles(root: string): Promise<string[]> {
  const out: string[] = [];
  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), rel);
      } else if (entry.isFile()) {
        out.push(rel);
      }
    }
  }
  await walk(root, "");
  return out.sort();
}

export type TreeLinkMode = "copy" | "hardlink";

export type CopyStats = { files: number; linked: number; copied: number };

/** Hard links cannot cross devices; some filesystems refuse them outright. */
const LINK_FALLBACK_CODES = new Set(["EXDEV", "EPERM", "ENOTSUP", "EMLINK"]);

/**
 * Replicate the regular files of `src` under `dest`, preserving permission bits.
 * `hardlink` falls back to a copy per file where linking is refused.
 */
export async function copyTree(src: string, dest: string, mode: TreeLinkMode = "copy"): Promise<CopyStats> {
  const stats: CopyStats = { files: 0, linked: 0, copied: 0 };
  const files = await listFiles(src);
  await fs.mkdir(dest, { recursive: true });

  for (const rel of files) {
    const from = path.join(src, rel);
    const to = path.join(dest, rel);
    await fs.mkdir(path.dirname(to), { recursive: true });
    stats.files++;

    if (mode === "hardlink") {
      try {
        await fs.link(from, to);
        stats.linked++;
        continue;
      } catch (e) {
        if (!LINK_FALLBACK_CODES.has(errnoCode(e) ?? "")) throw e;
      }
    }

    await fs.copyFile(from, to);
    const st = await fs.stat(from);
    await fs.chmod(to, st.mode & 0o777);
    stats.copied++;
  }
  return stats;
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return false;
    throw e;
  }
}

/** Write via a sibling temp file and rename, so readers never see a partial file. */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmp, content.endsWith("\n") ? content : content + "\n", "utf8");
  await fs.rename(tmp, filePath);
}
