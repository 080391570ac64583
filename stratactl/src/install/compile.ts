import fs from "node:fs/promises";
import path from "node:path";
import vm from "node:vm";
import { listFiles } from "../cache/tree.js";

export const CODE_CACHE_DIR = "__v8cache__";

const COMPILABLE = /\.(c?js)$/;

export type CompileStats = { compiled: number; skipped: number };

// Matches the wrapper Node applies to CommonJS modules, so the cached data
// corresponds to the function V8 actually compiles at load time.
function wrapCommonJs(source: string): string {
  // A hashbang is only legal at the very start of a script
  const body = source.startsWith("#!") ? `//${source.slice(2)}` : source;
  return `(function (exports, require, module, __filename, __dirname) { ${body}\n});`;
}

/**
 * Ahead-of-time compile every script in `root`, writing V8 code cache data to
 * `<dir>/__v8cache__/<file>.<abiTag>.bin`. Files that do not parse as scripts
 * (ES modules, JSON-like fragments) are skipped.
 */
export async function compileTree(root: string, abiTag: string): Promise<CompileStats> {
  const stats: CompileStats = { compiled: 0, skipped: 0 };
  const files = (await listFiles(root)).filter(
    (rel) => COMPILABLE.test(rel) && !rel.split("/").includes(CODE_CACHE_DIR),
  );

  for (const rel of files) {
    const file = path.join(root, rel);
    const source = await fs.readFile(file, "utf8");
    let data: Buffer;
    try {
      const script = new vm.Script(wrapCommonJs(source), { filename: file });
      data = script.createCachedData();
    } catch {
      stats.skipped++;
      continue;
    }
    const out = path.join(path.dirname(file), CODE_CACHE_DIR, `${path.basename(rel)}.${abiTag}.bin`);
    await fs.mkdir(path.dirname(out), { recursive: true });
    await fs.writeFile(out, data);
    stats.compiled++;
  }
  return stats;
}
