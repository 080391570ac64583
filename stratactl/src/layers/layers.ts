import path from "node:path";
import { minimatch } from "minimatch";
import { computeSha256, computeSha256FromContent } from "../cache/checksum.js";
import { listFiles } from "../cache/tree.js";
import type { InstallMode } from "../install/installer.js";
import { DEPENDENCY_SCOPE } from "../install/installer.js";

export type CacheScope = typeof DEPENDENCY_SCOPE | "none";

/**
 * A named install phase. `inputs` are the project files visible to the phase;
 * `cacheScope` is the only cache-key scope the phase may touch.
 */
export type LayerDefinition = {
  name: string;
  mode: InstallMode;
  cacheScope: CacheScope;
  inputs: string[];
  exclude?: string[];
};

/**
 * Dependencies first, keyed only by manifest, lockfile and package sources, so
 * editing application code never changes what the first layer sees.
 */
export function defaultLayers(opts: { manifest: string; lockfile: string; envDir: string; sources: string[] }): LayerDefinition[] {
  const envRel = toPosix(opts.envDir).replace(/\/+$/, "");
  const sourceGlobs = [...new Set(opts.sources.map((s) => `${toPosix(s).replace(/\/+$/, "")}/**`))].sort();
  return [
    {
      name: "dependencies",
      mode: "deps_only",
      cacheScope: DEPENDENCY_SCOPE,
      inputs: [toPosix(opts.manifest), toPosix(opts.lockfile), ...sourceGlobs],
    },
    {
      name: "project",
      mode: "full",
      cacheScope: "none",
      inputs: ["**"],
      exclude: [`${envRel}/**`, ".git/**", "**/node_modules/**", ".strata/**"],
    },
  ];
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/").replace(/^\.\//, "");
}

export function isVisible(layer: LayerDefinition, rel: string): boolean {
  const opts = { dot: true };
  if (!layer.inputs.some((g) => minimatch(rel, g, opts))) return false;
  return !(layer.exclude ?? []).some((g) => minimatch(rel, g, opts));
}

/** Project files the layer can see, sorted. */
export async function visibleFiles(root: string, layer: LayerDefinition): Promise<string[]> {
  const files = await listFiles(root);
  return files.filter((rel) => isVisible(layer, rel));
}

/** Digest over the visible files' paths and contents. */
export async function fingerprintLayer(root: string, layer: LayerDefinition): Promise<string> {
  const lines: string[] = [];
  for (const rel of await visibleFiles(root, layer)) {
    lines.push(`${rel}\0${await computeSha256(path.join(root, rel))}\n`);
  }
  return `sha256-${computeSha256FromContent(`${layer.name}\n${lines.join("")}`)}`;
}
