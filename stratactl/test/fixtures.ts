import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { digestTree } from "../src/cache/checksum.js";
import type { StrataConfig } from "../src/types/config.js";
import type { LockedPackage, Lockfile } from "../src/types/lockfile.js";
import type { Manifest } from "../src/types/manifest.js";

export type FixturePackage = {
  name: string;
  version: string;
  files: Record<string, string>;
  dependencies?: string[];
  bin?: Record<string, string>;
};

export type FixtureProject = {
  root: string;
  cacheDir: string;
  envDir: string;
  manifest: Manifest;
  lockfile: Lockfile;
};

export type FixtureOptions = {
  name?: string;
  packages?: FixturePackage[];
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  projectFiles?: Record<string, string>;
  bin?: Record<string, string>;
};

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `strata-${prefix}-`));
}

function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, "utf8");
  }
}

export const DEFAULT_PACKAGES: FixturePackage[] = [
  {
    name: "left-pad",
    version: "1.3.0",
    files: {
      "index.js": "module.exports = (s, n) => String(s).padStart(n);\n",
      "bin/cli.js": "#!/usr/bin/env node\nconsole.log('left-pad');\n",
    },
    dependencies: ["tiny-util"],
    bin: { "left-pad": "bin/cli.js" },
  },
  {
    name: "tiny-util",
    version: "2.0.1",
    files: { "index.js": "exports.id = (x) => x;\n" },
  },
  {
    name: "test-helper",
    version: "0.4.0",
    files: {
      "index.js": "exports.check = () => true;\n",
      "bin/check.js": "#!/usr/bin/env node\n",
    },
    bin: { "test-helper": "bin/check.js" },
  },
];

/**
 * A project on disk with vendored package sources and a lockfile whose
 * integrity values match them. Cache and environment live in their own
 * temp directories.
 */
export async function makeProject(opts: FixtureOptions = {}): Promise<FixtureProject> {
  const root = tmpDir("project");
  const name = opts.name ?? "demo-app";
  const packages = opts.packages ?? DEFAULT_PACKAGES;
  const dependencies = opts.dependencies ?? { "left-pad": "^1.3.0" };
  const devDependencies = opts.devDependencies ?? { "test-helper": "~0.4.0" };

  const locked: LockedPackage[] = [];
  for (const pkg of packages) {
    const rel = `vendor/${pkg.name}-${pkg.version}`;
    writeFiles(path.join(root, rel), pkg.files);
    const entry: LockedPackage = {
      name: pkg.name,
      version: pkg.version,
      source: { path: rel },
      integrity: await digestTree(path.join(root, rel)),
    };
    if (pkg.dependencies) entry.dependencies = pkg.dependencies;
    if (pkg.bin) entry.bin = pkg.bin;
    locked.push(entry);
  }

  const manifest: Manifest = { name, version: "0.1.0", dependencies, dev_dependencies: devDependencies };
  if (opts.bin) manifest.bin = opts.bin;
  const lockfile: Lockfile = {
    version: 1,
    project: { name, requires: dependencies, dev_requires: devDependencies },
    packages: locked,
  };

  writeFiles(root, {
    "strata.yaml": YAML.stringify(manifest),
    "strata.lock": JSON.stringify(lockfile, null, 2) + "\n",
    "app.js": "console.log('hello');\n",
    ...(opts.projectFiles ?? {}),
  });

  return { root, cacheDir: tmpDir("cache"), envDir: path.join(root, ".strata", "env"), manifest, lockfile };
}

export function writeManifest(root: string, manifest: Manifest): void {
  fs.writeFileSync(path.join(root, "strata.yaml"), YAML.stringify(manifest), "utf8");
}

export function writeLockfile(root: string, lockfile: Lockfile): void {
  fs.writeFileSync(path.join(root, "strata.lock"), JSON.stringify(lockfile, null, 2) + "\n", "utf8");
}

export function testConfig(fixture: Pick<FixtureProject, "cacheDir">, overrides: Partial<StrataConfig> = {}): StrataConfig {
  return {
    schema_version: "1.0.0",
    manifest: "strata.yaml",
    lockfile: "strata.lock",
    env_dir: ".strata/env",
    cache_dir: fixture.cacheDir,
    frozen: true,
    no_dev: false,
    compile_bytecode: false,
    link_mode: "copy",
    no_sync: false,
    concurrency: 4,
    ...overrides,
  };
}

/**
 * Every entry under `dir` with a content fingerprint: file bytes, symlink
 * targets, or "dir". Used to compare two environments for identity.
 */
export function snapshotTree(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  function walk(current: string, prefix: string): void {
    for (const entry of fs.readdirSync(current, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : 1))) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      const full = path.join(current, entry.name);
      if (entry.isSymbolicLink()) {
        out[rel] = `-> ${fs.readlinkSync(full)}`;
      } else if (entry.isDirectory()) {
        out[rel] = "dir";
        walk(full, rel);
      } else {
        const mode = (fs.statSync(full).mode & 0o777).toString(8);
        out[rel] = `${mode} ${fs.readFileSync(full).toString("base64")}`;
      }
    }
  }
  walk(dir, "");
  return out;
}
