import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pLimit from "p-limit";
import { deriveCacheKey, runtimeTag } from "../cache/cache-key.js";
import { digestTree } from "../cache/checksum.js";
import { CacheIntegrityError, type CacheStore } from "../cache/store.js";
import { copyTree, pathExists } from "../cache/tree.js";
import { diag, silentReporter, type Reporter } from "../core/diagnostics.js";
import { BootstrapError, errorMessage, toInstallIOError } from "../core/errors.js";
import type { LinkMode } from "../types/config.js";
import type { EnvironmentRecord, InstalledPackage } from "../types/environment.js";
import type { LockedPackage } from "../types/lockfile.js";
import { compileTree } from "./compile.js";
import { emptyRecord, envPaths, readRecord, writeRecord } from "./environment-record.js";
import { checkLock, formatMismatches, selectPackages, type LockMismatch } from "./lock-check.js";
import type { LoadedProject } from "./project.js";

/** Cache scope of every third-party package key. */
export const DEPENDENCY_SCOPE = "dependencies";

export type InstallMode = "deps_only" | "full";

export type InstallOptions = {
  mode: InstallMode;
  cache: CacheStore;
  frozen: boolean;
  noDev: boolean;
  compileBytecode: boolean;
  linkMode: LinkMode;
  concurrency?: number;
  /** Layer fingerprint to record in the environment. */
  layer?: { name: string; fingerprint: string };
  reporter?: Reporter;
};

export type InstallReport = {
  mode: InstallMode;
  installed: string[];
  skipped: string[];
  removed: string[];
  cacheHits: number;
  cacheMisses: number;
  compiled: number;
  projectLinked: boolean;
  mismatches: LockMismatch[];
};

type PackageOutcome = { name: string; entry: InstalledPackage; status: "installed" | "skipped"; hit: boolean; compiled: number };

/**
 * Replay the lockfile into `envDir`. Never resolves: a lockfile that does not
 * satisfy the manifest fails under `frozen` before anything is written.
 */
export async function install(project: LoadedProject, envDir: string, opts: InstallOptions): Promise<InstallReport> {
  const reporter = opts.reporter ?? silentReporter;
  const { manifest, lockfile } = project;

  const mismatches = checkLock(manifest, lockfile);
  if (mismatches.length > 0) {
    if (opts.frozen) {
      throw new BootstrapError(
        "LOCK_MISMATCH",
        `Lockfile does not satisfy the manifest: ${formatMismatches(mismatches)}`,
        { details: { mismatches } },
      );
    }
    for (const m of mismatches) {
      reporter.report(diag("warn", "LOCK_MISMATCH", `${m.package}: ${m.reason}`, { path: project.lockfilePath }));
    }
  }

  const selected = selectPackages(manifest, lockfile, opts.noDev);
  const paths = envPaths(envDir);
  assertInsideEnvironment(project, selected, envDir);

  let previous: EnvironmentRecord | null;
  try {
    previous = await readRecord(envDir);
    await fs.mkdir(paths.bin, { recursive: true });
    await fs.mkdir(paths.lib, { recursive: true });
  } catch (e) {
    throw toInstallIOError(e, `Cannot prepare environment ${envDir}`);
  }

  const record = emptyRecord(project.lockDigest, manifest.name);
  record.layers = { ...(previous?.layers ?? {}) };

  const report: InstallReport = {
    mode: opts.mode,
    installed: [],
    skipped: [],
    removed: [],
    cacheHits: 0,
    cacheMisses: 0,
    compiled: 0,
    projectLinked: false,
    mismatches,
  };

  // Exact sync: drop what the lockfile (or the selection) no longer holds
  const wanted = new Set(selected.map((p) => p.name));
  for (const name of Object.keys(previous?.packages ?? {}).sort()) {
    if (wanted.has(name) || name === manifest.name) continue;
    insidePath(paths.lib, name, `Recorded package ${name}`);
    try {
      await removePackage(envDir, name);
    } catch (e) {
      throw toInstallIOError(e, `Cannot remove ${name} from ${envDir}`);
    }
    report.removed.push(name);
  }

  const limit = pLimit(opts.concurrency ?? 4);
  const settled = await Promise.allSettled(
    selected.map((pkg) => limit(() => installPackage(project, envDir, pkg, previous, opts, reporter))),
  );
  const failure = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
  if (failure) throw toInstallIOError(failure.reason, "Install failed");

  for (const s of settled) {
    if (s.status !== "fulfilled") continue;
    const outcome = s.value;
    record.packages[outcome.name] = outcome.entry;
    if (outcome.status === "installed") {
      report.installed.push(outcome.name);
      if (outcome.hit) report.cacheHits++;
      else report.cacheMisses++;
      report.compiled += outcome.compiled;
    } else {
      report.skipped.push(outcome.name);
    }
  }

  try {
    // Commands a package stopped declaring must not outlive the change
    for (const pkg of selected) await unlinkBins(envDir, pkg.name);

    // Sequential, in lockfile order, so the last declaration of a command name wins deterministically
    const owners = new Map<string, string>();
    for (const pkg of selected) {
      for (const [cmd, rel] of Object.entries(pkg.bin ?? {}).sort(([a], [b]) => (a < b ? -1 : 1))) {
        const owner = owners.get(cmd);
        if (owner !== undefined) {
          reporter.report(diag("warn", "BIN_CONFLICT", `Command ${cmd} from ${owner} is replaced by ${pkg.name}`));
        }
        owners.set(cmd, pkg.name);
        await linkBin(envDir, cmd, pkg.name, rel);
      }
    }

    if (opts.mode === "full") {
      await linkProject(project, envDir);
      report.projectLinked = true;
      record.project.linked = true;
    } else {
      await unlinkProject(envDir, manifest.name);
    }

    if (opts.layer) record.layers[opts.layer.name] = opts.layer.fingerprint;
    await writeRecord(envDir, record);
  } catch (e) {
    throw toInstallIOError(e, `Cannot finalize environment ${envDir}`);
  }

  return report;
}

/** Resolve `rel` under `root`, refusing anything that lands on or outside it. */
function insidePath(root: string, rel: string, what: string): string {
  const abs = path.resolve(root, rel);
  const back = path.relative(root, abs);
  if (back === "" || back === ".." || back.startsWith(`..${path.sep}`) || path.isAbsolute(back)) {
    throw new BootstrapError("INSTALL_IO_ERROR", `${what} resolves outside ${root}`, {
      details: { root, path: rel },
    });
  }
  return abs;
}

/**
 * Package names, command names and bin paths all become filesystem paths.
 * Runs before anything is written.
 */
function assertInsideEnvironment(project: LoadedProject, selected: LockedPackage[], envDir: string): void {
  const paths = envPaths(envDir);
  const owners = [
    ...selected.map((p) => ({ name: p.name, bin: p.bin })),
    { name: project.manifest.name, bin: project.manifest.bin },
  ];
  for (const owner of owners) {
    const dir = insidePath(paths.lib, owner.name, `Package ${owner.name}`);
    for (const [cmd, rel] of Object.entries(owner.bin ?? {})) {
      insidePath(paths.bin, cmd, `Command ${cmd} of ${owner.name}`);
      insidePath(dir, rel, `Bin ${cmd} of ${owner.name}`);
    }
  }
}

async function installPackage(
  project: LoadedProject,
  envDir: string,
  pkg: LockedPackage,
  previous: EnvironmentRecord | null,
  opts: InstallOptions,
  reporter: Reporter,
): Promise<PackageOutcome> {
  const key = deriveCacheKey({
    scope: DEPENDENCY_SCOPE,
    name: pkg.name,
    version: pkg.version,
    integrity: pkg.integrity,
    compileBytecode: opts.compileBytecode,
    runtime: runtimeTag(),
  });
  const entry: InstalledPackage = { version: pkg.version, key };
  const target = path.join(envPaths(envDir).lib, pkg.name);

  if (previous?.packages[pkg.name]?.key === key && (await pathExists(target))) {
    return { name: pkg.name, entry, status: "skipped", hit: false, compiled: 0 };
  }

  const cached = await safeFetch(opts.cache, key, pkg, reporter);
  if (cached) {
    await materialize(cached, target, opts.linkMode, pkg, reporter);
    return { name: pkg.name, entry, status: "installed", hit: true, compiled: 0 };
  }

  const staging = await makeStaging();
  try {
    const built = path.join(staging, "pkg");
    const compiled = await buildArtifact(project, pkg, built, opts.compileBytecode);
    const published = await safeStore(opts.cache, key, built, pkg, reporter);
    await materialize(published ?? built, target, opts.linkMode, pkg, reporter);
    return { name: pkg.name, entry, status: "installed", hit: false, compiled };
  } finally {
    await fs.rm(staging, { recursive: true, force: true });
  }
}

async function makeStaging(): Promise<string> {
  try {
    return await fs.mkdtemp(path.join(os.tmpdir(), "strata-build-"));
  } catch (e) {
    throw toInstallIOError(e, "Cannot create staging directory");
  }
}

/**
 * Copy the package source, verify it against the locked integrity, then apply
 * build-time steps. Returns the number of compiled files.
 */
async function buildArtifact(project: LoadedProject, pkg: LockedPackage, dest: string, compile: boolean): Promise<number> {
  const source = path.resolve(project.root, pkg.source.path);
  if (!(await pathExists(source))) {
    throw new BootstrapError("INSTALL_IO_ERROR", `Source of ${pkg.name}@${pkg.version} not found: ${source}`, {
      details: { package: pkg.name, path: source },
    });
  }

  try {
    await copyTree(source, dest, "copy");
  } catch (e) {
    throw toInstallIOError(e, `Cannot copy ${pkg.name}@${pkg.version} from ${source}`);
  }

  const actual = await digestTree(dest);
  if (actual !== pkg.integrity) {
    throw new BootstrapError(
      "INTEGRITY_ERROR",
      `Integrity mismatch for ${pkg.name}@${pkg.version}: lockfile has ${pkg.integrity}, source has ${actual}`,
      { details: { package: pkg.name, expected: pkg.integrity, actual } },
    );
  }

  try {
    for (const rel of Object.values(pkg.bin ?? {})) {
      const file = path.join(dest, rel);
      if (await pathExists(file)) await fs.chmod(file, 0o755);
    }
    if (!compile) return 0;
    const stats = await compileTree(dest, runtimeTag());
    return stats.compiled;
  } catch (e) {
    throw toInstallIOError(e, `Cannot build ${pkg.name}@${pkg.version}`);
  }
}

async function safeFetch(cache: CacheStore, key: string, pkg: LockedPackage, reporter: Reporter): Promise<string | null> {
  try {
    return await cache.fetch(key);
  } catch (e) {
    if (e instanceof CacheIntegrityError) {
      reporter.report(
        diag("warn", "CACHE_ENTRY_CORRUPT", `Discarded cached ${pkg.name}@${pkg.version}, rebuilding from source: ${e.message}`),
      );
      return null;
    }
    reporter.report(
      diag("warn", "CACHE_FETCH_FAILED", `Cache lookup for ${pkg.name}@${pkg.version} failed, treating as miss: ${errorMessage(e)}`),
    );
    return null;
  }
}

async function safeStore(
  cache: CacheStore,
  key: string,
  dir: string,
  pkg: LockedPackage,
  reporter: Reporter,
): Promise<string | null> {
  try {
    const digest = await digestTree(dir);
    return await cache.store(key, dir, { name: pkg.name, version: pkg.version, digest });
  } catch (e) {
    reporter.report(
      diag("warn", "CACHE_STORE_FAILED", `Could not cache ${pkg.name}@${pkg.version}, continuing without it: ${errorMessage(e)}`),
    );
    return null;
  }
}

/** Stage beside the target and swap in, so a failed copy never leaves a half-written package in place. */
async function materialize(
  from: string,
  target: string,
  linkMode: LinkMode,
  pkg: LockedPackage,
  reporter: Reporter,
): Promise<void> {
  const tmp = `${target}.tmp-${randomBytes(4).toString("hex")}`;
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const stats = await copyTree(from, tmp, linkMode);
    if (linkMode === "hardlink" && stats.copied > 0) {
      reporter.report(
        diag("warn", "LINK_FALLBACK", `Hard links refused for ${stats.copied} file(s) of ${pkg.name}, copied instead`),
      );
    }
    await fs.rm(target, { recursive: true, force: true });
    await fs.rename(tmp, target);
  } catch (e) {
    await fs.rm(tmp, { recursive: true, force: true });
    throw toInstallIOError(e, `Cannot install ${pkg.name}@${pkg.version} into ${target}`);
  }
}

function binTarget(owner: string, rel: string): string {
  return path.posix.join("..", "lib", "node_modules", owner, rel.split(path.sep).join("/"));
}

async function linkBin(envDir: string, cmd: string, owner: string, rel: string): Promise<void> {
  const link = path.join(envPaths(envDir).bin, cmd);
  await fs.rm(link, { force: true });
  await fs.symlink(binTarget(owner, rel), link);
}

/** Remove bin links that point into `owner`'s package directory. */
async function unlinkBins(envDir: string, owner: string): Promise<void> {
  const binDir = envPaths(envDir).bin;
  if (!(await pathExists(binDir))) return;
  const prefix = path.posix.join("..", "lib", "node_modules", owner) + "/";
  for (const name of await fs.readdir(binDir)) {
    const link = path.join(binDir, name);
    let target: string;
    try {
      target = await fs.readlink(link);
    } catch {
      // not a symlink
      continue;
    }
    if (target.startsWith(prefix)) await fs.rm(link, { force: true });
  }
}

async function removePackage(envDir: string, name: string): Promise<void> {
  await unlinkBins(envDir, name);
  await fs.rm(path.join(envPaths(envDir).lib, name), { recursive: true, force: true });
}

/** The project is linked, not copied: the equivalent of an editable install. */
async function linkProject(project: LoadedProject, envDir: string): Promise<void> {
  const name = project.manifest.name;
  const link = path.join(envPaths(envDir).lib, name);
  await fs.mkdir(path.dirname(link), { recursive: true });
  await fs.rm(link, { recursive: true, force: true });
  await fs.symlink(project.root, link, "dir");
  await unlinkBins(envDir, name);
  for (const [cmd, rel] of Object.entries(project.manifest.bin ?? {}).sort(([a], [b]) => (a < b ? -1 : 1))) {
    await linkBin(envDir, cmd, name, rel);
  }
}

async function unlinkProject(envDir: string, name: string): Promise<void> {
  await unlinkBins(envDir, name);
  await fs.rm(path.join(envPaths(envDir).lib, name), { recursive: true, force: true });
}
