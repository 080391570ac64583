import semver from "semver";
import type { Constraints, Manifest } from "../types/manifest.js";
import type { LockedPackage, Lockfile } from "../types/lockfile.js";

export type LockMismatch = {
  /** Package the mismatch concerns, or the project name for project-level issues. */
  package: string;
  reason: string;
};

function compareRequirements(
  group: string,
  declared: Constraints,
  recorded: Constraints,
  out: LockMismatch[],
): void {
  // Maps, so names such as "constructor" never resolve through the prototype
  const want = new Map(Object.entries(declared));
  const have = new Map(Object.entries(recorded));
  for (const [name, range] of want) {
    const locked = have.get(name);
    if (locked === undefined) {
      out.push({ package: name, reason: `${group} constraint ${range} is not recorded in the lockfile` });
    } else if (locked !== range) {
      out.push({ package: name, reason: `${group} constraint changed: lockfile has ${locked}, manifest has ${range}` });
    }
  }
  for (const [name, range] of have) {
    if (!want.has(name)) {
      out.push({ package: name, reason: `lockfile records ${group} constraint ${range} that the manifest no longer declares` });
    }
  }
}

function checkConstraint(name: string, range: string, byName: Map<string, LockedPackage>, out: LockMismatch[]): void {
  if (semver.validRange(range) === null) {
    out.push({ package: name, reason: `invalid version range: ${range}` });
    return;
  }
  const pkg = byName.get(name);
  if (!pkg) {
    out.push({ package: name, reason: "required by the manifest but missing from the lockfile" });
    return;
  }
  if (!semver.satisfies(pkg.version, range, { includePrerelease: true })) {
    out.push({ package: name, reason: `locked version ${pkg.version} does not satisfy ${range}` });
  }
}

/**
 * Per-package comparison of the lockfile against the manifest.
 * An empty result means the lockfile can be replayed as an exact solution.
 */
export function checkLock(manifest: Manifest, lockfile: Lockfile): LockMismatch[] {
  const out: LockMismatch[] = [];

  if (lockfile.project.name !== manifest.name) {
    out.push({
      package: manifest.name,
      reason: `lockfile was generated for project ${lockfile.project.name}`,
    });
  }

  const deps = manifest.dependencies ?? {};
  const devDeps = manifest.dev_dependencies ?? {};
  compareRequirements("runtime", deps, lockfile.project.requires ?? {}, out);
  compareRequirements("dev", devDeps, lockfile.project.dev_requires ?? {}, out);

  const byName = new Map<string, LockedPackage>();
  for (const pkg of lockfile.packages) {
    if (byName.has(pkg.name)) {
      out.push({ package: pkg.name, reason: "locked more than once" });
      continue;
    }
    byName.set(pkg.name, pkg);
    if (semver.valid(pkg.version) === null) {
      out.push({ package: pkg.name, reason: `locked version ${pkg.version} is not a valid version` });
    }
  }

  for (const [name, range] of Object.entries(deps)) checkConstraint(name, range, byName, out);
  for (const [name, range] of Object.entries(devDeps)) checkConstraint(name, range, byName, out);

  for (const pkg of lockfile.packages) {
    for (const dep of pkg.dependencies ?? []) {
      if (!byName.has(dep)) {
        out.push({ package: pkg.name, reason: `depends on ${dep}, which is not in the lockfile` });
      }
    }
  }

  return out;
}

export function formatMismatches(mismatches: LockMismatch[], limit = 5): string {
  const shown = mismatches.slice(0, limit).map((m) => `${m.package}: ${m.reason}`);
  const rest = mismatches.length - shown.length;
  return rest > 0 ? `${shown.join("; ")}; and ${rest} more` : shown.join("; ");
}

/**
 * Packages to install. With `noDev`, only what is reachable from the runtime
 * dependencies through lockfile edges; otherwise every locked package.
 * Order follows the lockfile.
 */
export function selectPackages(manifest: Manifest, lockfile: Lockfile, noDev: boolean): LockedPackage[] {
  if (!noDev) return dedupe(lockfile.packages);

  const byName = new Map<string, LockedPackage>();
  for (const pkg of lockfile.packages) {
    if (!byName.has(pkg.name)) byName.set(pkg.name, pkg);
  }
  const reachable = new Set<string>();
  const queue = Object.keys(manifest.dependencies ?? {});
  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || reachable.has(name)) continue;
    const pkg = byName.get(name);
    if (!pkg) continue;
    reachable.add(name);
    queue.push(...(pkg.dependencies ?? []));
  }
  return dedupe(lockfile.packages.filter((p) => reachable.has(p.name)));
}

function dedupe(packages: LockedPackage[]): LockedPackage[] {
  const seen = new Set<string>();
  return packages.filter((p) => (seen.has(p.name) ? false : (seen.add(p.name), true)));
}
