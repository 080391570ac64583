import path from "node:path";
import { digestTree } from "../cache/checksum.js";
import { pathExists } from "../cache/tree.js";
import { diag, type Diagnostic } from "../core/diagnostics.js";
import { errorMessage, isBootstrapError } from "../core/errors.js";
import { checkLock, selectPackages } from "../install/lock-check.js";
import { loadProject, type LoadedProject } from "../install/project.js";
import { createRegistry } from "../schema/registry.js";
import { resolveContext, type CommandContext, type CommonOpts } from "./context.js";

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

/**
 * Check config, manifest, lockfile, lock consistency and package source
 * integrity without writing anything.
 */
export async function validateAll(opts: CommonOpts & { schemaDir?: string }): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  let ctx: CommandContext;
  try {
    ctx = await resolveContext(opts);
  } catch (e) {
    if (!isBootstrapError(e)) throw e;
    return { ok: false, errors: [diag("error", e.code, e.message)], warnings };
  }

  const registry = await createRegistry(opts.schemaDir);

  let project: LoadedProject;
  try {
    project = await loadProject(ctx.projectRoot, ctx.config, registry);
  } catch (e) {
    if (!isBootstrapError(e)) throw e;
    const p = typeof e.details?.path === "string" ? e.details.path : undefined;
    return { ok: false, errors: [diag("error", e.code, e.message, p ? { path: p } : undefined)], warnings };
  }

  const mismatches = checkLock(project.manifest, project.lockfile);
  for (const m of mismatches) {
    const d = diag(ctx.config.frozen ? "error" : "warn", "LOCK_MISMATCH", `${m.package}: ${m.reason}`, {
      path: path.relative(ctx.projectRoot, project.lockfilePath),
    });
    (ctx.config.frozen ? errors : warnings).push(d);
  }

  for (const pkg of selectPackages(project.manifest, project.lockfile, ctx.config.no_dev)) {
    const source = path.resolve(ctx.projectRoot, pkg.source.path);
    if (!(await pathExists(source))) {
      errors.push(diag("error", "SOURCE_MISSING", `Source of ${pkg.name}@${pkg.version} not found: ${source}`, { path: source }));
      continue;
    }
    try {
      const actual = await digestTree(source);
      if (actual !== pkg.integrity) {
        errors.push(
          diag("error", "INTEGRITY_ERROR", `Integrity mismatch for ${pkg.name}@${pkg.version}`, {
            path: source,
            details: { expected: pkg.integrity, actual },
          }),
        );
      }
    } catch (e) {
      errors.push(diag("error", "SOURCE_READ_FAILED", `Cannot read source of ${pkg.name}: ${errorMessage(e)}`, { path: source }));
    }
  }

  if (errors.length > 0) return { ok: false, errors, warnings };
  return { ok: true, warnings };
}
