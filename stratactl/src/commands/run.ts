import { createReporter, bootstrapFailure, type Reporter } from "../core/diagnostics.js";
import { isBootstrapError } from "../core/errors.js";
import { BootstrapSequencer, type SequencerResult } from "../core/sequencer.js";
import type { Spawner } from "../launch/spawner.js";
import { exitCodeFor } from "./exit-codes.js";
import { resolveContext, type CommandContext, type CommonOpts } from "./context.js";

export type RunOpts = CommonOpts & {
  /** Omit to build without launching. */
  entrypoint?: string;
  args?: string[];
  installProject?: boolean;
  reporter?: Reporter;
  spawner?: Spawner;
  signal?: AbortSignal;
  forwardSignals?: NodeJS.Signals[];
};

export type RunResult =
  | { ok: true; exitCode: number; phase: SequencerResult["phase"]; result: SequencerResult }
  | {
      ok: false;
      exitCode: number;
      phase: SequencerResult["phase"];
      error?: { code: string; message: string };
      result?: SequencerResult;
    };

/**
 * Build the environment (unless no_sync) and launch the entrypoint in it.
 * Without an entrypoint this is a build-only sync.
 */
export async function run(opts: RunOpts): Promise<RunResult> {
  const reporter = opts.reporter ?? createReporter(opts.format ?? "human");

  let ctx: CommandContext;
  try {
    ctx = await resolveContext(opts);
  } catch (e) {
    if (!isBootstrapError(e)) throw e;
    reporter.report(bootstrapFailure(e));
    return { ok: false, exitCode: exitCodeFor(e.code), phase: "bootstrap", error: { code: e.code, message: e.message } };
  }

  const sequencer = new BootstrapSequencer({
    projectRoot: ctx.projectRoot,
    config: ctx.config,
    cache: ctx.cache,
    entrypoint: opts.entrypoint,
    args: opts.args,
    installProject: opts.installProject,
    inheritedEnv: opts.env,
    reporter,
    spawner: opts.spawner,
    signal: opts.signal,
    forwardSignals: opts.forwardSignals,
  });
  const result = await sequencer.run();

  if (result.ok) {
    return { ok: true, exitCode: result.exitCode, phase: result.phase, result };
  }
  const error = result.error
    ? { code: isBootstrapError(result.error) ? result.error.code : "UNEXPECTED", message: result.error.message }
    : undefined;
  return { ok: false, exitCode: result.exitCode, phase: result.phase, error, result };
}
