import { run, type RunOpts, type RunResult } from "./run.js";

export type SyncOpts = Omit<RunOpts, "entrypoint" | "args" | "spawner" | "signal" | "forwardSignals">;

/** Build the environment only. `installProject: false` stops after the dependency layer. */
export function sync(opts: SyncOpts): Promise<RunResult> {
  return run({ ...opts, entrypoint: undefined });
}
