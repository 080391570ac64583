import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveExecutable } from "../env/compose.js";
import { BootstrapError, errnoCode, errorMessage } from "../core/errors.js";
import { nodeSpawner, type RunningProcess, type Spawner, type SpawnRequest } from "./spawner.js";

const SCRIPT_ENTRYPOINT = /\.(c|m)?js$/;

export type LaunchOptions = {
  /** A script path (.js/.mjs/.cjs, relative to cwd) or a command name resolved on the composed PATH. */
  entrypoint: string;
  args?: string[];
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** The environment is trusted as built; launch never checks or re-installs dependencies. */
  noSync: true;
  signal?: AbortSignal;
  /** Host signals relayed to the child while it runs. */
  forwardSignals?: NodeJS.Signals[];
  spawner?: Spawner;
  /** Runtime for script entrypoints; defaults to the running Node.js binary. */
  runtime?: string;
};

export type LaunchResult =
  | { ok: true; exitCode: number; signal: NodeJS.Signals | null }
  | { ok: false; error: BootstrapError };

function launchError(message: string, details?: Record<string, unknown>, cause?: unknown): LaunchResult {
  return { ok: false, error: new BootstrapError("LAUNCH_ERROR", message, { details, cause }) };
}

/** Resolve the entrypoint to a concrete command line, or explain why it cannot run. */
export function resolveLaunch(opts: Pick<LaunchOptions, "entrypoint" | "args" | "env" | "cwd" | "runtime">): SpawnRequest | string {
  const args = opts.args ?? [];
  if (SCRIPT_ENTRYPOINT.test(opts.entrypoint)) {
    const file = path.resolve(opts.cwd, opts.entrypoint);
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      return `Entrypoint not found: ${file}`;
    }
    return { command: opts.runtime ?? process.execPath, args: [file, ...args], cwd: opts.cwd, env: opts.env };
  }

  const resolved = resolveExecutable(opts.entrypoint, opts.env.PATH, path.delimiter, opts.cwd);
  if (!resolved) {
    return `Entrypoint ${opts.entrypoint} is not an executable on PATH`;
  }
  return { command: resolved, args, cwd: opts.cwd, env: opts.env };
}

/** Conventional shell encoding of death by signal. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

/**
 * Launch Supervisor: run the entrypoint in the composed environment, wait for
 * it, and hand back its exit status. Failures to start are LAUNCH_ERROR and
 * never share a code path with the application's own exit code.
 */
export async function launch(opts: LaunchOptions): Promise<LaunchResult> {
  const req = resolveLaunch(opts);
  if (typeof req === "string") {
    return launchError(req, { entrypoint: opts.entrypoint });
  }
  if (opts.signal?.aborted) {
    return launchError(`Launch of ${opts.entrypoint} aborted before start`, { entrypoint: opts.entrypoint });
  }

  const spawner = opts.spawner ?? nodeSpawner;
  let child: RunningProcess;
  try {
    child = spawner(req);
  } catch (e) {
    return launchError(`Cannot start ${opts.entrypoint}: ${errorMessage(e)}`, { entrypoint: opts.entrypoint, errno: errnoCode(e) ?? null }, e);
  }

  const running = child;
  const onAbort = (): void => running.kill("SIGTERM");
  opts.signal?.addEventListener("abort", onAbort, { once: true });
  const relays = (opts.forwardSignals ?? []).map((sig) => {
    const handler = (): void => running.kill(sig);
    process.on(sig, handler);
    return { sig, handler };
  });

  try {
    const exit = await running.exited;
    if (exit.code !== null) return { ok: true, exitCode: exit.code, signal: null };
    const signal = exit.signal ?? "SIGTERM";
    return { ok: true, exitCode: signalExitCode(signal), signal };
  } catch (e) {
    return launchError(`Cannot start ${opts.entrypoint}: ${errorMessage(e)}`, { entrypoint: opts.entrypoint, errno: errnoCode(e) ?? null }, e);
  } finally {
    opts.signal?.removeEventListener("abort", onAbort);
    for (const { sig, handler } of relays) process.off(sig, handler);
  }
}
