import { spawn } from "node:child_process";

export type SpawnRequest = {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export type ProcessExit = { code: number | null; signal: NodeJS.Signals | null };

export interface RunningProcess {
  /** Settles when the process ends; rejects if it could not be started. */
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): void;
}

/** Starts a child process. Injected so launch can be exercised without real processes. */
export type Spawner = (req: SpawnRequest) => RunningProcess;

export const nodeSpawner: Spawner = (req) => {
  const child = spawn(req.command, req.args, {
    cwd: req.cwd,
    env: req.env,
    stdio: "inherit",
    shell: false,
  });

  const exited = new Promise<ProcessExit>((resolve, reject) => {
    let started = false;
    child.once("spawn", () => {
      started = true;
    });
    child.once("error", (err) => {
      // After a successful spawn, "error" only reports a failed kill; exit still follows
      if (!started) reject(err);
    });
    child.once("exit", (code, signal) => resolve({ code, signal }));
  });

  return {
    exited,
    kill(signal) {
      if (child.exitCode === null && child.signalCode === null) child.kill(signal);
    },
  };
};
