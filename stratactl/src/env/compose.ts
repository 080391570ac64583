import fs from "node:fs";
import path from "node:path";
import { envPaths } from "../install/environment-record.js";

/** Prepend `entry` to a delimited search path, dropping any later duplicate of it. */
export function prependPath(entry: string, inherited: string | undefined, delimiter: string = path.delimiter): string {
  const rest = (inherited ?? "").split(delimiter).filter((p) => p !== "" && p !== entry);
  return [entry, ...rest].join(delimiter);
}

/**
 * Process environment for running inside `envDir`: its bin/ ahead of every
 * inherited PATH entry, its packages on NODE_PATH. Pure: returns a new object.
 */
export function composeEnvironment(
  envDir: string,
  inherited: NodeJS.ProcessEnv,
  delimiter: string = path.delimiter,
): NodeJS.ProcessEnv {
  const abs = path.resolve(envDir);
  const paths = envPaths(abs);
  const env: NodeJS.ProcessEnv = { ...inherited };
  env.PATH = prependPath(paths.bin, inherited.PATH, delimiter);
  env.NODE_PATH = prependPath(paths.lib, inherited.NODE_PATH, delimiter);
  env.STRATA_ENV = abs;
  return env;
}

function isExecutableFile(p: string): boolean {
  try {
    if (!fs.statSync(p).isFile()) return false;
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * First executable named `name` along `searchPath`, as the shell would find it.
 * A name with a path separator is taken relative to `cwd`, the directory the
 * child will start in.
 */
export function resolveExecutable(
  name: string,
  searchPath: string | undefined,
  delimiter: string = path.delimiter,
  cwd: string = process.cwd(),
): string | null {
  if (name.includes("/") || name.includes(path.sep)) {
    const candidate = path.resolve(cwd, name);
    return isExecutableFile(candidate) ? candidate : null;
  }
  for (const dir of (searchPath ?? "").split(delimiter)) {
    if (dir === "") continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}
