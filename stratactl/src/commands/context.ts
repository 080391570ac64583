import path from "node:path";
import { loadConfig, resolveCacheDir } from "../config/loader.js";
import { FsCacheStore } from "../cache/store.js";
import type { OutputFormat } from "../core/diagnostics.js";
import type { ConfigOverrides, StrataConfig } from "../types/config.js";

/** Options every building command accepts. */
export type CommonOpts = {
  project?: string;
  configDir?: string;
  envName?: string;
  overrides?: ConfigOverrides;
  format?: OutputFormat;
  env?: NodeJS.ProcessEnv;
};

export type CommandContext = {
  projectRoot: string;
  config: StrataConfig;
  cache: FsCacheStore;
};

export async function resolveContext(opts: CommonOpts): Promise<CommandContext> {
  const projectRoot = path.resolve(opts.project ?? process.cwd());
  const config = await loadConfig({
    configDir: opts.configDir,
    envName: opts.envName,
    overrides: opts.overrides,
    env: opts.env,
  });
  return { projectRoot, config, cache: new FsCacheStore(resolveCacheDir(config, projectRoot)) };
}
