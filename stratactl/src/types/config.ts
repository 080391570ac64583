/** Configuration types: base.yaml <- <env>.yaml <- STRATA_* <- CLI flags. */
export type LinkMode = "copy" | "hardlink";

export type StrataConfig = {
  schema_version: string;
  manifest: string;
  lockfile: string;
  env_dir: string;
  /** Empty string selects ~/.cache/strata. */
  cache_dir: string;
  frozen: boolean;
  no_dev: boolean;
  compile_bytecode: boolean;
  link_mode: LinkMode;
  no_sync: boolean;
  concurrency: number;
};

export type ConfigOverrides = Partial<Omit<StrataConfig, "schema_version">>;
