/** Environment record persisted as <env>/strata-env.json. Deterministic: no timestamps. */
export type InstalledPackage = {
  version: string;
  key: string;
};

export type EnvironmentRecord = {
  version: 1;
  lock_digest: string;
  project: { name: string; linked: boolean };
  packages: Record<string, InstalledPackage>;
  layers: Record<string, string>;
};
