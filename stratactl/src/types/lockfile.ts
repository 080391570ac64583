import type { Constraints } from "./manifest.js";

/** Pinned, transitively resolved snapshot of the manifest (strata.lock). */
export type LockedPackage = {
  name: string;
  version: string;
  source: { path: string };
  /** Tree digest of the source directory, "sha256-<hex>". */
  integrity: string;
  dependencies?: string[];
  bin?: Record<string, string>;
};

export type Lockfile = {
  version: 1;
  project: {
    name: string;
    requires?: Constraints;
    dev_requires?: Constraints;
  };
  packages: LockedPackage[];
};
