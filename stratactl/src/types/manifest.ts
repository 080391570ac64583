/** Project manifest (strata.yaml): direct constraints and project metadata. */
export type Constraints = Record<string, string>;

export type Manifest = {
  name: string;
  version: string;
  description?: string;
  dependencies?: Constraints;
  dev_dependencies?: Constraints;
  /** command name -> path relative to the project root */
  bin?: Record<string, string>;
};
