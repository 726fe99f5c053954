import type { VersionControl } from "../git/operations.js";

/** Snapshot of the repository taken at the start of a release run. */
export type RepositoryState = {
  currentBranch: string;
  isClean: boolean;
  localHead: string;
  remoteHead: string;
};

/**
 * Everything a component needs to reach the repository. Passed explicitly
 * instead of reading the process working directory.
 */
export type RepositoryContext = {
  root: string;
  vcs: VersionControl;
  remote: string;
  releaseBranch: string;
};
