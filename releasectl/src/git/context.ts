import path from "node:path";
import { GitOperations, type VersionControl } from "./operations.js";
import type { RepositoryContext } from "../types/repository.js";
import type { ReleaseConfig } from "../types/config.js";

/** Build the repository context for a checkout at `root`. */
export function openRepository(root: string, config: ReleaseConfig, vcs?: VersionControl): RepositoryContext {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    vcs: vcs ?? new GitOperations(resolved),
    remote: config.remote,
    releaseBranch: config.release_branch,
  };
}
