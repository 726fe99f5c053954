import { RepositoryStateError, type StateViolation } from "../errors.js";
import type { RepositoryContext, RepositoryState } from "../types/repository.js";
import type { ValidationMode } from "../types/config.js";
import type { Logger } from "../logging/logger.js";

/**
 * A release may only start on the release branch, with no tracked
 * modifications, in sync with the remote.
 *
 * Checks run in order branch → clean → sync. In "fail-fast" mode the first
 * violation aborts; in "aggregate" mode every violation is collected.
 */
export class RepositoryStateValidator {
  constructor(
    private readonly context: RepositoryContext,
    private readonly logger: Logger,
    private readonly mode: ValidationMode = "fail-fast",
  ) {}

  async validate(releaseBranch: string): Promise<RepositoryState> {
    const { vcs, remote } = this.context;
    const violations: StateViolation[] = [];
    const record = (violation: StateViolation) => {
      violations.push(violation);
      if (this.mode === "fail-fast") throw new RepositoryStateError([violation]);
    };

    this.logger.info("Validating git state...");

    const currentBranch = await vcs.getCurrentBranch();
    if (currentBranch !== releaseBranch) {
      record({
        code: "WRONG_BRANCH",
        message: `Must be on ${releaseBranch} branch for release. Current branch: ${currentBranch}`,
      });
    }

    const isClean = await vcs.isClean();
    if (!isClean) {
      record({
        code: "DIRTY_WORKING_TREE",
        message: "Uncommitted changes detected. Please commit or stash changes first.",
      });
    }

    await vcs.fetch(remote, releaseBranch);
    const localHead = await vcs.revParse("HEAD");
    const remoteHead = await vcs.revParse(`${remote}/${releaseBranch}`);
    if (localHead !== remoteHead) {
      record({
        code: "OUT_OF_SYNC_WITH_REMOTE",
        message: `Local branch is not up to date with ${remote}/${releaseBranch}`,
      });
    }

    const [first, ...rest] = violations;
    if (first) throw new RepositoryStateError([first, ...rest]);

    this.logger.info("Git state is clean and ready for release");
    return { currentBranch, isClean, localHead, remoteHead };
  }
}
