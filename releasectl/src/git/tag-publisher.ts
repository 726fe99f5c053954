import { TagError, VcsError } from "../errors.js";
import type { RepositoryContext } from "../types/repository.js";
import type { Version } from "../types/version.js";
import type { Logger } from "../logging/logger.js";

/**
 * What to do when the tag already exists. The release flow fails; the build
 * flow skips with a warning.
 */
export type OnExistingTag = "fail" | "skip";

export type PublishOptions = {
  onExisting: OnExistingTag;
  /** Also push the release branch before the tag. */
  pushBranch: boolean;
};

export type TagPublishResult =
  | { status: "created"; tag: string }
  | { status: "skipped"; tag: string; warning: string };

/** Creates an annotated tag and pushes it to the remote. */
export class TagPublisher {
  constructor(
    private readonly context: RepositoryContext,
    private readonly logger: Logger,
  ) {}

  async publish(version: Version, message: string, opts: PublishOptions): Promise<TagPublishResult> {
    const { vcs, remote, releaseBranch } = this.context;
    const tag = version.raw;

    this.logger.info(`Creating git tag: ${tag}`);

    const existing = await vcs.listTags(tag);
    if (existing.includes(tag)) {
      if (opts.onExisting === "fail") {
        throw new TagError("TAG_EXISTS", `Git tag ${tag} already exists`, { tag });
      }
      const warning = `Git tag ${tag} already exists`;
      this.logger.warn(warning, { code: "TAG_EXISTS" });
      return { status: "skipped", tag, warning };
    }

    try {
      await vcs.createAnnotatedTag(tag, message);
    } catch (e) {
      if (e instanceof VcsError) throw new TagError("TAG_CREATE_FAILED", e.message, { tag });
      throw e;
    }

    try {
      if (opts.pushBranch) await vcs.push(remote, releaseBranch);
      await vcs.push(remote, tag);
    } catch (e) {
      if (e instanceof VcsError) throw new TagError("PUSH_FAILED", e.message, { tag, remote });
      throw e;
    }

    this.logger.info(`Git tag ${tag} created and pushed`);
    return { status: "created", tag };
  }
}
