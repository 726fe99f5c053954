import { ReleaseArtifactUpdater, type ArtifactUpdateResult } from "../artifacts/updater.js";
import { ChangelogGenerator } from "../changelog/generator.js";
import { Orchestrator, toFailure, type PipelineFailure, type PipelineReport } from "../core/orchestrator.js";
import { RELEASE_STAGES, type ReleaseMilestone, type ReleaseStage } from "../core/state-machine.js";
import { RepositoryStateValidator } from "../git/state-validator.js";
import { TagPublisher } from "../git/tag-publisher.js";
import { VersionResolver } from "../version/resolver.js";
import type { Logger } from "../logging/logger.js";
import type { ReleaseConfig } from "../types/config.js";
import type { ReleaseRecord } from "../types/release.js";
import type { RepositoryContext } from "../types/repository.js";
import type { Version } from "../types/version.js";

export type ReleaseRequest = { kind: "bump"; bump: string } | { kind: "custom"; version: string };

export type ReleasePipelineDeps = {
  context: RepositoryContext;
  config: ReleaseConfig;
  logger: Logger;
  clock?: () => Date;
};

export type ReleaseReport = PipelineReport<ReleaseStage, ReleaseMilestone>;

export type ReleaseResult =
  | { ok: true; record: ReleaseRecord; artifacts: ArtifactUpdateResult; report: ReleaseReport }
  | { ok: false; error: PipelineFailure; report: ReleaseReport };

export function releaseCommitMessage(version: Version, platforms: readonly string[]): string {
  return [
    `chore: release ${version.raw}`,
    "",
    `- Update image references to ${version.raw}`,
    `- Multi-architecture support (${platforms.join(", ")})`,
  ].join("\n");
}

export function releaseTagMessage(record: ReleaseRecord): string {
  return `Release ${record.version.raw}\n\n${record.changelog}`;
}

/**
 * Release pipeline: validate → resolve version → update artifacts → commit →
 * changelog → publish tag → report. The first failing stage ends the run.
 */
export class ReleasePipeline {
  private readonly validator: RepositoryStateValidator;
  private readonly resolver: VersionResolver;
  private readonly updater: ReleaseArtifactUpdater;
  private readonly changelog: ChangelogGenerator;
  private readonly publisher: TagPublisher;

  constructor(private readonly deps: ReleasePipelineDeps) {
    const { context, config, logger } = deps;
    this.validator = new RepositoryStateValidator(context, logger, config.validation.mode);
    this.resolver = new VersionResolver(context, {
      tagPattern: config.tag_pattern,
      baseline: config.baseline_version,
    });
    this.updater = new ReleaseArtifactUpdater(context, config.image.repository, logger);
    this.changelog = new ChangelogGenerator(context, {
      repository: config.image.repository,
      platforms: config.image.platforms,
      floatingTag: config.image.floating_tag,
      maxCommits: config.changelog.max_commits,
      resolver: this.resolver,
      clock: deps.clock,
    });
    this.publisher = new TagPublisher(context, logger);
  }

  async run(request: ReleaseRequest): Promise<ReleaseResult> {
    const { context, config, logger } = this.deps;
    const run = new Orchestrator<ReleaseStage, ReleaseMilestone>("release", RELEASE_STAGES, logger);

    logger.info("Starting release process...");

    try {
      await run.step("validate", () => this.validator.validate(context.releaseBranch));

      const { previous, version } = await run.step("resolve_version", async () => {
        const previous = await this.resolver.latest();
        if (request.kind === "custom") {
          const version = this.resolver.accept(request.version);
          logger.info(`Using custom version: ${version.raw}`);
          return { previous, version };
        }
        const version = this.resolver.bump(previous, request.bump);
        logger.info(`Bumping ${request.bump} version: ${previous.raw} → ${version.raw}`);
        return { previous, version };
      });

      const artifacts = await run.step("update_artifacts", () => this.updater.apply(version, config.artifacts));

      const commitSha = await run.step("commit", async () => {
        logger.info("Creating release commit...");
        const sha = await context.vcs.commit(releaseCommitMessage(version, config.image.platforms), artifacts.updated, {
          allowEmpty: artifacts.updated.length === 0,
        });
        logger.info("Release commit created");
        return sha;
      });

      const record = await run.step("changelog", async (): Promise<ReleaseRecord> => {
        logger.info("Generating changelog...");
        const changelog = await this.changelog.generate(version, previous);
        return { version, previousVersion: previous, changelog, commitSha };
      });

      await run.step("publish_tag", () =>
        this.publisher.publish(record.version, releaseTagMessage(record), { onExisting: "fail", pushBranch: true }),
      );

      await run.step("report", () => {
        logger.info(`Release ${record.version.raw} completed!`);
        logger.info("Release Summary:");
        logger.info(`   Previous: ${record.previousVersion.raw}`);
        logger.info(`   New: ${record.version.raw}`);
        logger.info(`   Image: ${config.image.repository}:${record.version.raw}`);
      });

      return { ok: true, record, artifacts, report: run.report() };
    } catch (e) {
      return { ok: false, error: run.report().error ?? toFailure(e), report: run.report() };
    }
  }
}
