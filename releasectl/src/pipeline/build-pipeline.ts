import { MultiArchBuildCoordinator, createBuildTarget } from "../build/coordinator.js";
import { ManifestVerifier } from "../build/manifest-verifier.js";
import { Orchestrator, toFailure, type PipelineFailure, type PipelineReport } from "../core/orchestrator.js";
import { BUILD_STAGES, type BuildMilestone, type BuildStage } from "../core/state-machine.js";
import { TagPublisher, type TagPublishResult } from "../git/tag-publisher.js";
import { VersionResolver, autoVersion, versionBase } from "../version/resolver.js";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Logger } from "../logging/logger.js";
import type { BuildTarget, ManifestEntry } from "../types/build.js";
import type { ReleaseConfig } from "../types/config.js";
import type { RepositoryContext } from "../types/repository.js";
import type { Version } from "../types/version.js";

export type BuildRequest = {
  /** Explicit version; when absent one is derived from the latest tag and HEAD. */
  version?: string;
  /** Also push the floating tag. */
  latest: boolean;
  /** Tag and push the commit after a verified build. */
  gitTag: boolean;
};

export type BuildPipelineDeps = {
  context: RepositoryContext;
  config: ReleaseConfig;
  runner: CommandRunner;
  logger: Logger;
  clock?: () => Date;
};

export type BuildReport = PipelineReport<BuildStage, BuildMilestone>;

export type BuildResult =
  | {
      ok: true;
      version: Version;
      target: BuildTarget;
      manifest: ManifestEntry[];
      tag: TagPublishResult | null;
      report: BuildReport;
    }
  | { ok: false; error: PipelineFailure; target: BuildTarget | null; report: BuildReport };

export function buildTagMessage(version: Version, platforms: Iterable<string>): string {
  return `Release ${version.raw} - Multi-architecture container image (${[...platforms].join(", ")})`;
}

/**
 * Build pipeline: resolve version → prepare builder → build and push →
 * verify manifest → publish tag (unless disabled) → report.
 */
export class BuildPipeline {
  private readonly resolver: VersionResolver;
  private readonly coordinator: MultiArchBuildCoordinator;
  private readonly verifier: ManifestVerifier;
  private readonly publisher: TagPublisher;
  private readonly clock: () => Date;

  constructor(private readonly deps: BuildPipelineDeps) {
    const { context, config, runner, logger } = deps;
    this.resolver = new VersionResolver(context, {
      tagPattern: config.tag_pattern,
      baseline: config.baseline_version,
    });
    this.coordinator = new MultiArchBuildCoordinator(
      runner,
      {
        builder: config.image.builder,
        driver: config.image.driver,
        context: config.image.context,
        dockerfile: config.image.dockerfile,
        cwd: context.root,
      },
      logger,
    );
    this.verifier = new ManifestVerifier(runner, logger, { cwd: context.root });
    this.publisher = new TagPublisher(context, logger);
    this.clock = deps.clock ?? (() => new Date());
  }

  /** The explicit version as given, or `<base>-<timestamp>-<shortHash>`. */
  async resolveVersion(explicit?: string): Promise<Version> {
    if (explicit !== undefined) return this.resolver.accept(explicit);
    const base = this.deps.config.build?.version_base ?? versionBase(await this.resolver.latest());
    const shortHash = await this.deps.context.vcs.getShortHead();
    return autoVersion(base, this.clock(), shortHash);
  }

  async run(request: BuildRequest): Promise<BuildResult> {
    const { config, logger } = this.deps;
    const skip: BuildStage[] = request.gitTag ? [] : ["publish_tag"];
    const run = new Orchestrator<BuildStage, BuildMilestone>("build", BUILD_STAGES, logger, skip);

    let target: BuildTarget | null = null;

    try {
      const version = await run.step("resolve_version", () => this.resolveVersion(request.version));
      const built = createBuildTarget({
        repository: config.image.repository,
        platforms: config.image.platforms,
        version: version.raw,
        floatingTag: request.latest ? config.image.floating_tag : undefined,
      });
      target = built;

      logger.info(`Starting multi-architecture build for ${config.image.repository}:${version.raw}`);

      await run.step("prepare_builder", () => this.coordinator.prepareBuilder());
      await run.step("build_push", () => this.coordinator.buildAndPush(built));
      const manifest = await run.step("verify_manifest", () =>
        this.verifier.verify(built.repository, version.raw, built.platforms),
      );

      let tag: TagPublishResult | null = null;
      if (!run.isSkipped("publish_tag")) {
        tag = await run.step("publish_tag", () =>
          this.publisher.publish(version, buildTagMessage(version, built.platforms), {
            onExisting: "skip",
            pushBranch: false,
          }),
        );
      }

      await run.step("report", () => {
        logger.info("Build process completed successfully!");
        logger.info("Image Information:");
        logger.info(`   Repository: ${built.repository}`);
        logger.info(`   Version: ${version.raw}`);
        logger.info(`   Tags: ${[...built.tags].join(", ")}`);
        logger.info(`   Platforms: ${[...built.platforms].join(", ")}`);
        logger.info("Pull commands:");
        for (const t of built.tags) logger.info(`   docker pull ${built.repository}:${t}`);
      });

      return { ok: true, version, target: built, manifest, tag, report: run.report() };
    } catch (e) {
      return { ok: false, error: run.report().error ?? toFailure(e), target, report: run.report() };
    }
  }
}
