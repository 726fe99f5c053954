import { BuildError } from "../errors.js";
import { tailOutput, type CommandRunner } from "../exec/command-runner.js";
import type { BuildTarget } from "../types/build.js";
import type { Logger } from "../logging/logger.js";

export type BuilderOptions = {
  /** Name of the buildx builder instance, e.g. "multiplatform". */
  builder: string;
  driver: string;
  /** Build context directory. */
  context: string;
  dockerfile?: string;
  cwd: string;
};

export type BuilderStatus = {
  builder: string;
  created: boolean;
};

/** Assemble the tag set: the version tag, plus the floating tag when requested. */
export function createBuildTarget(opts: {
  repository: string;
  platforms: readonly string[];
  version: string;
  floatingTag?: string;
}): BuildTarget {
  const tags = new Set([opts.version]);
  if (opts.floatingTag) tags.add(opts.floatingTag);
  return { repository: opts.repository, platforms: new Set(opts.platforms), tags };
}

/** Arguments for the single build-and-push invocation. */
export function buildArgs(target: BuildTarget, opts: Pick<BuilderOptions, "context" | "dockerfile">): string[] {
  const args = ["buildx", "build", "--platform", [...target.platforms].join(",")];
  for (const tag of target.tags) args.push("-t", `${target.repository}:${tag}`);
  if (opts.dockerfile) args.push("--file", opts.dockerfile);
  args.push("--push", opts.context);
  return args;
}

/**
 * Multi-architecture build coordinator — drives `docker buildx`.
 *
 * The builder instance is the one piece of environment state outside the
 * repository and registry: created on first use, reused afterwards.
 */
export class MultiArchBuildCoordinator {
  private ready: BuilderStatus | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly opts: BuilderOptions,
    private readonly logger: Logger,
  ) {}

  async prepareBuilder(): Promise<BuilderStatus> {
    if (this.ready) return this.ready;
    const { builder, driver, cwd } = this.opts;

    this.logger.info("Checking Docker buildx availability...");
    const version = await this.runner.run("docker", ["buildx", "version"], { cwd });
    if (version.exitCode !== 0) {
      throw new BuildError("BUILDX_UNAVAILABLE", `Docker buildx is not available: ${tailOutput(version)}`);
    }

    const inspect = await this.runner.run("docker", ["buildx", "inspect", builder], { cwd });
    let created: boolean;
    if (inspect.exitCode === 0) {
      this.logger.info(`Using existing ${builder} builder...`);
      const use = await this.runner.run("docker", ["buildx", "use", builder], { cwd });
      if (use.exitCode !== 0) {
        throw new BuildError("BUILDER_SETUP_FAILED", `Failed to select builder ${builder}: ${tailOutput(use)}`);
      }
      created = false;
    } else {
      this.logger.info(`Creating ${builder} builder...`);
      const create = await this.runner.run(
        "docker",
        ["buildx", "create", "--name", builder, "--driver", driver, "--use"],
        { cwd },
      );
      if (create.exitCode !== 0) {
        throw new BuildError("BUILDER_SETUP_FAILED", `Failed to create builder ${builder}: ${tailOutput(create)}`);
      }
      created = true;
    }

    this.logger.info("Docker buildx is ready");
    this.ready = { builder, created };
    return this.ready;
  }

  /** One build-and-push for every platform. Any non-zero exit fails the whole build. */
  async buildAndPush(target: BuildTarget): Promise<void> {
    await this.prepareBuilder();

    const platforms = [...target.platforms].join(",");
    const [version] = target.tags;
    this.logger.info(`Building multi-architecture image for version: ${version}`);
    this.logger.info(`Platforms: ${platforms}`);

    const result = await this.runner.run("docker", buildArgs(target, this.opts), { cwd: this.opts.cwd });
    if (result.exitCode !== 0) {
      throw new BuildError("BUILD_FAILED", `docker buildx build exited with ${result.exitCode}: ${tailOutput(result)}`, {
        exitCode: result.exitCode,
        platforms: [...target.platforms],
      });
    }

    this.logger.info("Multi-architecture build completed!");
  }
}
