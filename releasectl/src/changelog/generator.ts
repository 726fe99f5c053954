import type { RepositoryContext } from "../types/repository.js";
import type { Version } from "../types/version.js";
import { VersionResolver } from "../version/resolver.js";

const DEFAULT_MAX_COMMITS = 20;

const PLATFORM_DESCRIPTIONS: Record<string, string> = {
  "linux/amd64": "Intel/AMD x86_64",
  "linux/arm64": "Apple Silicon, ARM servers",
  "linux/arm/v7": "32-bit ARM",
  "linux/386": "32-bit x86",
};

export function describePlatform(platform: string): string {
  const description = PLATFORM_DESCRIPTIONS[platform];
  return description ? `${platform} (${description})` : platform;
}

export type ChangelogOptions = {
  repository: string;
  platforms: readonly string[];
  floatingTag: string;
  maxCommits?: number;
  /** Decides which previous version counts as the baseline; defaults to one with the default baseline. */
  resolver?: VersionResolver;
  clock?: () => Date;
};

/**
 * Renders the release notes embedded in the tag
 * message. The text is opaque to every other component.
 */
export class ChangelogGenerator {
  private readonly maxCommits: number;
  private readonly resolver: VersionResolver;
  private readonly clock: () => Date;

  constructor(
    private readonly context: RepositoryContext,
    private readonly opts: ChangelogOptions,
  ) {
    this.maxCommits = opts.maxCommits ?? DEFAULT_MAX_COMMITS;
    this.resolver = opts.resolver ?? new VersionResolver(context);
    this.clock = opts.clock ?? (() => new Date());
  }

  async generate(newVersion: Version, previousVersion: Version): Promise<string> {
    const date = this.clock().toISOString().slice(0, 10);
    const lines: string[] = [`## ${newVersion.raw} (${date})`, ""];

    if (this.resolver.isBaseline(previousVersion)) {
      lines.push(
        "### Initial Release",
        "",
        "- First tagged release",
        `- Multi-architecture container images (${this.opts.platforms.join(", ")})`,
      );
    } else {
      const subjects = await this.context.vcs.logSubjects(previousVersion.raw, "HEAD", this.maxCommits);
      lines.push(`### Changes since ${previousVersion.raw}`, "");
      if (subjects.length === 0) lines.push("- No changes recorded");
      for (const subject of subjects) lines.push(`- ${subject}`);
    }

    const { repository, floatingTag } = this.opts;
    lines.push(
      "",
      "### Container Images",
      "",
      `- \`${repository}:${newVersion.raw}\``,
      `- \`${repository}:${floatingTag}\``,
      "",
      "### Supported Architectures",
      "",
      ...this.opts.platforms.map((p) => `- ${describePlatform(p)}`),
    );

    return lines.join("\n");
  }
}
