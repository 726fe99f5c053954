import { ManifestError, errorMessage } from "../errors.js";
import { tailOutput, type CommandRunner } from "../exec/command-runner.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ManifestEntry } from "../types/build.js";
import type { Logger } from "../logging/logger.js";

type ManifestDescriptor = {
  digest: string;
  mediaType?: string;
  platform?: { os: string; architecture: string; variant?: string };
};

/** Raw registry manifest; only image indexes and manifest lists carry `manifests`. */
export type ManifestIndex = {
  schemaVersion: number;
  mediaType?: string;
  manifests?: ManifestDescriptor[];
};

/**
 * Platform entries of a manifest index. Attestation descriptors, which
 * buildx publishes as `unknown/unknown`, are not platforms.
 */
export function manifestEntries(index: ManifestIndex): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  for (const m of index.manifests ?? []) {
    if (!m.platform || m.platform.os === "unknown") continue;
    const { os, architecture, variant } = m.platform;
    const platform = variant ? `${os}/${architecture}/${variant}` : `${os}/${architecture}`;
    entries.push({ platform, digest: m.digest });
  }
  return entries;
}

/** `linux/arm64` is satisfied by `linux/arm64` and by any `linux/arm64/<variant>`. */
export function platformSatisfied(expected: string, entries: readonly ManifestEntry[]): boolean {
  return entries.some((e) => e.platform === expected || e.platform.startsWith(`${expected}/`));
}

/** Checks that every declared platform made it into the pushed image. */
export class ManifestVerifier {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly opts: { cwd: string; registry?: SchemaRegistry },
  ) {}

  async verify(repository: string, version: string, expectedPlatforms: Iterable<string>): Promise<ManifestEntry[]> {
    const ref = `${repository}:${version}`;
    this.logger.info("Verifying multi-architecture manifest...");

    const result = await this.runner.run("docker", ["buildx", "imagetools", "inspect", "--raw", ref], {
      cwd: this.opts.cwd,
    });
    if (result.exitCode !== 0) {
      throw new ManifestError("MANIFEST_UNREADABLE", `Failed to inspect ${ref}: ${tailOutput(result)}`, { ref });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (e) {
      throw new ManifestError("MANIFEST_UNREADABLE", `Manifest for ${ref} is not JSON: ${errorMessage(e)}`, { ref });
    }

    const registry = this.opts.registry ?? defaultRegistry();
    const checked = registry.check<ManifestIndex>("manifest-index", raw);
    if (!checked.valid) {
      throw new ManifestError("MANIFEST_UNREADABLE", `Manifest for ${ref} is malformed: ${checked.errors}`, { ref });
    }

    const entries = manifestEntries(checked.value);
    const missing = [...expectedPlatforms].filter((p) => !platformSatisfied(p, entries));
    if (missing.length > 0) {
      const found = entries.map((e) => e.platform).join(", ") || "none";
      throw new ManifestError(
        "INCOMPLETE_MANIFEST",
        `Multi-architecture manifest verification failed for ${ref}: missing ${missing.join(", ")} (found ${found})`,
        { ref, missing, found: entries.map((e) => e.platform) },
      );
    }

    this.logger.info("Multi-architecture manifest verified");
    for (const entry of entries) {
      this.logger.info(`  ${entry.platform}  ${entry.digest}`);
    }
    return entries;
  }
}
