import semver from "semver";
import { VersionError } from "../errors.js";
import { BUMP_KINDS, type BumpKind, type Version } from "../types/version.js";
import type { RepositoryContext } from "../types/repository.js";

const DEFAULT_BASELINE = "v1.0.0";
const DEFAULT_TAG_PATTERN = "v*";

/** Best-effort parse. Anything semver rejects keeps only its raw form. */
export function parseVersion(raw: string): Version {
  const parsed = semver.parse(raw);
  if (!parsed) return { raw, major: null, minor: null, patch: null };
  return { raw, major: parsed.major, minor: parsed.minor, patch: parsed.patch };
}

export function isBumpKind(kind: string): kind is BumpKind {
  return BUMP_KINDS.some((k) => k === kind);
}

/** `vX.Y.Z` with any suffix dropped, or the raw string when it has no numeric parts. */
export function versionBase(version: Version): string {
  if (version.major === null || version.minor === null || version.patch === null) return version.raw;
  return `v${version.major}.${version.minor}.${version.patch}`;
}

export class VersionResolver {
  private readonly tagPattern: string;
  private readonly baseline: string;

  constructor(
    private readonly context: RepositoryContext,
    opts?: { tagPattern?: string; baseline?: string },
  ) {
    this.tagPattern = opts?.tagPattern ?? DEFAULT_TAG_PATTERN;
    this.baseline = opts?.baseline ?? DEFAULT_BASELINE;
  }

  /** Highest existing version tag by semantic ordering, or the baseline when there is none. */
  async latest(): Promise<Version> {
    const tags = await this.context.vcs.listTags(this.tagPattern);
    const versions = tags.filter((t) => semver.valid(t) !== null);
    if (versions.length === 0) return parseVersion(this.baseline);
    const [highest] = semver.rsort(versions);
    return parseVersion(highest);
  }

  bump(current: Version, kind: string): Version {
    if (!isBumpKind(kind)) {
      throw new VersionError("INVALID_BUMP_KIND", `Invalid bump type: ${kind} (expected ${BUMP_KINDS.join(", ")})`, {
        kind,
      });
    }
    const { major, minor, patch } = current;
    if (major === null || minor === null || patch === null) {
      throw new VersionError("UNPARSEABLE_VERSION", `Cannot bump non-semantic version: ${current.raw}`, {
        version: current.raw,
      });
    }

    switch (kind) {
      case "major":
        return make(major + 1, 0, 0);
      case "minor":
        return make(major, minor + 1, 0);
      case "patch":
        return make(major, minor, patch + 1);
    }
  }

  /** Accept an operator-supplied version. Only emptiness is rejected; `v2.0.0-rc1` passes as-is. */
  accept(custom: string): Version {
    const raw = custom.trim();
    if (raw.length === 0) {
      throw new VersionError("EMPTY_CUSTOM_VERSION", "Custom version required");
    }
    return parseVersion(raw);
  }

  /** True when `version` is the configured baseline, i.e. no release has been tagged yet. */
  isBaseline(version: Version): boolean {
    return version.raw === this.baseline;
  }
}

function make(major: number, minor: number, patch: number): Version {
  return { raw: `v${major}.${minor}.${patch}`, major, minor, patch };
}

/** `<base>-<YYYYMMDD-HHMMSS>-<shortHash>`, timestamp in UTC. */
export function autoVersion(base: string, at: Date, shortHash: string): Version {
  const stamp = at.toISOString().replace(/\.\d+Z$/, "").replace(/-/g, "").replace(/:/g, "").replace("T", "-");
  return parseVersion(`${base}-${stamp}-${shortHash}`);
}
