/** Error taxonomy for the release and build pipelines. */

export type VersionErrorCode =
  | "INVALID_BUMP_KIND"
  | "EMPTY_CUSTOM_VERSION"
  | "UNEXPECTED_VERSION_ARGUMENT"
  | "UNPARSEABLE_VERSION";
export type RepositoryStateErrorCode = "WRONG_BRANCH" | "DIRTY_WORKING_TREE" | "OUT_OF_SYNC_WITH_REMOTE";
export type ArtifactUpdateErrorCode = "READ_FAILED" | "WRITE_FAILED";
export type TagErrorCode = "TAG_EXISTS" | "TAG_CREATE_FAILED" | "PUSH_FAILED";
export type BuildErrorCode = "BUILDX_UNAVAILABLE" | "BUILDER_SETUP_FAILED" | "BUILD_FAILED";
export type ManifestErrorCode = "INCOMPLETE_MANIFEST" | "MANIFEST_UNREADABLE";
export type VcsErrorCode = "COMMIT_FAILED" | "FETCH_FAILED" | "GIT_FAILED";
export type ConfigErrorCode = "CONFIG_INVALID" | "CONFIG_UNREADABLE";

export type ErrorCode =
  | VersionErrorCode
  | RepositoryStateErrorCode
  | ArtifactUpdateErrorCode
  | TagErrorCode
  | BuildErrorCode
  | ManifestErrorCode
  | VcsErrorCode
  | ConfigErrorCode;

export class ReleaseError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C;
  readonly details?: Record<string, unknown>;

  constructor(code: C, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ReleaseError";
    this.code = code;
    this.details = details;
  }
}

export class VersionError extends ReleaseError<VersionErrorCode> {
  constructor(code: VersionErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "VersionError";
  }
}

export type StateViolation = {
  code: RepositoryStateErrorCode;
  message: string;
};

/**
 * Raised by the repository state validator. `violations` holds every failed
 * check in check order; in fail-fast mode it has exactly one entry.
 */
export class RepositoryStateError extends ReleaseError<RepositoryStateErrorCode> {
  readonly violations: StateViolation[];

  constructor(violations: [StateViolation, ...StateViolation[]]) {
    const [first] = violations;
    const message = violations.length === 1 ? first.message : violations.map((v) => v.message).join("; ");
    super(first.code, message, { violations: violations.map((v) => v.code) });
    this.name = "RepositoryStateError";
    this.violations = violations;
  }
}

export class ArtifactUpdateError extends ReleaseError<ArtifactUpdateErrorCode> {
  constructor(code: ArtifactUpdateErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ArtifactUpdateError";
  }
}

export class TagError extends ReleaseError<TagErrorCode> {
  constructor(code: TagErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "TagError";
  }
}

export class BuildError extends ReleaseError<BuildErrorCode> {
  constructor(code: BuildErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "BuildError";
  }
}

export class ManifestError extends ReleaseError<ManifestErrorCode> {
  constructor(code: ManifestErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ManifestError";
  }
}

export class VcsError extends ReleaseError<VcsErrorCode> {
  constructor(code: VcsErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "VcsError";
  }
}

export class ConfigError extends ReleaseError<ConfigErrorCode> {
  constructor(code: ConfigErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ConfigError";
  }
}

/** Message of any thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
