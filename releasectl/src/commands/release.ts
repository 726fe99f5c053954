import { VersionError } from "../errors.js";
import { toFailure } from "../core/orchestrator.js";
import { ReleasePipeline, type ReleaseRequest, type ReleaseResult } from "../pipeline/release-pipeline.js";
import { isBumpKind } from "../version/resolver.js";
import { BUMP_KINDS } from "../types/version.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { commandLogger, setupCommand, type CommandIo, type CommonOpts } from "./context.js";

export type ReleaseCommandOpts = CommonOpts & {
  /** major, minor, patch or custom. */
  kind: string;
  version?: string;
};

/** Turn the positional arguments into a release request, rejecting bad usage before any git work. */
export function parseReleaseRequest(kind: string, version?: string): ReleaseRequest {
  if (kind === "custom") {
    if (version === undefined || version.trim().length === 0) {
      throw new VersionError("EMPTY_CUSTOM_VERSION", "Custom version required");
    }
    return { kind: "custom", version };
  }
  if (!isBumpKind(kind)) {
    throw new VersionError("INVALID_BUMP_KIND", `Invalid bump type: ${kind} (expected ${BUMP_KINDS.join(", ")}, custom)`, {
      kind,
    });
  }
  if (version !== undefined) {
    throw new VersionError("UNEXPECTED_VERSION_ARGUMENT", `A version is only accepted with custom, not ${kind}: ${version}`, {
      kind,
      version,
    });
  }
  return { kind: "bump", bump: kind };
}

export type ReleaseCommandResult = { exitCode: ExitCode; result: ReleaseResult | null };

export async function release(opts: ReleaseCommandOpts, io: CommandIo = {}): Promise<ReleaseCommandResult> {
  const logger = commandLogger(opts, io);

  let request: ReleaseRequest;
  try {
    request = parseReleaseRequest(opts.kind, opts.version);
  } catch (e) {
    const failure = toFailure(e);
    logger.error(failure.message, { code: failure.code });
    return { exitCode: EXIT.FAILED, result: null };
  }

  const setup = setupCommand(opts, io, logger);
  if (!setup) return { exitCode: EXIT.FAILED, result: null };

  const pipeline = new ReleasePipeline({
    context: setup.context,
    config: setup.config,
    logger,
    clock: io.clock,
  });
  const result = await pipeline.run(request);
  return { exitCode: result.ok ? EXIT.SUCCESS : EXIT.FAILED, result };
}
