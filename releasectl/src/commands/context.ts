import path from "node:path";
import type { Writable } from "node:stream";
import { loadConfig } from "../config/loader.js";
import { toFailure } from "../core/orchestrator.js";
import { createExecFileRunner, type CommandRunner } from "../exec/command-runner.js";
import { openRepository } from "../git/context.js";
import { createLogger, type Logger, type OutputFormat } from "../logging/logger.js";
import type { VersionControl } from "../git/operations.js";
import type { ReleaseConfig } from "../types/config.js";
import type { RepositoryContext } from "../types/repository.js";

/** Options shared by every command. */
export type CommonOpts = {
  /** Project config directory, relative to `cwd` unless absolute. */
  config: string;
  env?: string;
  cwd: string;
  format: OutputFormat;
};

/** Process-level collaborators. Tests replace them; the CLI takes the defaults. */
export type CommandIo = {
  stream?: Writable;
  env?: NodeJS.ProcessEnv;
  vcs?: VersionControl;
  runner?: CommandRunner;
  clock?: () => Date;
};

export type CommandSetup = {
  config: ReleaseConfig;
  context: RepositoryContext;
  runner: CommandRunner;
  logger: Logger;
};

export function commandLogger(opts: CommonOpts, io: CommandIo): Logger {
  return createLogger(opts.format, io.stream ?? process.stdout);
}

/** Load config and open the repository. Failures are logged and returned as null. */
export function setupCommand(opts: CommonOpts, io: CommandIo, logger: Logger): CommandSetup | null {
  const root = path.resolve(opts.cwd);
  try {
    const config = loadConfig({
      configDir: path.resolve(root, opts.config),
      envName: opts.env,
      env: io.env ?? process.env,
    });
    return {
      config,
      context: openRepository(root, config, io.vcs),
      runner: io.runner ?? createExecFileRunner(),
      logger,
    };
  } catch (e) {
    const failure = toFailure(e);
    logger.error(failure.message, { code: failure.code });
    return null;
  }
}
