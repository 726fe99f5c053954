import { BuildPipeline, type BuildResult } from "../pipeline/build-pipeline.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { commandLogger, setupCommand, type CommandIo, type CommonOpts } from "./context.js";

export type BuildCommandOpts = CommonOpts & {
  version?: string;
  /** `--no-latest` sets this false. */
  latest: boolean;
  /** `--no-git-tag` sets this false. */
  gitTag: boolean;
};

export type BuildCommandResult = { exitCode: ExitCode; result: BuildResult | null };

export async function build(opts: BuildCommandOpts, io: CommandIo = {}): Promise<BuildCommandResult> {
  const logger = commandLogger(opts, io);
  const setup = setupCommand(opts, io, logger);
  if (!setup) return { exitCode: EXIT.FAILED, result: null };

  const pipeline = new BuildPipeline({
    context: setup.context,
    config: setup.config,
    runner: setup.runner,
    logger,
    clock: io.clock,
  });
  const result = await pipeline.run({ version: opts.version, latest: opts.latest, gitTag: opts.gitTag });
  return { exitCode: result.ok ? EXIT.SUCCESS : EXIT.FAILED, result };
}
