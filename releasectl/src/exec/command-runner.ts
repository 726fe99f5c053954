import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Structured subprocess invocation. Arguments are passed as a list and never
 * joined into a shell string.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], opts?: { cwd?: string }): Promise<CommandResult>;
}

type ExecFailure = {
  code?: number | string | null;
  stdout?: string;
  stderr?: string;
  message: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return typeof e === "object" && e !== null && "message" in e;
}

/** Exit code reported for a command that could not be started at all. */
export const SPAWN_FAILURE_EXIT = 127;

/** Runner backed by execFile. A non-zero exit resolves; it never rejects. */
export function createExecFileRunner(): CommandRunner {
  return {
    async run(command, args, opts) {
      try {
        const { stdout, stderr } = await pExecFile(command, [...args], {
          cwd: opts?.cwd,
          maxBuffer: 50 * 1024 * 1024, // 50MB
          shell: false,
        });
        return { exitCode: 0, stdout, stderr };
      } catch (e) {
        if (!isExecFailure(e)) throw e;
        const exitCode = typeof e.code === "number" ? e.code : SPAWN_FAILURE_EXIT;
        return {
          exitCode,
          stdout: e.stdout ?? "",
          stderr: e.stderr || e.message,
        };
      }
    },
  };
}

/** Last few lines of a command's error output, for error messages. */
export function tailOutput(result: CommandResult, lines = 5): string {
  const text = (result.stderr || result.stdout).trim();
  return text.split("\n").slice(-lines).join("\n");
}
