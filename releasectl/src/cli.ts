#!/usr/bin/env node

import { Command, Option } from "commander";
import { release } from "./commands/release.js";
import { build } from "./commands/build.js";
import type { OutputFormat } from "./logging/logger.js";

type GlobalOpts = { config: string; env?: string; cwd: string; format: OutputFormat };

const program = new Command();

program
  .name("releasectl")
  .description("Release and multi-architecture image build CLI")
  .version("0.1.0");

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Project config directory (relative to --cwd)", "release")
    .option("--env <name>", "Environment overlay, loads <config>/<name>.yaml")
    .option("--cwd <path>", "Repository root", process.cwd())
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

withCommonOptions(
  program
    .command("release")
    .description("Bump, commit, tag and push a release")
    .argument("<kind>", "major | minor | patch | custom")
    .argument("[version]", "Version to use with custom, e.g. v2.0.0-rc1")
    .allowExcessArguments(false),
).action(async (kind: string, version: string | undefined, opts: GlobalOpts) => {
  const res = await release({ ...opts, kind, version });
  process.exitCode = res.exitCode;
});

withCommonOptions(
  program
    .command("build")
    .description("Build, push and verify a multi-architecture image")
    .argument("[version]", "Image version (default: <base>-<timestamp>-<shortHash>)")
    .option("--no-latest", "Do not push the floating tag")
    .option("--no-git-tag", "Do not create a git tag")
    .allowExcessArguments(false),
).action(async (version: string | undefined, opts: GlobalOpts & { latest: boolean; gitTag: boolean }) => {
  const res = await build({ ...opts, version, latest: opts.latest, gitTag: opts.gitTag });
  process.exitCode = res.exitCode;
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ level: "error", code: "UNEXPECTED", message }) + "\n");
  process.exit(1);
});
