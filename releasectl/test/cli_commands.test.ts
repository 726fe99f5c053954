import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { build } from "../src/commands/build.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { parseReleaseRequest, release } from "../src/commands/release.js";
import type { CommonOpts } from "../src/commands/context.js";
import { FakeRunner, FakeVcs, StringSink, manifestJson } from "./support/fakes.js";

describe("parseReleaseRequest", () => {
  it("maps bump kinds and custom versions", () => {
    expect(parseReleaseRequest("minor")).toEqual({ kind: "bump", bump: "minor" });
    expect(parseReleaseRequest("custom", "v2.0.0-rc1")).toEqual({ kind: "custom", version: "v2.0.0-rc1" });
  });

  it("rejects an unknown kind", () => {
    expect(() => parseReleaseRequest("huge")).toThrow("Invalid bump type: huge (expected major, minor, patch, custom)");
  });

  it("requires a version with custom", () => {
    expect(() => parseReleaseRequest("custom")).toThrow("Custom version required");
  });

  it("rejects a version given with a bump kind", () => {
    let caught: unknown;
    try {
      parseReleaseRequest("patch", "v9.9.9");
    } catch (e) {
      caught = e;
    }
    expect(caught).toMatchObject({
      code: "UNEXPECTED_VERSION_ARGUMENT",
      message: "A version is only accepted with custom, not patch: v9.9.9",
      details: { kind: "patch", version: "v9.9.9" },
    });
  });
});

describe("commands", () => {
  let root: string;
  let opts: CommonOpts;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "releasectl-cli-"));
    fs.mkdirSync(path.join(root, "release"));
    fs.writeFileSync(path.join(root, "release/base.yaml"), "image:\n  repository: acme/web\n  platforms: [linux/amd64]\n");
    fs.writeFileSync(path.join(root, "README.md"), "docker pull acme/web:v1.0.0\n");
    opts = { config: "release", cwd: root, format: "jsonl" };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function errorLines(sink: StringSink): unknown[] {
    return sink
      .lines()
      .map((l) => JSON.parse(l))
      .filter((l) => l.level === "error");
  }

  it("release exits 0 and reports in jsonl", async () => {
    const sink = new StringSink();
    const vcs = new FakeVcs({ tags: ["v1.0.0", "v1.0.1"] });
    const res = await release({ ...opts, kind: "patch" }, { stream: sink, vcs, env: {} });

    expect(res.exitCode).toBe(EXIT.SUCCESS);
    expect(vcs.pushed).toEqual(["main", "v1.0.2"]);
    expect(fs.readFileSync(path.join(root, "README.md"), "utf8")).toBe("docker pull acme/web:v1.0.2\n");
    expect(errorLines(sink)).toEqual([]);
  });

  it("release reports a usage error before any git work", async () => {
    const sink = new StringSink();
    const vcs = new FakeVcs({ branch: "develop" });
    const res = await release({ ...opts, kind: "custom" }, { stream: sink, vcs, env: {} });

    expect(res).toEqual({ exitCode: EXIT.FAILED, result: null });
    expect(sink.lines().map((l) => JSON.parse(l))).toEqual([
      { level: "error", code: "EMPTY_CUSTOM_VERSION", message: "Custom version required" },
    ]);
  });

  it("release refuses a stray version before any git work", async () => {
    const sink = new StringSink();
    const vcs = new FakeVcs();
    const res = await release({ ...opts, kind: "patch", version: "v9.9.9" }, { stream: sink, vcs, env: {} });

    expect(res).toEqual({ exitCode: EXIT.FAILED, result: null });
    expect(vcs.calls).toEqual([]);
    expect(fs.readFileSync(path.join(root, "README.md"), "utf8")).toBe("docker pull acme/web:v1.0.0\n");
  });

  it("release exits 1 with the failing code", async () => {
    const sink = new StringSink();
    const vcs = new FakeVcs({ clean: false });
    const res = await release({ ...opts, kind: "major" }, { stream: sink, vcs, env: {} });

    expect(res.exitCode).toBe(EXIT.FAILED);
    expect(errorLines(sink)).toEqual([
      {
        level: "error",
        code: "DIRTY_WORKING_TREE",
        message: "Uncommitted changes detected. Please commit or stash changes first.",
        details: { pipeline: "release", stage: "validate" },
      },
    ]);
  });

  it("release fails on invalid configuration", async () => {
    fs.writeFileSync(path.join(root, "release/prod.yaml"), "changelog:\n  max_commits: 0\n");
    const sink = new StringSink();
    const res = await release({ ...opts, env: "prod", kind: "patch" }, { stream: sink, vcs: new FakeVcs(), env: {} });

    expect(res.exitCode).toBe(EXIT.FAILED);
    expect(errorLines(sink)).toEqual([expect.objectContaining({ code: "CONFIG_INVALID" })]);
  });

  it("build exits 0 with only the version tag under --no-latest", async () => {
    const sink = new StringSink();
    const runner = new FakeRunner([
      { match: "buildx imagetools inspect", result: { stdout: manifestJson(["linux/amd64"]) } },
    ]);
    const res = await build(
      { ...opts, version: "v2.0.0-rc1", latest: false, gitTag: false },
      { stream: sink, vcs: new FakeVcs(), runner, env: {} },
    );

    expect(res.exitCode).toBe(EXIT.SUCCESS);
    const result = res.result;
    if (!result || !result.ok) throw new Error("build did not succeed");
    expect([...result.target.tags]).toEqual(["v2.0.0-rc1"]);
    expect(runner.lines()).toContain("buildx build --platform linux/amd64 -t acme/web:v2.0.0-rc1 --push .");
  });

  it("build exits 1 on an incomplete manifest", async () => {
    const sink = new StringSink();
    const runner = new FakeRunner([
      { match: "buildx imagetools inspect", result: { stdout: manifestJson(["linux/arm64"]) } },
    ]);
    const res = await build({ ...opts, version: "v1.0.1", latest: true, gitTag: true }, { stream: sink, vcs: new FakeVcs(), runner, env: {} });

    expect(res.exitCode).toBe(EXIT.FAILED);
    expect(errorLines(sink)).toEqual([expect.objectContaining({ code: "INCOMPLETE_MANIFEST" })]);
  });
});
