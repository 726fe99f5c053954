import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";
import { SchemaRegistry } from "../src/schema/registry.js";
import { testConfig } from "./support/fakes.js";

describe("config loader", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "releasectl-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled defaults", () => {
    const config = loadConfig({ env: {} });
    expect(config.schema_version).toBe("1.0.0");
    expect(config.release_branch).toBe("main");
    expect(config.validation.mode).toBe("fail-fast");
    expect(config.image.platforms).toEqual(["linux/amd64", "linux/arm64"]);
    expect(config.changelog.max_commits).toBe(20);
  });

  it("merges project base and environment overlays over the defaults", () => {
    fs.writeFileSync(path.join(dir, "base.yaml"), "image:\n  repository: acme/web\n  platforms: [linux/amd64]\n");
    fs.writeFileSync(path.join(dir, "staging.yaml"), "release_branch: staging\nvalidation:\n  mode: aggregate\n");

    const config = loadConfig({ configDir: dir, envName: "staging", env: {} });
    expect(config.image.repository).toBe("acme/web");
    expect(config.image.platforms).toEqual(["linux/amd64"]);
    expect(config.image.builder).toBe("multiplatform");
    expect(config.release_branch).toBe("staging");
    expect(config.validation.mode).toBe("aggregate");
  });

  it("ignores a missing config directory and overlay", () => {
    const config = loadConfig({ configDir: path.join(dir, "absent"), envName: "prod", env: {} });
    expect(config.image.repository).toBe("example/app");
  });

  it("applies environment variable overrides last", () => {
    fs.writeFileSync(path.join(dir, "base.yaml"), "release_branch: trunk\n");
    const config = loadConfig({
      configDir: dir,
      env: {
        RELEASECTL_RELEASE_BRANCH: "release",
        RELEASECTL_IMAGE__PLATFORMS: "linux/amd64, linux/arm/v7",
        RELEASECTL_CHANGELOG__MAX_COMMITS: "5",
        UNRELATED: "x",
      },
    });
    expect(config.release_branch).toBe("release");
    expect(config.image.platforms).toEqual(["linux/amd64", "linux/arm/v7"]);
    expect(config.changelog.max_commits).toBe(5);
  });

  it("rejects an invalid configuration", () => {
    fs.writeFileSync(path.join(dir, "base.yaml"), "validation:\n  mode: sometimes\n");
    expect(() => loadConfig({ configDir: dir, env: {} })).toThrow(ConfigError);
    expect(() => loadConfig({ configDir: dir, env: {} })).toThrow("Invalid configuration:");
  });

  it("rejects a file that is not a mapping", () => {
    fs.writeFileSync(path.join(dir, "base.yaml"), "- just\n- a list\n");
    let caught: unknown;
    try {
      loadConfig({ configDir: dir, env: {} });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "CONFIG_UNREADABLE" });
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: "x" }, { a: { c: [3] }, d: null })).toEqual({
      a: { b: 1, c: [3] },
      d: "x",
    });
  });
});

describe("applyEnvOverrides", () => {
  it("creates nested keys that did not exist", () => {
    expect(applyEnvOverrides({}, { RELEASECTL_BUILD__VERSION_BASE: "v2.0.0" })).toEqual({
      build: { version_base: "v2.0.0" },
    });
  });

  it("does not mutate its input", () => {
    const input = { image: { repository: "a/b" } };
    applyEnvOverrides(input, { RELEASECTL_IMAGE__REPOSITORY: "c/d" });
    expect(input.image.repository).toBe("a/b");
  });
});

describe("config validator", () => {
  it("accepts a complete configuration", () => {
    const result = validateConfig(testConfig());
    expect(result.valid).toBe(true);
  });

  it("rejects a malformed platform", () => {
    const config = testConfig();
    const result = validateConfig({ ...config, image: { ...config.image, platforms: ["amd64"] } });
    expect(result.valid).toBe(false);
  });

  it("loads the bundled manifest schema by name", () => {
    const registry = new SchemaRegistry().load();
    expect(registry.check("manifest-index", { schemaVersion: 2, manifests: [] })).toEqual({
      valid: true,
      value: { schemaVersion: 2, manifests: [] },
    });
    expect(registry.check("manifest-index", {})).toEqual({
      valid: false,
      errors: "data must have required property 'schemaVersion'",
    });
  });

  it("refuses an unknown schema name", () => {
    expect(() => new SchemaRegistry().load().check("release", {})).toThrow("Schema not found: release");
  });
});
