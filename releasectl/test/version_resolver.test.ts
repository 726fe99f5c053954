import { describe, expect, it } from "vitest";
import {
  VersionResolver,
  autoVersion,
  parseVersion,
  versionBase,
} from "../src/version/resolver.js";
import { VersionError } from "../src/errors.js";
import { FakeVcs, testContext } from "./support/fakes.js";

function resolverWith(tags: string[]): VersionResolver {
  return new VersionResolver(testContext(new FakeVcs({ tags })));
}

describe("parseVersion", () => {
  it("extracts numeric components from a v-prefixed tag", () => {
    expect(parseVersion("v1.2.3")).toEqual({ raw: "v1.2.3", major: 1, minor: 2, patch: 3 });
  });

  it("keeps components for a pre-release", () => {
    expect(parseVersion("v2.0.0-rc1")).toEqual({ raw: "v2.0.0-rc1", major: 2, minor: 0, patch: 0 });
  });

  it("keeps only the raw form of a non-semantic string", () => {
    expect(parseVersion("nightly")).toEqual({ raw: "nightly", major: null, minor: null, patch: null });
  });
});

describe("VersionResolver.latest", () => {
  it("returns the baseline when no tags exist", async () => {
    expect((await resolverWith([]).latest()).raw).toBe("v1.0.0");
  });

  it("orders tags semantically, not lexically", async () => {
    const latest = await resolverWith(["v1.9.0", "v1.10.0", "v1.2.0"]).latest();
    expect(latest.raw).toBe("v1.10.0");
  });

  it("ranks a release above its own pre-release", async () => {
    const latest = await resolverWith(["v2.0.0-rc1", "v2.0.0", "v1.4.0"]).latest();
    expect(latest.raw).toBe("v2.0.0");
  });

  it("ignores tags that are not versions", async () => {
    const latest = await resolverWith(["v1.1.0", "vendor-drop"]).latest();
    expect(latest.raw).toBe("v1.1.0");
  });

  it("uses a configured baseline", async () => {
    const resolver = new VersionResolver(testContext(new FakeVcs()), { baseline: "v0.1.0" });
    expect((await resolver.latest()).raw).toBe("v0.1.0");
    expect(resolver.isBaseline(parseVersion("v0.1.0"))).toBe(true);
  });
});

describe("VersionResolver.bump", () => {
  const resolver = resolverWith([]);
  const current = parseVersion("v1.2.3");

  it("bumps patch", () => {
    expect(resolver.bump(current, "patch").raw).toBe("v1.2.4");
  });

  it("bumps minor and resets patch", () => {
    expect(resolver.bump(current, "minor").raw).toBe("v1.3.0");
  });

  it("bumps major and resets minor and patch", () => {
    expect(resolver.bump(current, "major")).toEqual({ raw: "v2.0.0", major: 2, minor: 0, patch: 0 });
  });

  it("drops a pre-release suffix when bumping", () => {
    expect(resolver.bump(parseVersion("v2.0.0-rc1"), "patch").raw).toBe("v2.0.1");
  });

  it("rejects an unknown bump kind", () => {
    try {
      resolver.bump(current, "huge");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(VersionError);
      expect(e).toMatchObject({ code: "INVALID_BUMP_KIND" });
    }
  });

  it("rejects bumping a non-semantic version", () => {
    expect(() => resolver.bump(parseVersion("nightly"), "patch")).toThrow("Cannot bump non-semantic version: nightly");
  });
});

describe("VersionResolver.accept", () => {
  const resolver = resolverWith([]);

  it("accepts a pre-release as-is", () => {
    expect(resolver.accept("v2.0.0-rc1").raw).toBe("v2.0.0-rc1");
  });

  it("trims surrounding whitespace", () => {
    expect(resolver.accept("  v3.1.0 ").raw).toBe("v3.1.0");
  });

  it("rejects an empty version", () => {
    expect(() => resolver.accept("   ")).toThrow("Custom version required");
  });
});

describe("version helpers", () => {
  it("strips suffixes for the version base", () => {
    expect(versionBase(parseVersion("v1.4.2-rc1"))).toBe("v1.4.2");
    expect(versionBase(parseVersion("nightly"))).toBe("nightly");
  });

  it("derives an automatic build version in UTC", () => {
    const version = autoVersion("v1.4.2", new Date("2026-03-01T12:34:56.789Z"), "abc1234");
    expect(version.raw).toBe("v1.4.2-20260301-123456-abc1234");
    expect(version.major).toBe(1);
  });
});
