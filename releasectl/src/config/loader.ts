import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import type { ReleaseConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULTS_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "RELEASECTL_";

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError("CONFIG_UNREADABLE", `Failed to parse ${filePath}: ${errorMessage(e)}`, { path: filePath });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError("CONFIG_UNREADABLE", `Expected a mapping at the top of ${filePath}`, { path: filePath });
  }
  return parsed;
}

/** Coerce an environment string to the shape of the value it replaces. */
function coerceEnvValue(value: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return value
      .split(",")
      .map((v) => v.trim())
      .filter((v) => v.length > 0);
  }
  if (typeof current === "number" && /^-?\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply RELEASECTL_ prefixed environment variable overrides.
 * RELEASECTL_RELEASE_BRANCH → release_branch, RELEASECTL_IMAGE__REPOSITORY → image.repository.
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const result = deepMerge({}, config);
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf) continue;

    let node = result;
    for (const segment of segments) {
      const child = node[segment];
      const next: ConfigTree = isPlainObject(child) ? { ...child } : {};
      node[segment] = next;
      node = next;
    }
    node[leaf] = coerceEnvValue(value, node[leaf]);
  }
  return result;
}

export type LoadConfigOptions = {
  /** Project config directory holding base.yaml and <env>.yaml. */
  configDir?: string;
  /** Environment overlay name, e.g. "staging" loads <configDir>/staging.yaml. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
  defaultsDir?: string;
};

/**
 * Load layered config: bundled defaults ← project base.yaml ← project
 * <env>.yaml ← environment variables. The result is schema-validated.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ReleaseConfig {
  let merged = loadYaml(path.join(opts.defaultsDir ?? DEFAULTS_DIR, "base.yaml"));

  if (opts.configDir) {
    merged = deepMerge(merged, loadYaml(path.join(opts.configDir, "base.yaml")));
    if (opts.envName) {
      merged = deepMerge(merged, loadYaml(path.join(opts.configDir, `${opts.envName}.yaml`)));
    }
  }

  merged = applyEnvOverrides(merged, opts.env);

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new ConfigError("CONFIG_INVALID", `Invalid configuration: ${result.errors}`);
  }
  return result.config;
}
