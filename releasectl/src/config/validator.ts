import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ReleaseConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: ReleaseConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(config: unknown, registry: SchemaRegistry = defaultRegistry()): ConfigValidationResult {
  const checked = registry.check<ReleaseConfig>("config", config);
  if (!checked.valid) return { valid: false, errors: checked.errors };
  return { valid: true, config: checked.value };
}
