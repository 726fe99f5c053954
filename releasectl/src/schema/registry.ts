import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  schema: unknown;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/**
 * Schema registry — discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string = SCHEMA_DIR) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "config.schema.json" → "config"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, schema });
    }
    return this;
  }

  /** Validate data against a named schema, narrowing it to `T` on success. */
  check<T>(name: string, data: unknown): SchemaCheck<T> {
    const validate = this.getValidator<T>(name);
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }

  private getValidator<T>(name: string): AjvValidateFn<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    // ajv caches compiled validators per schema object.
    return this.ajv.compile<T>(entry.schema);
  }
}

let shared: SchemaRegistry | null = null;

/** Registry over the bundled schemas directory, loaded once per process. */
export function defaultRegistry(): SchemaRegistry {
  shared ??= new SchemaRegistry().load();
  return shared;
}
