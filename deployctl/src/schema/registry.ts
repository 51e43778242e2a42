import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

/**
 * Discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const raw = fs.readFileSync(filePath, "utf8");
      const schema: Record<string, unknown> = JSON.parse(raw);

      // "run-state.schema.json" → "run-state"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile and cache a validator for the given schema name. */
  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.instance();
    const validate = ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Compile a named schema into a type guard for the shape it describes. */
  async compileAs<T>(name: string): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    const ajv = await this.instance();
    return ajv.compile<T>(entry.schema);
  }

  async errorsText(errors: unknown): Promise<string> {
    const ajv = await this.instance();
    return ajv.errorsText(errors);
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<SchemaCheck> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    const ajv = await this.instance();

    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors),
    };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

/** Extract a semver-like version from schema metadata. */
function extractVersion(schema: Record<string, unknown>): string | null {
  // e.g. "https://deployctl.dev/schemas/run-state@1.0.0"
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }

  return null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}
