import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { SecretsConfig } from "../types/config.js";
import type { EnvironmentName } from "../types/trigger.js";
import { ConfigurationError } from "../core/errors.js";

export type SecretLookup = { found: true; value: string } | { found: false };

const NOT_FOUND: SecretLookup = { found: false };

/**
 * Environment-scoped secret lookup. An empty value counts as not found.
 */
export interface SecretResolver {
  resolveSecret(environment: EnvironmentName, key: string): Promise<SecretLookup>;
}

function found(value: string | undefined): SecretLookup {
  return value ? { found: true, value } : NOT_FOUND;
}

/** Reads {prefix}{ENVIRONMENT}_{KEY}, e.g. DEPLOYCTL_SECRET_STAGING_DATABASE_URL. */
export class EnvSecretResolver implements SecretResolver {
  constructor(
    private readonly prefix: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  variableName(environment: EnvironmentName, key: string): string {
    return `${this.prefix}${environment.toUpperCase()}_${key}`;
  }

  async resolveSecret(environment: EnvironmentName, key: string): Promise<SecretLookup> {
    return found(this.env[this.variableName(environment, key)]);
  }
}

/** YAML file shaped as { <environment>: { <KEY>: value } }, read once on first use. */
export class FileSecretResolver implements SecretResolver {
  private data: Map<string, Map<string, string>> | null = null;

  constructor(private readonly filePath: string) {}

  async resolveSecret(environment: EnvironmentName, key: string): Promise<SecretLookup> {
    return found(this.load().get(environment)?.get(key));
  }

  private load(): Map<string, Map<string, string>> {
    if (this.data) return this.data;
    if (!fs.existsSync(this.filePath)) {
      throw new ConfigurationError("SECRETS_FILE_MISSING", `Secrets file not found: ${this.filePath}`);
    }

    const parsed: unknown = YAML.parse(fs.readFileSync(this.filePath, "utf8"));
    const data = new Map<string, Map<string, string>>();
    if (parsed && typeof parsed === "object") {
      for (const [env, values] of Object.entries(parsed)) {
        if (!values || typeof values !== "object") continue;
        const entries = new Map<string, string>();
        for (const [k, v] of Object.entries(values)) {
          if (typeof v === "string" || typeof v === "number") entries.set(k, String(v));
        }
        data.set(env, entries);
      }
    }
    this.data = data;
    return data;
  }
}

/** First resolver that finds the key wins. */
export class ChainSecretResolver implements SecretResolver {
  constructor(private readonly resolvers: SecretResolver[]) {}

  async resolveSecret(environment: EnvironmentName, key: string): Promise<SecretLookup> {
    for (const resolver of this.resolvers) {
      const res = await resolver.resolveSecret(environment, key);
      if (res.found) return res;
    }
    return NOT_FOUND;
  }
}

/** Environment variables first, then the secrets file when one is configured. */
export function createSecretResolver(
  config: SecretsConfig,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
): SecretResolver {
  const resolvers: SecretResolver[] = [new EnvSecretResolver(config.env_prefix, env)];
  if (config.file) {
    resolvers.push(new FileSecretResolver(path.resolve(baseDir, config.file)));
  }
  return new ChainSecretResolver(resolvers);
}
