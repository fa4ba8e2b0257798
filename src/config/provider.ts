/**
 * Read-only key/value configuration consulted by the boundary adapter.
 *
 * Only one key is read today: `asn1-max-frames`.
 */

export const MAX_FRAMES_CONFIG_KEY = "asn1-max-frames";

export interface ConfigProvider {
  /** Raw string value for `key`, or undefined when not set. */
  get(key: string): string | undefined;
}

/** Provider over a fixed set of values (CLI flags, tests). */
export class MapConfigProvider implements ConfigProvider {
  private values: Map<string, string>;

  constructor(values: Record<string, string> | Map<string, string> = {}) {
    this.values = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

/**
 * Environment variable name for a config key: `asn1-max-frames` → `ASN1_MAX_FRAMES`.
 */
export function envVarName(key: string): string {
  return key.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

/** Provider backed by environment variables. */
export class EnvConfigProvider implements ConfigProvider {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    return this.env[envVarName(key)];
  }
}

/** First provider with a defined value wins. */
export class ChainedConfigProvider implements ConfigProvider {
  private providers: ConfigProvider[];

  constructor(...providers: ConfigProvider[]) {
    this.providers = providers;
  }

  get(key: string): string | undefined {
    for (const provider of this.providers) {
      const value = provider.get(key);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}

/** Provider with no values; parse results keep their defaults. */
export const emptyConfig: ConfigProvider = {
  get: () => undefined,
};
