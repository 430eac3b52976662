/**
 * Mutable holder used while a configuration file is read, and the frozen
 * PipelineConfig it produces.
 */

import { CONFIG_KEYS, isConfigKey, type ConfigKey } from "./enums.js";
import { DEFAULT_OPTION_VALUES } from "./defaults.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

export class ConfigStore {
  private readonly values = new Map<string, string>();
  private readonly modules: string[] = [];
  private frozen: Readonly<PipelineConfig> | null = null;

  constructor(private readonly sourcePath: string) {}

  /**
   * Assign an option. A later assignment of the same key replaces the earlier one.
   */
  set(key: string, value: string): void {
    this.assertOpen();
    this.values.set(key, value);
  }

  /**
   * Value explicitly assigned to a key, if any. Defaults are not consulted.
   */
  getAssigned(key: string): string | undefined {
    return this.values.get(key);
  }

  /**
   * Effective value of a key: the assigned value, the documented default, or "".
   */
  get(key: string): string {
    const assigned = this.values.get(key);
    if (assigned !== undefined) {
      return assigned;
    }
    return isConfigKey(key) ? DEFAULT_OPTION_VALUES[key] : "";
  }

  addModules(names: readonly string[]): void {
    this.assertOpen();
    this.modules.push(...names);
  }

  /**
   * Produce the immutable configuration. Later calls return the same object.
   */
  freeze(): Readonly<PipelineConfig> {
    if (this.frozen) {
      return this.frozen;
    }

    const known: Record<string, string> = {};
    for (const key of CONFIG_KEYS) {
      known[key] = this.get(key);
    }

    const extras: Record<string, string> = {};
    for (const [key, value] of this.values) {
      if (!isConfigKey(key)) {
        extras[key] = value;
      }
    }

    const parsed = PipelineConfigSchema.parse({
      ...known,
      sourcePath: this.sourcePath,
      moduleDirectives: [...this.modules],
      extras,
    });

    this.frozen = deepFreeze(parsed);
    return this.frozen;
  }

  private assertOpen(): void {
    if (this.frozen) {
      throw new Error(`Configuration from ${this.sourcePath} is already frozen`);
    }
  }
}

/**
 * Read any option back from a frozen configuration, recognized or not.
 */
export function readOption(config: Readonly<PipelineConfig>, key: string): string {
  if (isConfigKey(key)) {
    return config[key];
  }
  return config.extras[key] ?? "";
}

/**
 * Copy a configuration with some recognized options replaced.
 */
export function deriveConfig(
  config: Readonly<PipelineConfig>,
  overrides: Partial<Record<ConfigKey, string>>
): Readonly<PipelineConfig> {
  return deepFreeze(
    PipelineConfigSchema.parse({
      ...config,
      moduleDirectives: [...config.moduleDirectives],
      extras: { ...config.extras },
      ...overrides,
    })
  );
}
