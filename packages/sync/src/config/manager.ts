/**
 * Configuration Manager
 *
 * YAML-based configuration management with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Schema validation
 * - Default value application
 * - Programmatic overrides
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import type { PolicySyncConfig } from './types';
import { parsePolicySyncConfig } from './schema';
import { ConfigLoadError } from './errors';

export interface ConfigManagerOptions {
  /** Explicit configuration file path */
  configPath?: string;
  /** Prefix applied to every substituted environment variable name */
  envPrefix?: string;
  /** Values merged over the file contents before validation */
  overrides?: Record<string, unknown>;
  /** Environment used for substitution (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

// Default search paths for configuration files
const DEFAULT_SEARCH_PATHS = [
  './policy-sync.yaml',
  './config/policy-sync.yaml',
  '/etc/policy-sync/config.yaml',
];

// Matches a value that is exactly one placeholder, e.g. "${POLL_INTERVAL}"
const SINGLE_PLACEHOLDER = /^\$\{\w+(?::-[^}]*)?\}$/;

export class ConfigManager {
  private config: PolicySyncConfig | null = null;

  constructor(private options: ConfigManagerOptions = {}) {}

  load(): PolicySyncConfig {
    const env = this.options.env ?? process.env;
    const configPath = this.options.configPath ?? env.POLICY_SYNC_CONFIG ?? this.findConfigFile();

    let loaded: Record<string, unknown> = {};

    if (configPath) {
      if (!fs.existsSync(configPath)) {
        throw new ConfigLoadError(`Config file not found: ${configPath}`);
      }
      const parsed = this.parseYaml(this.loadFile(configPath));
      loaded = this.toRecord(this.substituteEnvVars(parsed, env));
    } else if (!this.options.overrides) {
      throw new ConfigLoadError(
        `No configuration file found (searched: ${DEFAULT_SEARCH_PATHS.join(', ')})`,
      );
    }

    if (this.options.overrides) {
      loaded = this.deepMerge(loaded, this.options.overrides);
    }

    this.config = parsePolicySyncConfig(loaded);
    return this.config;
  }

  get(): PolicySyncConfig {
    if (!this.config) {
      throw new ConfigLoadError('Configuration has not been loaded. Call load() first.');
    }
    return this.config;
  }

  private findConfigFile(): string | null {
    for (const searchPath of DEFAULT_SEARCH_PATHS) {
      if (fs.existsSync(searchPath)) {
        return searchPath;
      }
    }
    return null;
  }

  private loadFile(path: string): string {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(`Failed to read config file: ${path}`, e);
    }
  }

  private parseYaml(content: string): unknown {
    try {
      return yaml.parse(content) ?? {};
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML syntax', e);
    }
  }

  private substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
    if (typeof obj === 'string') {
      const substituted = obj.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_match, name: string, defaultVal: string | undefined) => {
        const envName = this.options.envPrefix ? `${this.options.envPrefix}${name}` : name;
        const value = env[envName];

        // Empty string counts as "not set" when a default exists
        if (value === '' && defaultVal !== undefined) {
          return defaultVal;
        }

        if (value === undefined && defaultVal === undefined) {
          throw new ConfigLoadError(`Required environment variable '${envName}' not set`);
        }
        return value ?? defaultVal ?? '';
      });

      // A value made of a single placeholder takes the scalar type of its result
      return SINGLE_PLACEHOLDER.test(obj) ? this.convertScalar(substituted) : substituted;
    }
    if (Array.isArray(obj)) {
      return obj.map((v) => this.substituteEnvVars(v, env));
    }
    if (typeof obj === 'object' && obj !== null) {
      return Object.fromEntries(
        Object.entries(obj).map(([k, v]) => [k, this.substituteEnvVars(v, env)])
      );
    }
    return obj;
  }

  private convertScalar(value: string): string | number | boolean {
    if (/^\d+$/.test(value)) return parseInt(value, 10);
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  private toRecord(value: unknown): Record<string, unknown> {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      throw new ConfigLoadError('Configuration root must be a mapping');
    }
    return Object.fromEntries(Object.entries(value));
  }

  private deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(override)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }

    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
