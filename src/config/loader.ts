// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigLoader, ConfigValidationResult, ConsoleConfig } from './types';
import { createDefaultConfig, validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_FILES = [
  'resource-console.yml',
  'resource-console.yaml',
  'resource-console.json'
];

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class ConsoleConfigLoader implements ConfigLoader {

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated ConsoleConfig with defaults applied
   */
  async load(path: string): Promise<ConsoleConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      return validateAndNormalizeConfig(this.resolveEnvironmentVariables(rawConfig));
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first configuration file that exists among `searchPaths`.
   * Falls back to the defaults when none exists.
   */
  async loadFromPaths(searchPaths: string[]): Promise<ConsoleConfig> {
    const found = searchPaths.find(path => existsSync(path));
    if (!found) {
      return createDefaultConfig();
    }
    return this.load(found);
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder
      return match;
    });
  }
}

export function createConfigLoader(): ConsoleConfigLoader {
  return new ConsoleConfigLoader();
}

/**
 * Load configuration from an explicit path, or from the standard file names in `cwd`
 */
export async function loadConsoleConfig(path?: string, cwd: string = process.cwd()): Promise<ConsoleConfig> {
  const loader = createConfigLoader();
  if (path) {
    return loader.load(resolve(cwd, path));
  }
  return loader.loadFromPaths(DEFAULT_CONFIG_FILES.map(file => resolve(cwd, file)));
}
