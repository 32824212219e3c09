// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { DeploymentConfig } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { ConfigLoader, ConfigValidationResult } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';

export const DEFAULT_CONFIG_PATHS = ['./deploy.yml', './deploy.yaml', './deploy.json'];

type ConfigNode = Record<string, unknown>;

function isConfigNode(value: unknown): value is ConfigNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class DeploymentConfigLoader implements ConfigLoader {

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated and normalized DeploymentConfig
   */
  async load(path: string): Promise<DeploymentConfig> {
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

      if (!isConfigNode(rawConfig)) {
        throw new Error('Configuration must be a mapping');
      }

      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);

      return validateAndNormalizeConfig(configWithEnvVars);
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load configuration from the first path that exists and is valid
   * @param searchPaths - Array of paths to search for configuration files
   */
  async loadFromPaths(searchPaths: string[]): Promise<DeploymentConfig> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(`${path}: ${errorMessage(error)}`);
      }
    }

    throw new ConfigurationError(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
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

    if (isConfigNode(value)) {
      const result: ConfigNode = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder so validation can report it
      return match;
    });
  }
}

export function createConfigLoader(): DeploymentConfigLoader {
  return new DeploymentConfigLoader();
}

/**
 * Load configuration from standard locations
 * Searches for deploy.yml, deploy.yaml, deploy.json in current directory
 */
export async function loadDefaultConfig(): Promise<DeploymentConfig> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_PATHS);
}
