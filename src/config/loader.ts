// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, errorMessage } from '../errors';
import { DEFAULT_RETRY_POLICY } from '../orchestration/retry-controller';
import { PlatformPlan } from '../types';
import { compilePlan } from './plan';
import { ConfigValidationResult, PlatformConfig } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = ['platform.yml', 'platform.yaml', 'platform.json'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const DEFAULTS: Record<string, unknown> = {
  platform: {
    namespace: 'default',
    pollIntervalSeconds: 5,
    reconcileIntervalSeconds: 60,
    concurrency: 4,
    conflictGraceSeconds: 2,
    deleteGraceSeconds: 5
  },
  defaults: {
    timeoutSeconds: 300,
    retryPolicy: { ...DEFAULT_RETRY_POLICY }
  }
};

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class PlatformConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load, substitute, default and validate a configuration file
   * @throws ConfigurationError when the file is missing, unparsable or invalid
   */
  async load(path: string): Promise<PlatformConfig> {
    if (!existsSync(path)) {
      throw new ConfigurationError([{ location: path, message: 'configuration file not found' }]);
    }

    const content = await readFile(path, 'utf-8');
    let rawConfig: unknown;
    try {
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      throw new ConfigurationError([{ location: path, message: errorMessage(error) }], 'Failed to parse configuration');
    }

    const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
    return validateAndNormalizeConfig(this.applyDefaults(configWithEnvVars));
  }

  /**
   * Load a configuration file and compile it into a deployment plan,
   * reading manifest files relative to the configuration file
   */
  async loadPlan(path: string): Promise<PlatformPlan> {
    const config = await this.load(path);
    return compilePlan(config, dirname(resolve(path)));
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(this.applyDefaults(config));
  }

  /**
   * Resolve the first existing path among the candidates
   * @throws ConfigurationError when none exists
   */
  findConfig(searchPaths: string[] = DEFAULT_CONFIG_PATHS, cwd = process.cwd()): string {
    for (const candidate of searchPaths) {
      const fullPath = resolve(cwd, candidate);
      if (existsSync(fullPath)) {
        return fullPath;
      }
    }
    throw new ConfigurationError(
      [{ location: cwd, message: `no configuration file found (looked for ${searchPaths.join(', ')})` }]
    );
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

    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, expression: string) => {
      const [varName, defaultValue] = expression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset without a default: keep the placeholder
      return match;
    });
  }

  private applyDefaults(config: unknown): unknown {
    return isRecord(config) ? this.deepMerge(DEFAULTS, config) : config;
  }

  /**
   * Deep merge two objects, with the second object taking precedence
   */
  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): PlatformConfigLoader {
  return new PlatformConfigLoader(env);
}

/**
 * Load the plan from the given path, or from platform.yml, platform.yaml or
 * platform.json in the working directory
 */
export async function loadPlan(path?: string, env?: NodeJS.ProcessEnv): Promise<PlatformPlan> {
  const loader = createConfigLoader(env);
  return loader.loadPlan(path ? resolve(path) : loader.findConfig());
}
