// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ProvisioningPlan } from '../types';
import { ConfigLoader, ConfigValidationError, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';
import { createDefaultPlan, DEFAULT_CONFIG_PATHS, DEFAULT_RESOURCE_GROUP } from './defaults';
import { createNamingService } from './naming';

export interface PlanOverrides {
  /** Replaces the plan's default resource group */
  resourceGroup?: string;
}

export type Environment = Record<string, string | undefined>;

export interface LoadedPlan {
  plan: ProvisioningPlan;
  /** The file the plan came from, or BUILT_IN_SOURCE */
  source: string;
}

export const BUILT_IN_SOURCE = 'built-in plan';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads provisioning plans from YAML or JSON with environment variable substitution
 */
export class DeploymentConfigLoader implements ConfigLoader {
  constructor(private readonly env: Environment = process.env) {}

  /**
   * Load and parse a plan from a file
   * @param path - Path to the plan file (YAML or JSON)
   * @returns Validated plan with defaults applied
   */
  async load(path: string, overrides: PlanOverrides = {}): Promise<ProvisioningPlan> {
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
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      return this.prepare(rawConfig, overrides);
    } catch (error) {
      const errors = error instanceof ConfigValidationError ? error.errors : [];
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Failed to load configuration from ${path}: ${message}`, errors);
    }
  }

  /**
   * Validate a plan object without loading it from a file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first plan file that exists among searchPaths
   */
  async loadFromPaths(searchPaths: string[], overrides: PlanOverrides = {}): Promise<ProvisioningPlan> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path, overrides);
      } catch (error) {
        errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new ConfigValidationError(
      `Could not load configuration from any of the specified paths:\n${errors.join('\n')}`,
      errors
    );
  }

  /**
   * Load the first of provision.yml, provision.yaml, provision.json found in
   * dir. Only when none exists does the built-in plan apply; a file that
   * exists but fails to load is an error.
   */
  async loadDefault(overrides: PlanOverrides = {}, dir: string = process.cwd()): Promise<LoadedPlan> {
    const found = DEFAULT_CONFIG_PATHS.find(path => existsSync(resolve(dir, path)));

    if (!found) {
      return { plan: this.loadBuiltIn(overrides), source: BUILT_IN_SOURCE };
    }

    return { plan: await this.load(resolve(dir, found), overrides), source: found };
  }

  /**
   * The built-in plan, with secrets resolved from the environment
   */
  loadBuiltIn(overrides: PlanOverrides = {}): ProvisioningPlan {
    return this.prepare(createDefaultPlan(), overrides);
  }

  /**
   * Substitute environment variables, apply overrides and defaults, validate
   */
  prepare(rawConfig: unknown, overrides: PlanOverrides = {}): ProvisioningPlan {
    const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
    const plan = validateAndNormalizeConfig(this.applyDefaults(configWithEnvVars, overrides));
    return this.deriveNames(plan);
  }

  /**
   * Recursively resolve environment variables in a parsed document.
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return this.substituteEnvironmentVariables(obj);
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isRecord(obj)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.resolveEnvironmentVariables(value);
      }
      return result;
    }

    return obj;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined && envValue !== '') {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset secrets keep their placeholder and are rejected when their step runs
      return match;
    });
  }

  private applyDefaults(config: unknown, overrides: PlanOverrides): unknown {
    if (!isRecord(config)) {
      return config;
    }

    return {
      ...config,
      resource_group: overrides.resourceGroup ?? config.resource_group ?? DEFAULT_RESOURCE_GROUP
    };
  }

  /**
   * Give every VM without an explicit DNS name one derived from its resource group
   */
  private deriveNames(plan: ProvisioningPlan): ProvisioningPlan {
    const naming = createNamingService();

    return {
      ...plan,
      steps: plan.steps.map(step => {
        if (step.kind !== 'vm' || step.dns_name) {
          return step;
        }
        return { ...step, dns_name: naming.generateDnsLabel(step.resource_group ?? plan.resource_group) };
      })
    };
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: Environment): DeploymentConfigLoader {
  return new DeploymentConfigLoader(env);
}

/**
 * Load provision.yml, provision.yaml or provision.json from the current
 * directory, falling back to the built-in plan
 */
export async function loadDefaultConfig(overrides: PlanOverrides = {}, env?: Environment): Promise<LoadedPlan> {
  return createConfigLoader(env).loadDefault(overrides);
}
