import { ProvisioningPlan } from '../types';

// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<ProvisioningPlan>;
  validate(config: unknown): ConfigValidationResult;
}

export class ConfigValidationError extends Error {
  constructor(message: string, public readonly errors: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
