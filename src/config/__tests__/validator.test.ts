import { describe, it, expect } from 'vitest';
import { validateConfig, validateAndNormalizeConfig, getConfigSchema } from '../validator';
import { createDefaultPlan } from '../defaults';
import { ConfigValidationError } from '../types';

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('should accept the built-in federated learning plan', () => {
      const result = validateConfig(createDefaultPlan());

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should accept a plan with a resource group step and per-step overrides', () => {
      const config = {
        resource_group: 'fl-main',
        steps: [
          { kind: 'resource-group', location: 'westeurope' },
          { kind: 'resource-group', resource_group: 'fl-clients', location: 'eastasia' },
          { kind: 'workspace', name: 'Asia-Client', location: 'eastasia', resource_group: 'fl-clients' }
        ]
      };

      const result = validateConfig(config);
      expect(result.valid).toBe(true);
    });

    it('should require a default resource group', () => {
      const result = validateConfig({
        steps: [{ kind: 'extension', extension: 'ml' }]
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('A default resource_group is required');
    });

    it('should reject a plan without steps', () => {
      const result = validateConfig({ resource_group: 'rg', steps: [] });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('A plan must contain at least one step');
    });

    it('should reject unknown step kinds', () => {
      const result = validateConfig({
        resource_group: 'rg',
        steps: [{ kind: 'database', name: 'db' }]
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain(
        'Step kind must be one of: extension, login, resource-group, vm, open-port, workspace'
      );
    });

    it('should collect every error instead of stopping at the first', () => {
      const result = validateConfig({
        resource_group: 'rg',
        steps: [
          { kind: 'workspace', name: 'ab', location: 'eastus' },
          { kind: 'open-port', vm: 'fedserver', port: '8002', priority: 50 }
        ]
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Workspace name must be at least 3 characters long',
        'Rule priority must be between 100 and 4096'
      ]);
    });

    it('should require an admin password on VM steps', () => {
      const result = validateConfig({
        resource_group: 'rg',
        steps: [{ kind: 'vm', name: 'fedserver', image: 'Ubuntu2204' }]
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'VM step requires an admin password (usually from the VM_PASSWORD environment variable)'
      ]);
    });

    it('should reject workspace locations that are not region names', () => {
      const result = validateConfig({
        resource_group: 'rg',
        steps: [{ kind: 'workspace', name: 'US-Client', location: 'East US' }]
      });

      expect(result.errors).toEqual(['Location must be an Azure region name such as eastus or westeurope']);
    });

    it('should reject resource group names ending with a period', () => {
      const result = validateConfig({
        resource_group: 'fedlearning.',
        steps: [{ kind: 'extension', extension: 'ml' }]
      });

      expect(result.valid).toBe(false);
    });

    it('should reject reversed and out-of-range port ranges', () => {
      const plan = (port: string | number) => ({
        resource_group: 'rg',
        steps: [{ kind: 'open-port', vm: 'fedserver', port }]
      });

      expect(validateConfig(plan('9000-8000')).valid).toBe(false);
      expect(validateConfig(plan('0')).valid).toBe(false);
      expect(validateConfig(plan(70000)).valid).toBe(false);
      expect(validateConfig(plan('http')).valid).toBe(false);
      expect(validateConfig(plan('8002-8003')).valid).toBe(true);
    });

    it('should reject unknown top-level keys', () => {
      const result = validateConfig({
        resource_group: 'rg',
        region: 'eastus',
        steps: [{ kind: 'extension', extension: 'ml' }]
      });

      expect(result.valid).toBe(false);
    });

    it('should report resources declared twice in the same group', () => {
      const result = validateConfig({
        resource_group: 'rg',
        steps: [
          { kind: 'workspace', name: 'US-Client', location: 'eastus' },
          { kind: 'workspace', name: 'US-Client', location: 'eastus' }
        ]
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Duplicate resource in plan: workspace US-Client in rg']);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should apply VM and port rule defaults', () => {
      const plan = validateAndNormalizeConfig({
        resource_group: 'rg',
        steps: [
          { kind: 'vm', name: 'fedserver', image: 'Ubuntu2204', admin_password: 'test-password' },
          { kind: 'open-port', vm: 'fedserver', port: '8002-8003' }
        ]
      });

      expect(plan.steps[0]).toEqual({
        kind: 'vm',
        name: 'fedserver',
        image: 'Ubuntu2204',
        admin_password: 'test-password',
        authentication_type: 'password',
        admin_username: 'azureuser'
      });
      expect(plan.steps[1]).toEqual({
        kind: 'open-port',
        vm: 'fedserver',
        port: '8002-8003',
        priority: 100
      });
    });

    it('should turn a numeric port into a string', () => {
      const plan = validateAndNormalizeConfig({
        resource_group: 'rg',
        steps: [{ kind: 'open-port', vm: 'fedserver', port: 22, priority: 300 }]
      });

      expect(plan.steps[0]).toEqual({ kind: 'open-port', vm: 'fedserver', port: '22', priority: 300 });
    });

    it('should throw ConfigValidationError carrying every message', () => {
      const invalid = { resource_group: 'rg', steps: [{ kind: 'workspace', name: 'ab' }] };

      expect(() => validateAndNormalizeConfig(invalid)).toThrow(ConfigValidationError);

      try {
        validateAndNormalizeConfig(invalid);
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toEqual([
            'Workspace name must be at least 3 characters long',
            'Workspace step requires a location'
          ]);
          expect(error.message).toBe(
            'Configuration validation failed:\n' +
              'Workspace name must be at least 3 characters long\n' +
              'Workspace step requires a location'
          );
        }
      }
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the Joi schema', () => {
      const schema = getConfigSchema();
      expect(schema.type).toBe('object');
    });
  });
});
