import { describe, it, expect } from 'vitest';
import { createDefaultPlan, validateConfig } from '../config';
import { resolveSteps } from '../orchestration/resolve';

describe('default plan', () => {
  it('should validate', () => {
    const result = validateConfig(createDefaultPlan());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should provision the server before the workspaces', () => {
    const labels = resolveSteps(createDefaultPlan('fl-test-rg')).map(step => step.label);

    expect(labels).toEqual([
      'Install az ml extension',
      'Azure login',
      'Create VM fedserver',
      'Open port 8002-8003 on fedserver',
      'Create workspace Asia-Client (eastasia)',
      'Create workspace Europe-Client (westeurope)',
      'Create workspace US-Client (eastus)',
      'Create workspace central-workspace (eastus)'
    ]);
  });

  it('should place every resource step in the requested group', () => {
    const groups = resolveSteps(createDefaultPlan('fl-test-rg'))
      .filter(step => step.scoped)
      .map(step => step.resourceGroup);

    expect(new Set(groups)).toEqual(new Set(['fl-test-rg']));
  });

  it('should reject a plan with an unknown step kind', () => {
    const result = validateConfig({
      resource_group: 'fl-test-rg',
      steps: [{ kind: 'storage-account', name: 'flstore' }]
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toContain(
      'Step kind must be one of: extension, login, resource-group, vm, open-port, workspace'
    );
  });
});
