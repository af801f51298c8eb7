import { createHash } from 'crypto';
import { ProvisioningPlan, ProvisioningStep } from '../types';

/**
 * Length limits Azure enforces on the names this tool creates
 */
export const NAME_LIMITS = {
  dnsLabel: { min: 3, max: 63 },
  vm: { min: 1, max: 64 },
  workspace: { min: 3, max: 33 },
  resourceGroup: { min: 1, max: 90 }
} as const;

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  /**
   * Derive a public IP DNS label from a resource group name.
   * DNS labels are lowercase, start with a letter and are 3-63 characters.
   * @param resourceGroup - Resource group name
   * @param prefix - Optional prefix prepended before sanitizing
   */
  generateDnsLabel(resourceGroup: string, prefix?: string): string {
    const parts = [prefix, resourceGroup].filter(Boolean);
    let label = this.sanitizeName(parts.join('-')).toLowerCase();

    while (label.length < NAME_LIMITS.dnsLabel.min) {
      label += '0';
    }

    return this.validateAndTruncate(label, NAME_LIMITS.dnsLabel.max);
  }

  /**
   * Find resources declared more than once within the same resource group.
   * Returns entries of the form `<kind> <name> in <group>`.
   */
  findDuplicateResources(plan: ProvisioningPlan): string[] {
    const seen = new Set<string>();
    const duplicates: string[] = [];

    plan.steps.forEach(step => {
      const key = this.resourceKey(step, plan.resource_group);
      if (!key) {
        return;
      }
      const normalized = key.toLowerCase();
      if (seen.has(normalized)) {
        duplicates.push(key);
      } else {
        seen.add(normalized);
      }
    });

    return duplicates;
  }

  private resourceKey(step: ProvisioningStep, defaultGroup: string): string | undefined {
    switch (step.kind) {
      case 'vm':
      case 'workspace':
        return `${step.kind} ${step.name} in ${step.resource_group ?? defaultGroup}`;
      case 'resource-group':
        return `resource-group ${step.resource_group ?? defaultGroup}`;
      default:
        return undefined;
    }
  }

  /**
   * Replace characters outside [a-zA-Z0-9-], collapse hyphens and make sure
   * the result starts with a letter
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');

    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'rg-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'rg';
    }

    return sanitized;
  }

  /**
   * Truncate to fit an Azure limit, keeping a short hash of the full name
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    const truncated = name.substring(0, truncatedLength).replace(/-+$/, '');

    return `${truncated}-${hash}`;
  }

  private generateShortHash(input: string): string {
    return createHash('sha256').update(input).digest('hex').slice(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
