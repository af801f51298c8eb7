import { ProvisioningPlan, ProvisioningStep, ResolvedStep, ScopedStepKind, StepKind } from '../types';

const SCOPED_KINDS: ReadonlySet<string> = new Set<ScopedStepKind>(['resource-group', 'vm', 'open-port', 'workspace']);

export function isScoped(step: ProvisioningStep): boolean {
  return SCOPED_KINDS.has(step.kind);
}

function overrideOf(step: ProvisioningStep): string | undefined {
  switch (step.kind) {
    case 'extension':
    case 'login':
      return undefined;
    default:
      return step.resource_group;
  }
}

export function defaultLabel(step: ProvisioningStep): string {
  switch (step.kind) {
    case 'extension':
      return `Install az extension ${step.extension}`;
    case 'login':
      return 'Azure login';
    case 'resource-group':
      return `Create resource group in ${step.location}`;
    case 'vm':
      return `Create VM ${step.name}`;
    case 'open-port':
      return `Open port ${step.port} on ${step.vm}`;
    case 'workspace':
      return `Create workspace ${step.name} (${step.location})`;
  }
}

/**
 * Pair every step with its position and effective resource group.
 * A step's own resource_group wins over the plan default.
 */
export function resolveSteps(plan: ProvisioningPlan): ResolvedStep[] {
  return plan.steps.map((step, index) => {
    const scoped = isScoped(step);
    const override = overrideOf(step);

    return {
      index,
      label: step.label ?? defaultLabel(step),
      resourceGroup: override ?? plan.resource_group,
      scoped,
      step
    };
  });
}

/**
 * Drop every step of the given kinds, e.g. login when the CLI session is
 * already authenticated
 */
export function excludeKinds(plan: ProvisioningPlan, kinds: readonly StepKind[]): ProvisioningPlan {
  if (kinds.length === 0) {
    return plan;
  }
  return {
    ...plan,
    steps: plan.steps.filter(step => !kinds.includes(step.kind))
  };
}
