// Core type definitions for az-provision

export type StepKind = 'extension' | 'login' | 'resource-group' | 'vm' | 'open-port' | 'workspace';

export type ScopedStepKind = 'resource-group' | 'vm' | 'open-port' | 'workspace';

interface BaseStep {
  /** Display name shown in progress output */
  label?: string;
}

interface ScopedStep extends BaseStep {
  /** Overrides the plan's default resource group for this step only */
  resource_group?: string;
}

export interface ExtensionStep extends BaseStep {
  kind: 'extension';
  extension: string;
}

export interface LoginStep extends BaseStep {
  kind: 'login';
  /** Service principal JSON, normally `${AZURE_CREDENTIALS}` */
  credentials: string;
}

export interface ResourceGroupStep extends ScopedStep {
  kind: 'resource-group';
  location: string;
}

export interface VirtualMachineStep extends ScopedStep {
  kind: 'vm';
  name: string;
  image: string;
  authentication_type: 'password';
  admin_username: string;
  admin_password: string;
  dns_name?: string;
  size?: string;
  location?: string;
}

export interface OpenPortStep extends ScopedStep {
  kind: 'open-port';
  vm: string;
  port: string;
  priority: number;
}

export interface WorkspaceStep extends ScopedStep {
  kind: 'workspace';
  name: string;
  location: string;
}

export type ProvisioningStep =
  | ExtensionStep
  | LoginStep
  | ResourceGroupStep
  | VirtualMachineStep
  | OpenPortStep
  | WorkspaceStep;

export interface ProvisioningPlan {
  resource_group: string;
  steps: ProvisioningStep[];
}

/**
 * A step with its position in the plan and the resource group it runs
 * against (step override, else the plan default). `scoped` is false for
 * kinds that take no resource group.
 */
export interface ResolvedStep {
  index: number;
  label: string;
  resourceGroup: string;
  scoped: boolean;
  step: ProvisioningStep;
}

export interface Endpoint {
  type: 'public_ip' | 'fqdn';
  value: string;
  description: string;
}

export type StepStatus = 'succeeded' | 'failed' | 'skipped' | 'planned';

export interface StepRecord {
  index: number;
  kind: StepKind;
  label: string;
  resourceGroup?: string;
  status: StepStatus;
  exitCode?: number;
  duration?: number;
  resourceId?: string;
}

export interface DeploymentError {
  code: string;
  message: string;
  step?: number;
  remediation?: string;
}

export interface DeploymentMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  resourceGroup: string;
  dryRun: boolean;
}

export interface ProvisioningRunResult {
  success: boolean;
  /** Exit code of the last executed step, 0 when every step succeeded */
  exitCode: number;
  steps: StepRecord[];
  endpoints: Endpoint[];
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
