// Provisioning-specific types
import { Endpoint, ProvisioningStep, ResolvedStep, StepKind } from '../types';
import { AzCommand } from './azure-cli';

export interface ProvisioningResult {
  resourceId: string;
  status: 'created' | 'configured';
  exitCode: number;
  endpoints?: Endpoint[];
}

/**
 * Builds and runs the az commands for one step kind
 */
export interface ResourceManager<S extends ProvisioningStep = ProvisioningStep> {
  readonly kind: S['kind'];
  buildCommands(step: S, resourceGroup: string): AzCommand[];
  create(step: S, resourceGroup: string): Promise<ProvisioningResult>;
}

/**
 * What the sequencer executes steps against
 */
export interface ProvisioningProvider {
  execute(resolved: ResolvedStep): Promise<ProvisioningResult>;
}

export type StepOf<K extends StepKind> = Extract<ProvisioningStep, { kind: K }>;
