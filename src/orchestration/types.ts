// Orchestration-specific types
import { ResolvedStep, StepRecord } from '../types';
import { ProvisioningResult } from '../provisioning/types';

/**
 * Progress callbacks; the CLI renders these as spinner updates
 */
export interface SequencerObserver {
  onStepStart?(step: ResolvedStep, total: number): void;
  onStepComplete?(step: ResolvedStep, record: StepRecord, result: ProvisioningResult): void;
  onStepFailed?(step: ResolvedStep, record: StepRecord, error: Error): void;
}

export interface RunOptions {
  /** Resolve and report steps without invoking the provider */
  dryRun?: boolean;
}
