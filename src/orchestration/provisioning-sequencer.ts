import { v4 as uuidv4 } from 'uuid';
import {
  DeploymentError,
  DeploymentMetadata,
  Endpoint,
  ProvisioningPlan,
  ProvisioningRunResult,
  ResolvedStep,
  StepRecord
} from '../types';
import { ProvisioningProvider, ProvisioningResult } from '../provisioning/types';
import { ProvisioningError, StepFailedError } from '../provisioning/errors';
import { resolveSteps } from './resolve';
import { RunOptions, SequencerObserver } from './types';

/**
 * Runs a plan's steps one at a time, in the order listed. The first failing
 * step ends the run: later steps are reported as skipped and never invoked.
 * Nothing is retried and nothing already created is removed.
 */
export class ProvisioningSequencer {
  constructor(
    private readonly provider: ProvisioningProvider,
    private readonly observer: SequencerObserver = {}
  ) {}

  async run(plan: ProvisioningPlan, options: RunOptions = {}): Promise<ProvisioningRunResult> {
    const startTime = Date.now();
    const metadata: DeploymentMetadata = {
      runId: uuidv4(),
      timestamp: new Date(),
      resourceGroup: plan.resource_group,
      dryRun: options.dryRun ?? false
    };

    const resolved = resolveSteps(plan);

    if (options.dryRun) {
      metadata.duration = Date.now() - startTime;
      return {
        success: true,
        exitCode: 0,
        steps: resolved.map(step => this.record(step, 'planned')),
        endpoints: [],
        metadata
      };
    }

    const records: StepRecord[] = [];
    const endpoints: Endpoint[] = [];
    let failure: { error: DeploymentError; exitCode: number } | undefined;

    for (const step of resolved) {
      if (failure) {
        records.push(this.record(step, 'skipped'));
        continue;
      }

      this.notify('onStepStart', () => this.observer.onStepStart?.(step, resolved.length));
      const stepStart = Date.now();

      let result: ProvisioningResult;
      try {
        result = await this.provider.execute(step);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const exitCode = error instanceof StepFailedError ? error.exitCode : 1;
        const failed: StepRecord = {
          ...this.record(step, 'failed'),
          exitCode,
          duration: Date.now() - stepStart
        };
        records.push(failed);
        failure = { error: this.toDeploymentError(step, error), exitCode };
        this.notify('onStepFailed', () => this.observer.onStepFailed?.(step, failed, error));
        continue;
      }

      const record: StepRecord = {
        ...this.record(step, 'succeeded'),
        exitCode: result.exitCode,
        duration: Date.now() - stepStart,
        resourceId: result.resourceId
      };
      records.push(record);
      endpoints.push(...(result.endpoints ?? []));
      this.notify('onStepComplete', () => this.observer.onStepComplete?.(step, record, result));
    }

    metadata.duration = Date.now() - startTime;

    if (failure) {
      return {
        success: false,
        exitCode: failure.exitCode,
        steps: records,
        endpoints,
        errors: [failure.error],
        metadata
      };
    }

    return {
      success: true,
      exitCode: 0,
      steps: records,
      endpoints,
      metadata
    };
  }

  /**
   * Observer callbacks only render progress; one that throws is reported as a
   * process warning and the run carries on
   */
  private notify(event: keyof SequencerObserver, callback: () => void): void {
    try {
      callback();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.emitWarning(`Sequencer observer ${event} threw: ${message}`, 'ObserverWarning');
    }
  }

  private record(step: ResolvedStep, status: StepRecord['status']): StepRecord {
    return {
      index: step.index,
      kind: step.step.kind,
      label: step.label,
      resourceGroup: step.scoped ? step.resourceGroup : undefined,
      status
    };
  }

  private toDeploymentError(step: ResolvedStep, error: Error): DeploymentError {
    if (error instanceof ProvisioningError) {
      return {
        code: error.code,
        message: error.message,
        step: step.index,
        remediation: error.remediation
      };
    }

    return {
      code: 'STEP_FAILED',
      message: `${step.label} failed: ${error.message}`,
      step: step.index
    };
  }
}
