import { ProvisioningStep } from '../types';
import { AzCommand, AzureCli, parseJsonOutput } from './azure-cli';
import { ExecResult } from './exec';
import { MissingSecretError, StepFailedError } from './errors';
import { ProvisioningResult, ResourceManager } from './types';
import { isUnresolvedPlaceholder } from '../config/credentials';

/**
 * Shared behaviour for the az-backed managers: commands of a step run in
 * order and the first non-zero exit aborts the step.
 */
export abstract class AzResourceManager<S extends ProvisioningStep> implements ResourceManager<S> {
  abstract readonly kind: S['kind'];

  constructor(protected readonly cli: AzureCli) {}

  abstract buildCommands(step: S, resourceGroup: string): AzCommand[];

  protected abstract describe(step: S, resourceGroup: string): string;

  protected abstract toResult(step: S, resourceGroup: string, output: unknown): ProvisioningResult;

  async create(step: S, resourceGroup: string): Promise<ProvisioningResult> {
    const commands = this.buildCommands(step, resourceGroup);
    let last: ExecResult = { code: 0, stdout: '', stderr: '' };

    for (const command of commands) {
      last = await this.cli.run(command);
      if (last.code !== 0) {
        throw new StepFailedError(this.describe(step, resourceGroup), last.code, last.stderr);
      }
    }

    return this.toResult(step, resourceGroup, parseJsonOutput(last.stdout));
  }

  protected requireSecret(field: string, value: string): string {
    if (isUnresolvedPlaceholder(value)) {
      throw new MissingSecretError(field, value);
    }
    return value;
  }
}

/**
 * The `id` property of an az JSON result, if any
 */
export function resourceIdOf(output: unknown, fallback: string): string {
  if (typeof output === 'object' && output !== null && 'id' in output && typeof output.id === 'string') {
    return output.id;
  }
  return fallback;
}
