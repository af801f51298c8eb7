import { AzCommand } from './azure-cli';
import { AzResourceManager } from './base-manager';
import { ProvisioningResult, StepOf } from './types';

type ExtensionStep = StepOf<'extension'>;

/**
 * Installs az CLI extensions (`az extension add`)
 */
export class ExtensionManager extends AzResourceManager<ExtensionStep> {
  readonly kind = 'extension';

  buildCommands(step: ExtensionStep): AzCommand[] {
    return [{ args: ['extension', 'add', '--name', step.extension, '--yes'], secrets: [] }];
  }

  protected describe(step: ExtensionStep): string {
    return `Installing az extension ${step.extension}`;
  }

  protected toResult(step: ExtensionStep): ProvisioningResult {
    return {
      resourceId: `extension/${step.extension}`,
      status: 'configured',
      exitCode: 0
    };
  }
}
