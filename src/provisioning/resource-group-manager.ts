import { AzCommand } from './azure-cli';
import { AzResourceManager, resourceIdOf } from './base-manager';
import { StepFailedError } from './errors';
import { ProvisioningResult, StepOf } from './types';

type ResourceGroupStep = StepOf<'resource-group'>;

/**
 * Creates resource groups; deletion is only ever requested by hand
 */
export class ResourceGroupManager extends AzResourceManager<ResourceGroupStep> {
  readonly kind = 'resource-group';

  buildCommands(step: ResourceGroupStep, resourceGroup: string): AzCommand[] {
    return [
      {
        args: ['group', 'create', '--name', resourceGroup, '--location', step.location, '--output', 'json'],
        secrets: []
      }
    ];
  }

  buildDeleteCommand(resourceGroup: string, wait: boolean = true): AzCommand {
    const args = ['group', 'delete', '--name', resourceGroup, '--yes'];
    if (!wait) {
      args.push('--no-wait');
    }
    return { args, secrets: [] };
  }

  async delete(resourceGroup: string, wait: boolean = true): Promise<void> {
    const result = await this.cli.run(this.buildDeleteCommand(resourceGroup, wait));
    if (result.code !== 0) {
      throw new StepFailedError(`Deleting resource group ${resourceGroup}`, result.code, result.stderr);
    }
  }

  protected describe(step: ResourceGroupStep, resourceGroup: string): string {
    return `Creating resource group ${resourceGroup} in ${step.location}`;
  }

  protected toResult(step: ResourceGroupStep, resourceGroup: string, output: unknown): ProvisioningResult {
    return {
      resourceId: resourceIdOf(output, `resourceGroups/${resourceGroup}`),
      status: 'created',
      exitCode: 0
    };
  }
}
