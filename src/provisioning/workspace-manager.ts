import { AzCommand } from './azure-cli';
import { AzResourceManager, resourceIdOf } from './base-manager';
import { ProvisioningResult, StepOf } from './types';

type WorkspaceStep = StepOf<'workspace'>;

/**
 * Creates Azure ML workspaces (`az ml workspace create`, needs the ml extension)
 */
export class WorkspaceManager extends AzResourceManager<WorkspaceStep> {
  readonly kind = 'workspace';

  buildCommands(step: WorkspaceStep, resourceGroup: string): AzCommand[] {
    return [
      {
        args: [
          'ml', 'workspace', 'create',
          '--resource-group', resourceGroup,
          '--name', step.name,
          '--location', step.location,
          '--output', 'json'
        ],
        secrets: []
      }
    ];
  }

  protected describe(step: WorkspaceStep): string {
    return `Creating workspace ${step.name} in ${step.location}`;
  }

  protected toResult(step: WorkspaceStep, resourceGroup: string, output: unknown): ProvisioningResult {
    return {
      resourceId: resourceIdOf(output, `resourceGroups/${resourceGroup}/workspaces/${step.name}`),
      status: 'created',
      exitCode: 0
    };
  }
}
