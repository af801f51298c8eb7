import { AzCommand } from './azure-cli';
import { AzResourceManager } from './base-manager';
import { ProvisioningResult, StepOf } from './types';

type OpenPortStep = StepOf<'open-port'>;

/**
 * Opens inbound ports on a VM's network security group (`az vm open-port`)
 */
export class NetworkManager extends AzResourceManager<OpenPortStep> {
  readonly kind = 'open-port';

  buildCommands(step: OpenPortStep, resourceGroup: string): AzCommand[] {
    return [
      {
        args: [
          'vm', 'open-port',
          '--resource-group', resourceGroup,
          '--name', step.vm,
          '--port', step.port,
          '--priority', String(step.priority),
          '--output', 'json'
        ],
        secrets: []
      }
    ];
  }

  protected describe(step: OpenPortStep): string {
    return `Opening port ${step.port} on ${step.vm}`;
  }

  protected toResult(step: OpenPortStep, resourceGroup: string): ProvisioningResult {
    return {
      resourceId: `resourceGroups/${resourceGroup}/virtualMachines/${step.vm}/ports/${step.port}`,
      status: 'configured',
      exitCode: 0
    };
  }
}
