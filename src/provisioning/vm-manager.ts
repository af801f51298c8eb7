import { Endpoint } from '../types';
import { AzCommand } from './azure-cli';
import { AzResourceManager, resourceIdOf } from './base-manager';
import { ProvisioningResult, StepOf } from './types';

type VirtualMachineStep = StepOf<'vm'>;

/**
 * Creates password-authenticated VMs with a public DNS name (`az vm create`)
 */
export class VirtualMachineManager extends AzResourceManager<VirtualMachineStep> {
  readonly kind = 'vm';

  buildCommands(step: VirtualMachineStep, resourceGroup: string): AzCommand[] {
    const password = this.requireSecret('admin_password', step.admin_password);

    const args = [
      'vm', 'create',
      '--resource-group', resourceGroup,
      '--name', step.name,
      '--image', step.image,
      '--authentication-type', step.authentication_type,
      '--admin-username', step.admin_username,
      '--admin-password', password
    ];

    if (step.dns_name) {
      args.push('--public-ip-address-dns-name', step.dns_name);
    }
    if (step.size) {
      args.push('--size', step.size);
    }
    if (step.location) {
      args.push('--location', step.location);
    }
    args.push('--output', 'json');

    return [{ args, secrets: [password] }];
  }

  protected describe(step: VirtualMachineStep): string {
    return `Creating VM ${step.name}`;
  }

  protected toResult(step: VirtualMachineStep, resourceGroup: string, output: unknown): ProvisioningResult {
    return {
      resourceId: resourceIdOf(output, `resourceGroups/${resourceGroup}/virtualMachines/${step.name}`),
      status: 'created',
      exitCode: 0,
      endpoints: this.extractEndpoints(step, output)
    };
  }

  /**
   * Pull the public address and FQDN out of the `az vm create` result
   */
  private extractEndpoints(step: VirtualMachineStep, output: unknown): Endpoint[] {
    const endpoints: Endpoint[] = [];
    if (typeof output !== 'object' || output === null) {
      return endpoints;
    }

    if ('publicIpAddress' in output && typeof output.publicIpAddress === 'string' && output.publicIpAddress) {
      endpoints.push({
        type: 'public_ip',
        value: output.publicIpAddress,
        description: `Public IP of ${step.name}`
      });
    }

    if ('fqdns' in output && typeof output.fqdns === 'string' && output.fqdns) {
      output.fqdns
        .split(',')
        .map(fqdn => fqdn.trim())
        .filter(Boolean)
        .forEach(fqdn => {
          endpoints.push({ type: 'fqdn', value: fqdn, description: `DNS name of ${step.name}` });
        });
    }

    return endpoints;
  }
}
