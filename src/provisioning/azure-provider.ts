import { ResolvedStep } from '../types';
import { AzCommand, AzureCli, AzureCliOptions } from './azure-cli';
import { ExtensionManager } from './extension-manager';
import { SessionManager } from './session-manager';
import { ResourceGroupManager } from './resource-group-manager';
import { VirtualMachineManager } from './vm-manager';
import { NetworkManager } from './network-manager';
import { WorkspaceManager } from './workspace-manager';
import { ProvisioningProvider, ProvisioningResult } from './types';

/**
 * Executes resolved steps through the az CLI, one manager per step kind
 */
export class AzureProvider implements ProvisioningProvider {
  readonly extensions: ExtensionManager;
  readonly session: SessionManager;
  readonly resourceGroups: ResourceGroupManager;
  readonly virtualMachines: VirtualMachineManager;
  readonly network: NetworkManager;
  readonly workspaces: WorkspaceManager;

  constructor(cli: AzureCli = new AzureCli()) {
    this.extensions = new ExtensionManager(cli);
    this.session = new SessionManager(cli);
    this.resourceGroups = new ResourceGroupManager(cli);
    this.virtualMachines = new VirtualMachineManager(cli);
    this.network = new NetworkManager(cli);
    this.workspaces = new WorkspaceManager(cli);
  }

  async execute({ step, resourceGroup }: ResolvedStep): Promise<ProvisioningResult> {
    switch (step.kind) {
      case 'extension':
        return this.extensions.create(step, resourceGroup);
      case 'login':
        return this.session.create(step, resourceGroup);
      case 'resource-group':
        return this.resourceGroups.create(step, resourceGroup);
      case 'vm':
        return this.virtualMachines.create(step, resourceGroup);
      case 'open-port':
        return this.network.create(step, resourceGroup);
      case 'workspace':
        return this.workspaces.create(step, resourceGroup);
    }
  }

  /**
   * The az commands a step would run, without running them
   */
  describe({ step, resourceGroup }: ResolvedStep): AzCommand[] {
    switch (step.kind) {
      case 'extension':
        return this.extensions.buildCommands(step);
      case 'login':
        return this.session.buildCommands(step);
      case 'resource-group':
        return this.resourceGroups.buildCommands(step, resourceGroup);
      case 'vm':
        return this.virtualMachines.buildCommands(step, resourceGroup);
      case 'open-port':
        return this.network.buildCommands(step, resourceGroup);
      case 'workspace':
        return this.workspaces.buildCommands(step, resourceGroup);
    }
  }
}

export function createAzureProvider(options: AzureCliOptions = {}): AzureProvider {
  return new AzureProvider(new AzureCli(options));
}
