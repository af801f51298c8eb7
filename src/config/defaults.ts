import { ProvisioningPlan } from '../types';

export const DEFAULT_RESOURCE_GROUP = 'fedlearning-rg';

export const DEFAULT_CONFIG_PATHS = ['./provision.yml', './provision.yaml', './provision.json'];

/**
 * The federated learning layout: one aggregation server reachable on
 * 8002-8003 and a workspace per client region plus a central one.
 * Secrets stay as placeholders until the loader substitutes them.
 */
export function createDefaultPlan(resourceGroup: string = DEFAULT_RESOURCE_GROUP): ProvisioningPlan {
  return {
    resource_group: resourceGroup,
    steps: [
      { kind: 'extension', extension: 'ml', label: 'Install az ml extension' },
      { kind: 'login', credentials: '${AZURE_CREDENTIALS}', label: 'Azure login' },
      {
        kind: 'vm',
        name: 'fedserver',
        image: 'microsoft-dsvm:ubuntu-1804:1804-gen2:latest',
        authentication_type: 'password',
        admin_username: 'azureuser',
        admin_password: '${VM_PASSWORD}'
      },
      { kind: 'open-port', vm: 'fedserver', port: '8002-8003', priority: 100 },
      { kind: 'workspace', name: 'Asia-Client', location: 'eastasia' },
      { kind: 'workspace', name: 'Europe-Client', location: 'westeurope' },
      { kind: 'workspace', name: 'US-Client', location: 'eastus' },
      { kind: 'workspace', name: 'central-workspace', location: 'eastus' }
    ]
  };
}
