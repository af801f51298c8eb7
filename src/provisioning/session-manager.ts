import { AzCommand } from './azure-cli';
import { AzResourceManager } from './base-manager';
import { ProvisioningResult, StepOf } from './types';
import { parseServicePrincipal } from '../config/credentials';

type LoginStep = StepOf<'login'>;

/**
 * Signs the az CLI in with a service principal and selects its subscription
 */
export class SessionManager extends AzResourceManager<LoginStep> {
  readonly kind = 'login';

  buildCommands(step: LoginStep): AzCommand[] {
    const principal = parseServicePrincipal(step.credentials);
    const secrets = [principal.clientSecret];

    return [
      {
        args: [
          'login',
          '--service-principal',
          '--username', principal.clientId,
          '--password', principal.clientSecret,
          '--tenant', principal.tenantId,
          '--output', 'json'
        ],
        secrets
      },
      {
        args: ['account', 'set', '--subscription', principal.subscriptionId],
        secrets
      }
    ];
  }

  protected describe(): string {
    return 'Azure login';
  }

  protected toResult(step: LoginStep): ProvisioningResult {
    return {
      resourceId: `subscriptions/${parseServicePrincipal(step.credentials).subscriptionId}`,
      status: 'configured',
      exitCode: 0
    };
  }
}
