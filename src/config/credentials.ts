import Joi from 'joi';
import { CredentialsError } from '../provisioning/errors';
import { ProvisioningPlan } from '../types';

/**
 * Service principal as injected by CI platforms (`AZURE_CREDENTIALS`)
 */
export interface ServicePrincipal {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  subscriptionId: string;
}

const servicePrincipalSchema = Joi.object<ServicePrincipal>({
  clientId: Joi.string().required(),
  clientSecret: Joi.string().required(),
  tenantId: Joi.string().required(),
  subscriptionId: Joi.string().required()
}).unknown(true);

const PLACEHOLDER = /\$\{[^}]+\}/;

export const REDACTED = '***';

/**
 * True when a value still carries a `${VAR}` reference the loader could not resolve
 */
export function isUnresolvedPlaceholder(value: string): boolean {
  return PLACEHOLDER.test(value);
}

/**
 * Parse the service principal JSON. Unknown keys (the CI format carries
 * several endpoint URLs) are kept but ignored.
 */
export function parseServicePrincipal(raw: string): ServicePrincipal {
  if (isUnresolvedPlaceholder(raw)) {
    throw new CredentialsError(`Credentials are not set (found ${raw.match(PLACEHOLDER)?.[0]})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CredentialsError('Credentials are not valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CredentialsError('Credentials must be a JSON object');
  }

  const { error, value } = servicePrincipalSchema.validate(parsed, { abortEarly: false });
  if (error) {
    const missing = error.details.map(detail => detail.path.join('.')).join(', ');
    throw new CredentialsError(`Credentials are missing required fields: ${missing}`);
  }

  return value;
}

/**
 * Replace every occurrence of each secret in text
 */
export function redact(text: string, secrets: readonly string[]): string {
  return secrets
    .filter(secret => secret.length > 0)
    .reduce((result, secret) => result.split(secret).join(REDACTED), text);
}

/**
 * Copy of a plan safe to print: resolved secrets become `***`, unresolved
 * placeholders are kept so the reader sees which variable is missing
 */
export function maskSecrets(plan: ProvisioningPlan): ProvisioningPlan {
  const mask = (value: string) => (isUnresolvedPlaceholder(value) ? value : REDACTED);

  return {
    ...plan,
    steps: plan.steps.map(step => {
      switch (step.kind) {
        case 'login':
          return { ...step, credentials: mask(step.credentials) };
        case 'vm':
          return { ...step, admin_password: mask(step.admin_password) };
        default:
          return step;
      }
    })
  };
}
