/**
 * Provisioning error types
 */

export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly remediation?: string
  ) {
    super(message);
    this.name = 'ProvisioningError';
  }
}

/**
 * Service principal JSON missing, malformed or still a placeholder
 */
export class CredentialsError extends ProvisioningError {
  constructor(message: string) {
    super(
      message,
      'INVALID_CREDENTIALS',
      'Set AZURE_CREDENTIALS to the service principal JSON: {"clientId","clientSecret","tenantId","subscriptionId"}'
    );
    this.name = 'CredentialsError';
  }
}

/**
 * A secret parameter still holds an unresolved ${VAR} placeholder
 */
export class MissingSecretError extends ProvisioningError {
  constructor(field: string, placeholder: string) {
    super(
      `Secret "${field}" is not set (found ${placeholder})`,
      'MISSING_SECRET',
      `Export the variable referenced by ${placeholder} before provisioning`
    );
    this.name = 'MissingSecretError';
  }
}

/**
 * The az invocation for a step exited non-zero
 */
export class StepFailedError extends ProvisioningError {
  constructor(
    description: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    const cause = stderr.split('\n').find(line => line.trim() !== '') ?? 'no output';
    super(
      `${description} failed with exit code ${exitCode}: ${cause}`,
      exitCode === 127 ? 'CLI_NOT_FOUND' : 'STEP_FAILED',
      exitCode === 127
        ? 'Install the Azure CLI (az) and make sure it is on PATH'
        : 'Resources created by earlier steps are left in place; fix the cause and re-run the remaining steps'
    );
    this.name = 'StepFailedError';
  }
}
