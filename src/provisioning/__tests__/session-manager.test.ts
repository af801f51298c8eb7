import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import { SessionManager } from '../session-manager';
import { AzureCli } from '../azure-cli';
import { ExecResult } from '../exec';
import { CredentialsError, StepFailedError } from '../errors';
import { LoginStep } from '../../types';

const credentials = JSON.stringify({
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tenantId: 'test-tenant',
  subscriptionId: 'test-subscription'
});

describe('SessionManager', () => {
  let exec: Mock<[string, string[]], Promise<ExecResult>>;
  let manager: SessionManager;
  let step: LoginStep;

  beforeEach(() => {
    exec = vi.fn<[string, string[]], Promise<ExecResult>>();
    manager = new SessionManager(new AzureCli({ exec }));
    step = { kind: 'login', credentials };
  });

  it('should log in with the service principal and select its subscription', () => {
    expect(manager.buildCommands(step)).toEqual([
      {
        args: [
          'login',
          '--service-principal',
          '--username', 'test-client',
          '--password', 'test-secret',
          '--tenant', 'test-tenant',
          '--output', 'json'
        ],
        secrets: ['test-secret']
      },
      {
        args: ['account', 'set', '--subscription', 'test-subscription'],
        secrets: ['test-secret']
      }
    ]);
  });

  it('should run login then account set', async () => {
    exec.mockResolvedValue({ code: 0, stdout: '[]', stderr: '' });

    const result = await manager.create(step);

    expect(exec).toHaveBeenCalledTimes(2);
    expect(exec.mock.calls[0][1][0]).toBe('login');
    expect(exec.mock.calls[1][1]).toEqual(['account', 'set', '--subscription', 'test-subscription']);
    expect(result).toEqual({
      resourceId: 'subscriptions/test-subscription',
      status: 'configured',
      exitCode: 0
    });
  });

  it('should stop after a failed login', async () => {
    exec.mockResolvedValueOnce({ code: 1, stdout: '', stderr: 'ERROR: AADSTS7000215: Invalid client secret provided.' });

    await expect(manager.create(step)).rejects.toThrow(
      new StepFailedError('Azure login', 1, 'ERROR: AADSTS7000215: Invalid client secret provided.')
    );
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it('should reject missing credentials before calling az', async () => {
    await expect(manager.create({ kind: 'login', credentials: '${AZURE_CREDENTIALS}' })).rejects.toBeInstanceOf(
      CredentialsError
    );
    expect(exec).not.toHaveBeenCalled();
  });
});
