import { describe, it, expect } from 'vitest';
import { isUnresolvedPlaceholder, maskSecrets, parseServicePrincipal, redact } from '../credentials';
import { CredentialsError } from '../../provisioning/errors';
import { ProvisioningPlan } from '../../types';

describe('Credentials', () => {
  describe('parseServicePrincipal', () => {
    it('should parse the CI credentials JSON and ignore extra keys', () => {
      const raw = JSON.stringify({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        tenantId: 'test-tenant',
        subscriptionId: 'test-subscription',
        resourceManagerEndpointUrl: 'https://management.example.test/'
      });

      expect(parseServicePrincipal(raw)).toMatchObject({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        tenantId: 'test-tenant',
        subscriptionId: 'test-subscription'
      });
    });

    it('should reject an unresolved placeholder', () => {
      expect(() => parseServicePrincipal('${AZURE_CREDENTIALS}')).toThrow(
        'Credentials are not set (found ${AZURE_CREDENTIALS})'
      );
    });

    it('should reject malformed JSON', () => {
      expect(() => parseServicePrincipal('{clientId:')).toThrow('Credentials are not valid JSON');
    });

    it('should reject JSON that is not an object', () => {
      expect(() => parseServicePrincipal('"test-secret"')).toThrow('Credentials must be a JSON object');
    });

    it('should name every missing field', () => {
      const raw = JSON.stringify({ clientId: 'test-client', tenantId: 'test-tenant' });

      expect(() => parseServicePrincipal(raw)).toThrow(
        'Credentials are missing required fields: clientSecret, subscriptionId'
      );
    });

    it('should throw CredentialsError', () => {
      try {
        parseServicePrincipal('not json');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CredentialsError);
        expect(error instanceof CredentialsError && error.code).toBe('INVALID_CREDENTIALS');
      }
    });
  });

  describe('isUnresolvedPlaceholder', () => {
    it('should detect ${VAR} references', () => {
      expect(isUnresolvedPlaceholder('${VM_PASSWORD}')).toBe(true);
      expect(isUnresolvedPlaceholder('prefix-${VM_PASSWORD}')).toBe(true);
      expect(isUnresolvedPlaceholder('test-password')).toBe(false);
      expect(isUnresolvedPlaceholder('$VM_PASSWORD')).toBe(false);
    });
  });

  describe('redact', () => {
    it('should mask every occurrence of every secret', () => {
      expect(redact('-p test-secret --again test-secret -u test-user', ['test-secret', 'test-user'])).toBe(
        '-p *** --again *** -u ***'
      );
    });

    it('should ignore empty secrets', () => {
      expect(redact('az login', [''])).toBe('az login');
    });
  });

  describe('maskSecrets', () => {
    it('should mask resolved secrets and keep unresolved placeholders', () => {
      const plan: ProvisioningPlan = {
        resource_group: 'rg',
        steps: [
          { kind: 'login', credentials: '{"clientSecret":"test-secret"}' },
          {
            kind: 'vm',
            name: 'fedserver',
            image: 'Ubuntu2204',
            authentication_type: 'password',
            admin_username: 'azureuser',
            admin_password: '${VM_PASSWORD}'
          },
          { kind: 'workspace', name: 'US-Client', location: 'eastus' }
        ]
      };

      expect(maskSecrets(plan).steps).toEqual([
        { kind: 'login', credentials: '***' },
        {
          kind: 'vm',
          name: 'fedserver',
          image: 'Ubuntu2204',
          authentication_type: 'password',
          admin_username: 'azureuser',
          admin_password: '${VM_PASSWORD}'
        },
        { kind: 'workspace', name: 'US-Client', location: 'eastus' }
      ]);
    });
  });
});
