import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AzureManager, parseServicePrincipalCredentials } from '../azure-manager.js';
import { AuthenticationError, CommandError, ConfigurationError, TransientError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { CONNECTION_STRING } from '../../__tests__/fixtures.js';

const CREDENTIALS = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tenantId: 'test-tenant',
  subscriptionId: 'test-subscription'
};

describe('parseServicePrincipalCredentials', () => {
  it('should read the four service principal fields', () => {
    const raw = JSON.stringify({ ...CREDENTIALS, resourceManagerEndpointUrl: 'https://management.azure.com/' });

    expect(parseServicePrincipalCredentials(raw, 'AZURE_CREDENTIALS')).toEqual(CREDENTIALS);
  });

  it('should fail authentication when the secret is absent', () => {
    expect(() => parseServicePrincipalCredentials(undefined, 'AZURE_CREDENTIALS')).toThrow(AuthenticationError);
    expect(() => parseServicePrincipalCredentials('  ', 'AZURE_CREDENTIALS')).toThrow(
      'No Azure credentials found in AZURE_CREDENTIALS'
    );
  });

  it('should reject a secret that is not JSON', () => {
    expect(() => parseServicePrincipalCredentials('test-secret', 'AZURE_CREDENTIALS')).toThrow(ConfigurationError);
    expect(() => parseServicePrincipalCredentials('test-secret', 'AZURE_CREDENTIALS')).toThrow(
      'AZURE_CREDENTIALS is not valid JSON'
    );
  });

  it('should name missing fields', () => {
    expect(() => parseServicePrincipalCredentials('{"clientId":"test-client"}', 'AZURE_CREDENTIALS')).toThrow(
      'AZURE_CREDENTIALS is missing fields: clientSecret, tenantId, subscriptionId'
    );
  });
});

describe('AzureManager', () => {
  const ok = { stdout: '', stderr: '', exitCode: 0 };
  let runner: { run: ReturnType<typeof vi.fn> };
  let logger: Logger;
  let azure: AzureManager;

  beforeEach(() => {
    runner = { run: vi.fn().mockResolvedValue(ok) };
    logger = new Logger({ silent: true });
    azure = new AzureManager(runner, logger);
  });

  describe('login', () => {
    it('should log in with the service principal and select the subscription', async () => {
      await azure.login(CREDENTIALS);

      expect(runner.run).toHaveBeenNthCalledWith(1, 'az', [
        'login', '--service-principal',
        '--username', 'test-client',
        '--password', 'test-secret',
        '--tenant', 'test-tenant',
        '--output', 'none'
      ], { secrets: ['test-secret'] });
      expect(runner.run).toHaveBeenNthCalledWith(2, 'az', ['account', 'set', '--subscription', 'test-subscription']);
      expect(logger.redact('password test-secret')).toBe('password ***');
    });

    it('should abort on any login failure', async () => {
      runner.run.mockRejectedValueOnce(
        new CommandError({ command: 'az login', exitCode: 1, stderr: 'AADSTS7000215: Invalid client secret', timedOut: false })
      );

      await expect(azure.login(CREDENTIALS)).rejects.toBeInstanceOf(AuthenticationError);
      expect(runner.run).toHaveBeenCalledTimes(1);
    });
  });

  describe('getClusterCredentials', () => {
    it('should write admin credentials to the given kubeconfig', async () => {
      await azure.getClusterCredentials('rg-prod', 'aks-prod', '/tmp/kube/config');

      expect(runner.run).toHaveBeenCalledWith('az', [
        'aks', 'get-credentials',
        '--resource-group', 'rg-prod',
        '--name', 'aks-prod',
        '--admin',
        '--overwrite-existing',
        '--file', '/tmp/kube/config'
      ]);
    });

    it('should mark network failures transient', async () => {
      runner.run.mockRejectedValueOnce(
        new CommandError({ command: 'az aks get-credentials', exitCode: 1, stderr: 'connection reset by peer', timedOut: false })
      );

      const result = azure.getClusterCredentials('rg-prod', 'aks-prod', '/tmp/kube/config');

      await expect(result).rejects.toBeInstanceOf(TransientError);
      await expect(result).rejects.toThrow('Failed to get credentials for cluster aks-prod');
    });

    it('should pass other failures through', async () => {
      const error = new CommandError({ command: 'az aks get-credentials', exitCode: 3, stderr: 'ResourceNotFound', timedOut: false });
      runner.run.mockRejectedValueOnce(error);

      await expect(azure.getClusterCredentials('rg-prod', 'aks-prod', '/tmp/kube/config')).rejects.toBe(error);
    });
  });

  describe('configureDefaults', () => {
    it('should set the default resource group', async () => {
      await azure.configureDefaults('rg-prod');

      expect(runner.run).toHaveBeenCalledWith('az', ['configure', '--defaults', 'group=rg-prod']);
    });
  });

  describe('getStorageConnectionString', () => {
    it('should return and mask the connection string', async () => {
      runner.run.mockResolvedValueOnce({ ...ok, stdout: `  ${CONNECTION_STRING}  ` });

      const connectionString = await azure.getStorageConnectionString('qrstorage1', 'rg-prod');

      expect(connectionString).toBe(CONNECTION_STRING);
      expect(runner.run).toHaveBeenCalledWith('az', [
        'storage', 'account', 'show-connection-string',
        '--name', 'qrstorage1',
        '--resource-group', 'rg-prod',
        '--query', 'connectionString',
        '--output', 'tsv'
      ]);
      expect(logger.redact(`value=${CONNECTION_STRING}`)).toBe('value=***');
    });

    it('should treat an empty answer as transient', async () => {
      await expect(azure.getStorageConnectionString('qrstorage1', 'rg-prod')).rejects.toThrow(
        'Storage account qrstorage1 returned an empty connection string'
      );
    });
  });
});
