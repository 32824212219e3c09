import Joi from 'joi';
import { CommandRunner } from '../utils/command-runner.js';
import { AuthenticationError, CommandError, ConfigurationError, TransientError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { CloudProvider, ServicePrincipalCredentials } from './types.js';

const credentialsSchema = Joi.object({
  clientId: Joi.string().required(),
  clientSecret: Joi.string().required(),
  tenantId: Joi.string().required(),
  subscriptionId: Joi.string().required()
}).unknown(true);

/**
 * Parse the service principal JSON blob (the `az ad sp create-for-rbac
 * --sdk-auth` format) kept in the CI secret store.
 */
export function parseServicePrincipalCredentials(raw: string | undefined, source: string): ServicePrincipalCredentials {
  if (!raw || raw.trim().length === 0) {
    throw new AuthenticationError(`No Azure credentials found in ${source}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // the raw value holds the secret, so the parse error is not attached
    throw new ConfigurationError(`${source} is not valid JSON`, {
      remediation: 'Store the output of `az ad sp create-for-rbac --sdk-auth` as the secret'
    });
  }

  const { error, value } = credentialsSchema.validate(parsed, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(
      `${source} is missing fields: ${error.details.map(detail => detail.context?.key ?? detail.message).join(', ')}`
    );
  }

  return {
    clientId: value.clientId,
    clientSecret: value.clientSecret,
    tenantId: value.tenantId,
    subscriptionId: value.subscriptionId
  };
}

/**
 * Azure side of the deployment, driven through the az CLI.
 */
export class AzureManager implements CloudProvider {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  async login(credentials: ServicePrincipalCredentials): Promise<void> {
    this.logger.addMask(credentials.clientSecret);

    try {
      await this.runner.run('az', [
        'login', '--service-principal',
        '--username', credentials.clientId,
        '--password', credentials.clientSecret,
        '--tenant', credentials.tenantId,
        '--output', 'none'
      ], { secrets: [credentials.clientSecret] });

      await this.runner.run('az', ['account', 'set', '--subscription', credentials.subscriptionId]);
    } catch (error) {
      throw new AuthenticationError('Azure login failed', { cause: error });
    }

    this.logger.success(`Logged in to Azure as ${credentials.clientId}`);
  }

  async getClusterCredentials(resourceGroup: string, clusterName: string, kubeconfigPath: string): Promise<void> {
    try {
      await this.runner.run('az', [
        'aks', 'get-credentials',
        '--resource-group', resourceGroup,
        '--name', clusterName,
        '--admin',
        '--overwrite-existing',
        '--file', kubeconfigPath
      ]);
    } catch (error) {
      throw this.classify(error, `Failed to get credentials for cluster ${clusterName}`);
    }
    this.logger.success(`Cluster context set to ${clusterName} (${resourceGroup})`);
  }

  async configureDefaults(resourceGroup: string): Promise<void> {
    await this.runner.run('az', ['configure', '--defaults', `group=${resourceGroup}`]);
    this.logger.debug(`Azure CLI default resource group set to ${resourceGroup}`);
  }

  async getStorageConnectionString(accountName: string, resourceGroup: string): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner.run('az', [
        'storage', 'account', 'show-connection-string',
        '--name', accountName,
        '--resource-group', resourceGroup,
        '--query', 'connectionString',
        '--output', 'tsv'
      ]));
    } catch (error) {
      throw this.classify(error, `Failed to read connection string of storage account ${accountName}`);
    }

    const connectionString = stdout.trim();
    if (!connectionString) {
      throw new TransientError(`Storage account ${accountName} returned an empty connection string`);
    }
    this.logger.addMask(connectionString);
    return connectionString;
  }

  private classify(error: unknown, message: string): Error {
    if (error instanceof CommandError && error.transient) {
      return new TransientError(message, { cause: error });
    }
    return error instanceof Error ? error : new Error(message);
  }
}
