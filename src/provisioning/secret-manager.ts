import { AppliedResource, SecretStatus } from '../types/index.js';
import { PreconditionError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { ClusterClient } from './types.js';

/**
 * Keeps one cluster secret holding one literal value. Upserts replace the
 * previous value instead of adding a second secret.
 */
export class SecretManager {
  constructor(
    private readonly cluster: ClusterClient,
    private readonly logger: Logger
  ) {}

  async upsert(name: string, key: string, value: string): Promise<AppliedResource[]> {
    this.logger.addMask(value);
    const result = await this.cluster.createSecret(name, { [key]: value });
    const action = result[0]?.action ?? 'configured';
    this.logger.info(`Secret ${name} ${action}`);
    return result;
  }

  /** Confirms the secret exists and carries the key; reads key names only. */
  async verify(name: string, key: string): Promise<SecretStatus> {
    this.logger.info(`Verifying secret ${name} exists...`);
    const secret = await this.cluster.getSecret(name);
    if (!secret) {
      throw new PreconditionError(`Secret ${name} was not found after it was written`);
    }
    if (!secret.keys.includes(key)) {
      throw new PreconditionError(`Secret ${name} has no ${key} entry`);
    }
    this.logger.success(`Secret ${name} present with keys: ${secret.keys.join(', ')}`);
    return { name: secret.name, exists: true, keys: secret.keys };
  }
}
