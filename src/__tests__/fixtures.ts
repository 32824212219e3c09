// Shared test doubles: an in-memory cluster and config builders
import { loadAll } from 'js-yaml';
import { validateAndNormalizeConfig } from '../config/validator.js';
import { ApplyOptions, ClusterClient, SecretInfo } from '../provisioning/types.js';
import {
  ApplyAction,
  AppliedResource,
  DeploymentConfig,
  PodSummary,
  ServiceSummary,
  UpstreamOutputs
} from '../types/index.js';

export const OUTPUTS: UpstreamOutputs = {
  aksClusterName: 'aks-prod',
  containerName: 'qr-images',
  resourceGroupName: 'rg-prod',
  storageAccountName: 'qrstorage1'
};

export const TERRAFORM_OUTPUTS_JSON = JSON.stringify({
  aks_cluster_name: { sensitive: false, type: 'string', value: 'aks-prod' },
  container_name: { sensitive: false, type: 'string', value: 'qr-images' },
  resource_group_name: { sensitive: false, type: 'string', value: 'rg-prod' },
  storage_account_name: { sensitive: false, type: 'string', value: 'qrstorage1' }
});

export const FALLBACK_IMAGES = {
  api: 'example/qr-api:1.0',
  frontend: 'example/qr-frontend:1.0'
};

export const CONNECTION_STRING =
  'DefaultEndpointsProtocol=https;AccountName=qrstorage1;AccountKey=test-secret;EndpointSuffix=core.windows.net';

/** A normalized config with fallback images and retries that do not wait. */
export function buildConfig(overrides: Record<string, unknown> = {}): DeploymentConfig {
  return validateAndNormalizeConfig({
    application: { name: 'qr-app' },
    upstream: { images: { fallback: FALLBACK_IMAGES } },
    deployment: { retry: { max_attempts: 2, base_delay_ms: 0, max_delay_ms: 0 } },
    ...overrides
  });
}

function resourceId(document: unknown): string | undefined {
  if (typeof document !== 'object' || document === null || !('kind' in document) || !('metadata' in document)) {
    return undefined;
  }
  const { kind, metadata } = document;
  if (typeof kind !== 'string' || typeof metadata !== 'object' || metadata === null || !('name' in metadata)) {
    return undefined;
  }
  return typeof metadata.name === 'string' ? `${kind.toLowerCase()}/${metadata.name}` : undefined;
}

/**
 * Keeps applied resources and secrets in maps and reports
 * created/configured/unchanged the way `kubectl apply` does.
 */
export class InMemoryCluster implements ClusterClient {
  readonly resources = new Map<string, string>();
  readonly secrets = new Map<string, Record<string, string>>();
  pods: PodSummary[] = [];
  services: ServiceSummary[] = [];
  readonly logs = new Map<string, string>();

  async apply(manifest: string, _options?: ApplyOptions): Promise<AppliedResource[]> {
    const applied: AppliedResource[] = [];
    for (const document of loadAll(manifest)) {
      const id = resourceId(document);
      if (id) {
        applied.push({ resource: id, action: this.store(this.resources, id, JSON.stringify(document)) });
      }
    }
    return applied;
  }

  async createSecret(name: string, data: Record<string, string>): Promise<AppliedResource[]> {
    const previous = this.secrets.get(name);
    const action: ApplyAction = !previous
      ? 'created'
      : JSON.stringify(previous) === JSON.stringify(data) ? 'unchanged' : 'configured';
    this.secrets.set(name, { ...data });
    return [{ resource: `secret/${name}`, action }];
  }

  async getSecret(name: string): Promise<SecretInfo | undefined> {
    const data = this.secrets.get(name);
    return data ? { name, keys: Object.keys(data).sort() } : undefined;
  }

  async listPods(): Promise<PodSummary[]> {
    return this.pods;
  }

  async listServices(): Promise<ServiceSummary[]> {
    return this.services;
  }

  async podLogs(pod: string): Promise<string> {
    const logs = this.logs.get(pod);
    if (logs === undefined) {
      throw new Error(`pods "${pod}" not found`);
    }
    return logs;
  }

  private store(map: Map<string, string>, id: string, content: string): ApplyAction {
    const previous = map.get(id);
    map.set(id, content);
    if (previous === undefined) {
      return 'created';
    }
    return previous === content ? 'unchanged' : 'configured';
  }
}
