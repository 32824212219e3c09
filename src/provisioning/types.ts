// Provisioning-specific types
import { AppliedResource, PodSummary, ServiceSummary } from '../types/index.js';

export interface ServicePrincipalCredentials {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  subscriptionId: string;
}

/**
 * Cloud side of the deployment: identity, cluster credentials and the
 * storage account lookup.
 */
export interface CloudProvider {
  login(credentials: ServicePrincipalCredentials): Promise<void>;
  getClusterCredentials(resourceGroup: string, clusterName: string, kubeconfigPath: string): Promise<void>;
  configureDefaults(resourceGroup: string): Promise<void>;
  getStorageConnectionString(accountName: string, resourceGroup: string): Promise<string>;
}

export interface ApplyOptions {
  timeoutMs?: number;
}

export interface SecretInfo {
  name: string;
  keys: string[];
}

/**
 * The cluster's shared state. Everything the pipeline reads or writes in
 * the cluster goes through this interface.
 */
export interface ClusterClient {
  apply(manifest: string, options?: ApplyOptions): Promise<AppliedResource[]>;
  /** Creates or replaces an Opaque secret. */
  createSecret(name: string, data: Record<string, string>): Promise<AppliedResource[]>;
  /** Secret metadata and key names; never the values. `undefined` when absent. */
  getSecret(name: string): Promise<SecretInfo | undefined>;
  listPods(): Promise<PodSummary[]>;
  listServices(): Promise<ServiceSummary[]>;
  podLogs(pod: string): Promise<string>;
}
