// Orchestration-specific types
import { CloudProvider, ClusterClient, ServicePrincipalCredentials } from '../provisioning/types.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { TriggerEvent } from '../types/index.js';
import { UpstreamSources } from '../upstream/upstream-verifier.js';
import { Logger } from '../utils/logger.js';

export interface KubeconfigHandle {
  path: string;
  cleanup(): Promise<void>;
}

export interface OrchestratorDependencies {
  cloud: CloudProvider;
  /** Binds a cluster client to the kubeconfig written for this run. */
  createCluster(kubeconfigPath: string): ClusterClient;
  sources: UpstreamSources;
  /** Read lazily so a skipped run never touches the secret. */
  credentials(): ServicePrincipalCredentials;
  logger: Logger;
  templates?: TemplateEngine;
  createKubeconfig?(): Promise<KubeconfigHandle>;
}

export interface DeployOptions {
  event: TriggerEvent;
  /** Overrides the simulation decision of a manual trigger; automatic triggers always apply. */
  simulate?: boolean;
}
