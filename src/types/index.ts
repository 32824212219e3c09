// Core type definitions for the AKS deployment pipeline

export type ServiceName = 'api' | 'frontend';

export interface ApplicationConfig {
  name: string;
}

export interface AzureConfig {
  credentials_env: string;
}

export interface UpstreamArtifactConfig {
  workflow: string;
  workflow_file: string;
  artifact: string;
  file: string;
  download_dir: string;
}

/**
 * The image artifact is optional: without `workflow_file` and `artifact`
 * only the fallback references are used.
 */
export interface ImageArtifactConfig {
  workflow: string;
  workflow_file?: string;
  artifact?: string;
  file: string;
  download_dir: string;
  fallback?: Partial<Record<ServiceName, string>>;
}

export interface UpstreamConfig {
  repository?: string;
  infrastructure: UpstreamArtifactConfig;
  images: ImageArtifactConfig;
}

export interface ManifestConfig {
  service: ServiceName;
  file: string;
}

export interface SecretConfig {
  name: string;
  key: string;
}

export interface KubernetesConfig {
  namespace: string;
  manifests_dir: string;
  manifests: ManifestConfig[];
  apply_timeout_seconds: number;
  secret: SecretConfig;
}

export interface TriggerConfig {
  branch: string;
  /** Globs a push must touch to deploy, relative to the repository root. */
  paths: string[];
}

export interface RetrySettings {
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
}

export interface DeploymentSettings {
  simulate: boolean;
  retry: RetrySettings;
}

export interface LoggingConfig {
  verbose: boolean;
  file?: string;
}

export interface DeploymentConfig {
  application: ApplicationConfig;
  azure: AzureConfig;
  upstream: UpstreamConfig;
  kubernetes: KubernetesConfig;
  triggers: TriggerConfig;
  deployment: DeploymentSettings;
  logging: LoggingConfig;
}

/**
 * Values produced by the infrastructure pipeline. Every field must be
 * non-empty before anything in the cluster is touched.
 */
export interface UpstreamOutputs {
  aksClusterName: string;
  containerName: string;
  resourceGroupName: string;
  storageAccountName: string;
}

export type ImageReferences = Record<ServiceName, string>;

export interface ResolvedImages {
  images: ImageReferences;
  source: 'artifact' | 'fallback';
}

export type TriggerEvent =
  | { kind: 'manual'; simulateInput?: unknown }
  | { kind: 'upstream'; workflow: string; conclusion: string; runId?: number }
  | { kind: 'push'; ref: string; changedFiles?: string[] }
  | { kind: 'pull_request'; baseRef: string }
  | { kind: 'unsupported'; eventName: string };

export interface TriggerDecision {
  run: boolean;
  simulate: boolean;
  reason: string;
}

export type ApplyAction = 'created' | 'configured' | 'unchanged';

export interface AppliedResource {
  resource: string;
  action: ApplyAction;
}

export interface ApplyResult {
  service: ServiceName;
  file: string;
  resources: AppliedResource[];
}

export interface SecretStatus {
  name: string;
  exists: boolean;
  keys: string[];
  action?: ApplyAction;
}

export interface PodSummary {
  name: string;
  phase: string;
  ready: string;
  restarts: number;
}

export interface ServiceSummary {
  name: string;
  type: string;
  clusterIP: string;
  ports: string[];
}

export interface VerificationReport {
  pods: PodSummary[];
  services: ServiceSummary[];
}

export interface PodLogDump {
  pod: string;
  logs?: string;
  error?: string;
}

export interface DeploymentError {
  code: string;
  message: string;
  details?: unknown;
  remediation?: string;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  duration?: number;
  cluster?: string;
  namespace: string;
}

export interface DeploymentResult {
  success: boolean;
  skipped: boolean;
  simulated: boolean;
  trigger: TriggerEvent;
  outputs?: UpstreamOutputs;
  images?: ResolvedImages;
  secret?: SecretStatus;
  applied: ApplyResult[];
  verification?: VerificationReport;
  diagnostics?: PodLogDump[];
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
