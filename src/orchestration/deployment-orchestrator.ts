import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  ApplyResult,
  DeploymentConfig,
  DeploymentMetadata,
  DeploymentResult,
  PodLogDump,
  SecretStatus,
  UpstreamOutputs,
  VerificationReport
} from '../types/index.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { RenderedManifest } from '../templates/types.js';
import { SecretManager } from '../provisioning/secret-manager.js';
import { ClusterClient } from '../provisioning/types.js';
import { evaluateTrigger } from '../upstream/trigger.js';
import { UpstreamVerifier, VerifiedUpstream } from '../upstream/upstream-verifier.js';
import { ApplyError, errorMessage, toDeploymentError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { retryConfigFromSettings, withRetry } from '../utils/retry.js';
import { DeployOptions, KubeconfigHandle, OrchestratorDependencies } from './types.js';

async function createTempKubeconfig(): Promise<KubeconfigHandle> {
  const dir = await mkdtemp(join(tmpdir(), 'aks-deploy-'));
  return {
    path: join(dir, 'kubeconfig'),
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
}

export class DeploymentOrchestrator {
  private logger: Logger;
  private templates: TemplateEngine;
  private verifier: UpstreamVerifier;

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: OrchestratorDependencies
  ) {
    this.logger = deps.logger;
    this.templates = deps.templates ?? new TemplateEngine();
    this.verifier = new UpstreamVerifier(config, deps.sources, deps.logger);
  }

  async deploy(options: DeployOptions): Promise<DeploymentResult> {
    const startTime = Date.now();
    const metadata: DeploymentMetadata = {
      deploymentId: uuidv4(),
      timestamp: new Date(),
      namespace: this.config.kubernetes.namespace
    };
    const result: DeploymentResult = {
      success: false,
      skipped: false,
      simulated: false,
      trigger: options.event,
      applied: [],
      metadata
    };
    const finish = (): DeploymentResult => {
      metadata.duration = Date.now() - startTime;
      return result;
    };

    // Stage 1: trigger gate and upstream verification. Nothing is mutated
    // until both upstreams check out.
    let upstream: VerifiedUpstream;
    try {
      const decision = evaluateTrigger(options.event, this.config);
      this.logger.step('TRIGGER', decision.reason);
      if (!decision.run) {
        result.success = true;
        result.skipped = true;
        return finish();
      }
      result.simulated = decision.simulate;
      if (options.simulate !== undefined) {
        if (options.event.kind === 'manual') {
          result.simulated = options.simulate;
        } else {
          this.logger.warn(`Ignoring the simulate override: ${options.event.kind} triggers always apply`);
        }
      }

      this.logger.step('UPSTREAM', 'Verifying infrastructure and image pipelines');
      upstream = await this.verifier.verify(options.event);
      result.outputs = upstream.outputs;
      result.images = upstream.images;
      metadata.cluster = upstream.outputs.aksClusterName;
    } catch (error) {
      this.logger.error(`Upstream verification failed: ${errorMessage(error)}`, error);
      result.errors = [toDeploymentError(error)];
      return finish();
    }

    // Stages 2 and 3
    let kubeconfig: KubeconfigHandle | undefined;
    let cluster: ClusterClient | undefined;
    try {
      this.logOutputs(upstream);
      kubeconfig = this.deps.createKubeconfig
        ? await this.deps.createKubeconfig()
        : await createTempKubeconfig();

      this.logger.step('AUTH', 'Authenticating to Azure');
      await this.deps.cloud.login(this.deps.credentials());
      await this.deps.cloud.getClusterCredentials(
        upstream.outputs.resourceGroupName,
        upstream.outputs.aksClusterName,
        kubeconfig.path
      );
      await this.deps.cloud.configureDefaults(upstream.outputs.resourceGroupName);
      cluster = this.deps.createCluster(kubeconfig.path);

      this.logger.step('SECRET', `Provisioning ${this.config.kubernetes.secret.name}`);
      result.secret = await this.provisionSecret(cluster, upstream.outputs);

      this.logger.step('MANIFESTS', 'Rendering manifest templates');
      const manifests = await this.templates.renderManifests(
        this.config.kubernetes.manifests_dir,
        this.config.kubernetes.manifests,
        this.templates.buildValues(upstream.outputs, upstream.images.images)
      );
      for (const manifest of manifests) {
        this.logger.debug(`Rendered ${manifest.file}`, { content: manifest.content });
      }

      if (result.simulated) {
        this.logger.step('APPLY', 'Simulation mode: deployment steps skipped');
      } else {
        this.logger.step('APPLY', 'Applying manifests');
        await this.applyInOrder(cluster, manifests, result.applied);
      }

      this.logger.step('VERIFY', 'Checking pods and services');
      result.verification = await this.verifyDeployment(cluster);

      result.success = true;
      this.logger.success(result.simulated ? 'Simulated deployment completed' : 'Deployment completed');
    } catch (error) {
      this.logger.error(`Deployment failed: ${errorMessage(error)}`, error);
      result.errors = [toDeploymentError(error)];
      if (cluster) {
        this.logger.step('DIAGNOSTICS', 'Fetching pod logs');
        result.diagnostics = await this.collectDiagnostics(cluster);
      }
    } finally {
      await kubeconfig?.cleanup().catch((error: unknown) =>
        this.logger.warn(`Could not remove temporary kubeconfig: ${errorMessage(error)}`)
      );
    }

    return finish();
  }

  /** Stage 1 only, for the verify-upstream command. */
  async verifyUpstream(options: DeployOptions): Promise<VerifiedUpstream | undefined> {
    const decision = evaluateTrigger(options.event, this.config);
    this.logger.step('TRIGGER', decision.reason);
    return decision.run ? this.verifier.verify(options.event) : undefined;
  }

  private logOutputs({ outputs, images }: VerifiedUpstream): void {
    this.logger.info(`Resource Group: ${outputs.resourceGroupName}`);
    this.logger.info(`AKS Cluster: ${outputs.aksClusterName}`);
    this.logger.info(`Storage Account: ${outputs.storageAccountName}`);
    this.logger.info(`Container: ${outputs.containerName}`);
    this.logger.info(`Docker Images: ${images.images.api} and ${images.images.frontend} (${images.source})`);
  }

  private async provisionSecret(cluster: ClusterClient, outputs: UpstreamOutputs): Promise<SecretStatus> {
    const { name, key } = this.config.kubernetes.secret;
    const secrets = new SecretManager(cluster, this.logger);

    const connectionString = await this.retry('storage connection string lookup', () =>
      this.deps.cloud.getStorageConnectionString(outputs.storageAccountName, outputs.resourceGroupName)
    );
    const written = await this.retry(`secret ${name} upsert`, () => secrets.upsert(name, key, connectionString));
    const status = await secrets.verify(name, key);
    return { ...status, action: written[0]?.action };
  }

  /**
   * Applies manifests strictly in order. A failure stops the sequence and
   * leaves earlier manifests applied.
   */
  private async applyInOrder(
    cluster: ClusterClient,
    manifests: RenderedManifest[],
    applied: ApplyResult[]
  ): Promise<void> {
    const timeoutMs = this.config.kubernetes.apply_timeout_seconds * 1000;

    for (const manifest of manifests) {
      this.logger.info(`Deploying ${manifest.service} (${manifest.file})...`);
      try {
        const resources = await cluster.apply(manifest.content, { timeoutMs });
        applied.push({ service: manifest.service, file: manifest.file, resources });
        for (const resource of resources) {
          this.logger.success(`${resource.resource} ${resource.action}`);
        }
      } catch (error) {
        throw new ApplyError(
          `Applying ${manifest.file} failed: ${errorMessage(error)}`,
          applied.map(entry => entry.file),
          { cause: error }
        );
      }
    }
  }

  /** Observational: query failures are logged, never fatal. */
  private async verifyDeployment(cluster: ClusterClient): Promise<VerificationReport> {
    const report: VerificationReport = { pods: [], services: [] };

    try {
      report.pods = await cluster.listPods();
      this.logger.info(`Pods (${report.pods.length}):`);
      for (const pod of report.pods) {
        this.logger.info(`  ${pod.name}  ${pod.ready}  ${pod.phase}  restarts=${pod.restarts}`);
      }
    } catch (error) {
      this.logger.warn(`Could not list pods: ${errorMessage(error)}`);
    }

    try {
      report.services = await cluster.listServices();
      this.logger.info(`Services (${report.services.length}):`);
      for (const service of report.services) {
        this.logger.info(`  ${service.name}  ${service.type}  ${service.clusterIP}  ${service.ports.join(',')}`);
      }
    } catch (error) {
      this.logger.warn(`Could not list services: ${errorMessage(error)}`);
    }

    return report;
  }

  /**
   * Dumps every pod's logs, best effort. Never throws, so the failure that
   * triggered it stays the reported one.
   */
  private async collectDiagnostics(cluster: ClusterClient): Promise<PodLogDump[]> {
    let pods: string[];
    try {
      pods = (await cluster.listPods()).map(pod => pod.name);
    } catch (error) {
      this.logger.warn(`Could not list pods for diagnostics: ${errorMessage(error)}`);
      return [];
    }

    const dumps: PodLogDump[] = [];
    for (const pod of pods) {
      try {
        const logs = await cluster.podLogs(pod);
        this.logger.block(`Logs for ${pod}`, logs);
        dumps.push({ pod, logs });
      } catch (error) {
        this.logger.warn(`Could not fetch logs for ${pod}: ${errorMessage(error)}`);
        dumps.push({ pod, error: errorMessage(error) });
      }
    }
    return dumps;
  }

  private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, retryConfigFromSettings(this.config.deployment.retry, label, this.logger));
  }
}
