import { DeploymentConfig, DeploymentResult, TriggerEvent } from '../types/index.js';
import { AzureManager, parseServicePrincipalCredentials } from '../provisioning/azure-manager.js';
import { KubectlClient } from '../provisioning/kubectl-client.js';
import { ArtifactSource, GhCliArtifactSource, LocalArtifactSource } from '../upstream/artifact-source.js';
import { CommandRunner, ExecaRunner } from '../utils/command-runner.js';
import { Logger } from '../utils/logger.js';
import { DeploymentOrchestrator } from './deployment-orchestrator.js';

export interface OrchestratorFactoryOptions {
  logger: Logger;
  runner?: CommandRunner;
  /** Read infrastructure outputs from this file instead of downloading them. */
  outputsFile?: string;
  /** Read image references from this file instead of downloading them. */
  imagesFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Wires the orchestrator to the real collaborators: az, kubectl and gh
 * through execa, credentials from the environment.
 */
export function createDeploymentOrchestrator(
  config: DeploymentConfig,
  options: OrchestratorFactoryOptions
): DeploymentOrchestrator {
  const runner = options.runner ?? new ExecaRunner();
  const env = options.env ?? process.env;
  const remote = new GhCliArtifactSource(runner);
  const images = config.upstream.images;
  let imageSource: ArtifactSource | undefined;
  if (options.imagesFile) {
    imageSource = new LocalArtifactSource(options.imagesFile);
  } else if (images.workflow_file && images.artifact) {
    imageSource = remote;
  }

  return new DeploymentOrchestrator(config, {
    logger: options.logger,
    cloud: new AzureManager(runner, options.logger),
    createCluster: kubeconfigPath =>
      new KubectlClient(runner, { kubeconfigPath, namespace: config.kubernetes.namespace }),
    sources: {
      infrastructure: options.outputsFile ? new LocalArtifactSource(options.outputsFile) : remote,
      images: imageSource
    },
    credentials: () => parseServicePrincipalCredentials(env[config.azure.credentials_env], config.azure.credentials_env)
  });
}

// Convenience function mirroring the CLI's deploy command
export async function deploy(
  config: DeploymentConfig,
  event: TriggerEvent,
  options: OrchestratorFactoryOptions
): Promise<DeploymentResult> {
  return createDeploymentOrchestrator(config, options).deploy({ event });
}
