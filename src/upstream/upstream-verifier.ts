import {
  DeploymentConfig,
  ResolvedImages,
  TriggerEvent,
  UpstreamOutputs
} from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { retryConfigFromSettings, withRetry } from '../utils/retry.js';
import { errorMessage, PreconditionError } from '../utils/errors.js';
import { ArtifactSource } from './artifact-source.js';
import { parseTerraformOutputs, requireOutputs } from './terraform-outputs.js';
import { fallbackImages, parseImageReferences } from './image-references.js';

export interface UpstreamSources {
  infrastructure: ArtifactSource;
  /** Without one, only the configured fallback images are used. */
  images?: ArtifactSource;
}

export interface VerifiedUpstream {
  outputs: UpstreamOutputs;
  images: ResolvedImages;
}

/**
 * Stage 1: confirms both upstream pipelines and collects what they produced.
 */
export class UpstreamVerifier {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly sources: UpstreamSources,
    private readonly logger: Logger
  ) {}

  /** Runs both verifications concurrently; both must pass. */
  async verify(event: TriggerEvent): Promise<VerifiedUpstream> {
    const [outputs, images] = await Promise.all([
      this.verifyInfrastructure(event),
      this.verifyImages(event)
    ]);
    return { outputs, images };
  }

  async verifyInfrastructure(event: TriggerEvent): Promise<UpstreamOutputs> {
    const upstream = this.config.upstream.infrastructure;

    const content = await this.withRetry(`download ${upstream.artifact}`, () =>
      this.sources.infrastructure.fetch({
        workflowFile: upstream.workflow_file,
        artifact: upstream.artifact,
        file: upstream.file,
        downloadDir: upstream.download_dir,
        runId: this.triggeringRun(event, upstream.workflow),
        repository: this.config.upstream.repository
      })
    );

    const outputs = requireOutputs(parseTerraformOutputs(content));
    this.logger.success('Infrastructure outputs verified', {
      resourceGroup: outputs.resourceGroupName,
      cluster: outputs.aksClusterName,
      storageAccount: outputs.storageAccountName,
      container: outputs.containerName
    });
    return outputs;
  }

  async verifyImages(event: TriggerEvent): Promise<ResolvedImages> {
    const upstream = this.config.upstream.images;
    const fallback = fallbackImages(upstream.fallback);

    const source = this.sources.images;
    if (source) {
      const request = {
        workflowFile: upstream.workflow_file ?? '',
        artifact: upstream.artifact ?? 'image-references',
        file: upstream.file,
        downloadDir: upstream.download_dir,
        runId: this.triggeringRun(event, upstream.workflow),
        repository: this.config.upstream.repository
      };
      try {
        const content = await this.withRetry(`download ${request.artifact}`, () => source.fetch(request));
        const images = parseImageReferences(content);
        this.logger.success(`Images verified: ${images.api} and ${images.frontend}`);
        return { images, source: 'artifact' };
      } catch (error) {
        if (!fallback) {
          throw error;
        }
        this.logger.warn(`Image artifact unavailable (${errorMessage(error)}); using configured fallback images`);
      }
    }

    if (!fallback) {
      throw new PreconditionError('No image references available', {
        remediation: 'Configure upstream.images.artifact or upstream.images.fallback for both api and frontend'
      });
    }

    this.logger.warn(`Using fallback images ${fallback.api} and ${fallback.frontend}; they may be stale`);
    return { images: fallback, source: 'fallback' };
  }

  private triggeringRun(event: TriggerEvent, workflow: string): number | undefined {
    return event.kind === 'upstream' && event.workflow === workflow ? event.runId : undefined;
  }

  private withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, retryConfigFromSettings(this.config.deployment.retry, label, this.logger));
  }
}
