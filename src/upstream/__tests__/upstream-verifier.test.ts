import { describe, it, expect, vi } from 'vitest';
import { UpstreamVerifier } from '../upstream-verifier.js';
import { PreconditionError, TransientError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { FALLBACK_IMAGES, OUTPUTS, TERRAFORM_OUTPUTS_JSON, buildConfig } from '../../__tests__/fixtures.js';

const IMAGES_JSON = '{"api_image":"acme/qr-api:2.0","frontend_image":"acme/qr-frontend:2.0"}';

function source(content: string) {
  return { fetch: vi.fn().mockResolvedValue(content) };
}

describe('UpstreamVerifier', () => {
  const logger = new Logger({ silent: true });

  it('should use the fallback images when there is no image artifact', async () => {
    const verifier = new UpstreamVerifier(buildConfig(), { infrastructure: source(TERRAFORM_OUTPUTS_JSON) }, logger);

    expect(await verifier.verify({ kind: 'manual' })).toEqual({
      outputs: OUTPUTS,
      images: { images: FALLBACK_IMAGES, source: 'fallback' }
    });
  });

  it('should prefer the image artifact', async () => {
    const images = source(IMAGES_JSON);
    const verifier = new UpstreamVerifier(
      buildConfig(),
      { infrastructure: source(TERRAFORM_OUTPUTS_JSON), images },
      logger
    );

    const result = await verifier.verify({ kind: 'manual' });

    expect(result.images).toEqual({
      images: { api: 'acme/qr-api:2.0', frontend: 'acme/qr-frontend:2.0' },
      source: 'artifact'
    });
    expect(images.fetch).toHaveBeenCalledWith(expect.objectContaining({
      artifact: 'image-references',
      file: 'image-references.json',
      downloadDir: 'images'
    }));
  });

  it('should fall back when the image artifact cannot be fetched', async () => {
    const images = { fetch: vi.fn().mockRejectedValue(new PreconditionError('No successful run of docker-publish.yaml found')) };
    const verifier = new UpstreamVerifier(
      buildConfig(),
      { infrastructure: source(TERRAFORM_OUTPUTS_JSON), images },
      logger
    );

    expect((await verifier.verify({ kind: 'manual' })).images.source).toBe('fallback');
  });

  it('should fail without an image artifact or fallback', async () => {
    const config = buildConfig({ upstream: {} });
    const error = new PreconditionError('No successful run of docker-publish.yaml found');

    const withSource = new UpstreamVerifier(
      config,
      { infrastructure: source(TERRAFORM_OUTPUTS_JSON), images: { fetch: vi.fn().mockRejectedValue(error) } },
      logger
    );
    const withoutSource = new UpstreamVerifier(config, { infrastructure: source(TERRAFORM_OUTPUTS_JSON) }, logger);

    await expect(withSource.verify({ kind: 'manual' })).rejects.toBe(error);
    await expect(withoutSource.verify({ kind: 'manual' })).rejects.toThrow('No image references available');
  });

  it('should fail when an infrastructure output is empty', async () => {
    const outputs = JSON.stringify({ ...JSON.parse(TERRAFORM_OUTPUTS_JSON), container_name: { value: '' } });
    const verifier = new UpstreamVerifier(buildConfig(), { infrastructure: source(outputs) }, logger);

    await expect(verifier.verify({ kind: 'manual' })).rejects.toThrow('Infrastructure outputs missing or empty: container_name');
  });

  it('should retry transient download failures', async () => {
    const infrastructure = {
      fetch: vi.fn()
        .mockRejectedValueOnce(new TransientError('artifact service unavailable'))
        .mockResolvedValueOnce(TERRAFORM_OUTPUTS_JSON)
    };
    const verifier = new UpstreamVerifier(buildConfig(), { infrastructure }, logger);

    expect(await verifier.verifyInfrastructure({ kind: 'manual' })).toEqual(OUTPUTS);
    expect(infrastructure.fetch).toHaveBeenCalledTimes(2);
  });

  it('should download from the triggering run', async () => {
    const infrastructure = source(TERRAFORM_OUTPUTS_JSON);
    const verifier = new UpstreamVerifier(
      buildConfig({ upstream: { repository: 'acme/qr-app', images: { fallback: FALLBACK_IMAGES } } }),
      { infrastructure },
      logger
    );

    await verifier.verify({ kind: 'upstream', workflow: 'Terraform Infrastructure', conclusion: 'success', runId: 42 });

    expect(infrastructure.fetch).toHaveBeenCalledWith({
      workflowFile: 'terraform-infrastructure.yaml',
      artifact: 'terraform-outputs',
      file: 'terraform-outputs.json',
      downloadDir: 'infrastructure',
      runId: 42,
      repository: 'acme/qr-app'
    });
  });

  it('should use the latest run for the other upstream', async () => {
    const infrastructure = source(TERRAFORM_OUTPUTS_JSON);
    const verifier = new UpstreamVerifier(buildConfig(), { infrastructure }, logger);

    await verifier.verify({
      kind: 'upstream',
      workflow: 'Build and publish image to Docker Hub',
      conclusion: 'success',
      runId: 7
    });

    expect(infrastructure.fetch).toHaveBeenCalledWith(expect.objectContaining({ runId: undefined }));
  });
});
