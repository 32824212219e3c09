import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DeploymentConfigLoader, createConfigLoader } from '../loader.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('Configuration Loader', () => {
  let testDir: string;
  let loader: DeploymentConfigLoader;

  beforeEach(async () => {
    loader = new DeploymentConfigLoader();
    testDir = await mkdtemp(join(tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should load and validate a JSON configuration file', async () => {
      const path = join(testDir, 'deploy.json');
      await writeFile(path, JSON.stringify({
        application: { name: 'qr-app' },
        kubernetes: { namespace: 'qr-prod' }
      }, null, 2));

      const config = await loader.load(path);

      expect(config.application.name).toBe('qr-app');
      expect(config.kubernetes.namespace).toBe('qr-prod');
      expect(config.kubernetes.secret.name).toBe('azure-storage-secret'); // default applied
    });

    it('should load and validate a YAML configuration file', async () => {
      const path = join(testDir, 'deploy.yml');
      await writeFile(path, `
application:
  name: qr-app

kubernetes:
  manifests_dir: deploy/k8s
  apply_timeout_seconds: 600

deployment:
  simulate: false
`);

      const config = await loader.load(path);

      expect(config.kubernetes.manifests_dir).toBe('deploy/k8s');
      expect(config.kubernetes.apply_timeout_seconds).toBe(600);
      expect(config.deployment.simulate).toBe(false);
    });

    it('should substitute environment variables', async () => {
      vi.stubEnv('QR_TEST_API_IMAGE', 'acme/qr-api:3.1');
      const path = join(testDir, 'deploy.yaml');
      await writeFile(path, `
application:
  name: qr-app
upstream:
  images:
    fallback:
      api: \${QR_TEST_API_IMAGE}
      frontend: \${QR_TEST_UNSET_FRONTEND_IMAGE:-acme/qr-frontend:latest}
`);

      const config = await loader.load(path);

      expect(config.upstream.images.fallback).toEqual({
        api: 'acme/qr-api:3.1',
        frontend: 'acme/qr-frontend:latest'
      });
    });

    it('should keep unresolved variables so validation reports them', async () => {
      const path = join(testDir, 'deploy.yml');
      await writeFile(path, 'application:\n  name: ${QR_TEST_UNSET_APP_NAME}\n');

      await expect(loader.load(path)).rejects.toThrow(
        'Application name must contain only alphanumeric characters, hyphens, and underscores'
      );
    });

    it('should throw a ConfigurationError for a missing file', async () => {
      const path = join(testDir, 'missing.yml');

      await expect(loader.load(path)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(loader.load(path)).rejects.toThrow(
        `Failed to load configuration from ${path}: Configuration file not found: ${path}`
      );
    });

    it('should reject unsupported formats', async () => {
      const path = join(testDir, 'deploy.toml');
      await writeFile(path, 'name = "qr-app"');

      await expect(loader.load(path)).rejects.toThrow('Unsupported file format');
    });

    it('should reject a document that is not a mapping', async () => {
      const path = join(testDir, 'deploy.yml');
      await writeFile(path, '- qr-app\n- api\n');

      await expect(loader.load(path)).rejects.toThrow('Configuration must be a mapping');
    });

    it('should reject invalid JSON', async () => {
      const path = join(testDir, 'deploy.json');
      await writeFile(path, '{ "application": ');

      await expect(loader.load(path)).rejects.toThrow(`Failed to load configuration from ${path}`);
    });
  });

  describe('validate', () => {
    it('should report validation errors without throwing', () => {
      expect(loader.validate({ application: {} })).toEqual({
        valid: false,
        errors: ['"application.name" is required']
      });
    });
  });

  describe('loadFromPaths', () => {
    it('should load the first configuration that exists', async () => {
      const path = join(testDir, 'deploy.yaml');
      await writeFile(path, 'application:\n  name: second-choice\n');

      const config = await createConfigLoader().loadFromPaths([join(testDir, 'deploy.yml'), path]);

      expect(config.application.name).toBe('second-choice');
    });

    it('should report every path when none loads', async () => {
      await expect(loader.loadFromPaths([join(testDir, 'a.yml'), join(testDir, 'b.yml')])).rejects.toThrow(
        'Could not load configuration from any of the specified paths'
      );
    });
  });
});
