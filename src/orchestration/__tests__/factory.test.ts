import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createDeploymentOrchestrator, deploy } from '../factory.js';
import { Logger } from '../../utils/logger.js';
import { CONNECTION_STRING, FALLBACK_IMAGES, TERRAFORM_OUTPUTS_JSON, buildConfig } from '../../__tests__/fixtures.js';

const MANIFESTS_DIR = fileURLToPath(new URL('../../../k8s', import.meta.url));

const CREDENTIALS = JSON.stringify({
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tenantId: 'test-tenant',
  subscriptionId: 'test-subscription'
});

const ok = { stdout: '', stderr: '', exitCode: 0 };

async function fakeCli(command: string, args: string[]) {
  if (command === 'az' && args[0] === 'storage') {
    return { ...ok, stdout: CONNECTION_STRING };
  }
  if (command === 'kubectl' && args[0] === 'apply') {
    return { ...ok, stdout: 'secret/azure-storage-secret created' };
  }
  if (command === 'kubectl' && args[0] === 'get' && args[1] === 'secret') {
    return {
      ...ok,
      stdout: JSON.stringify({ metadata: { name: 'azure-storage-secret' }, data: { AZURE_STORAGE_CONNECTION_STRING: 'eA==' } })
    };
  }
  if (command === 'kubectl' && args[0] === 'get') {
    return { ...ok, stdout: '{"items":[]}' };
  }
  return ok;
}

describe('createDeploymentOrchestrator', () => {
  let dir: string;
  let outputsFile: string;
  let imagesFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'factory-test-'));
    outputsFile = join(dir, 'terraform-outputs.json');
    imagesFile = join(dir, 'image-references.json');
    await writeFile(outputsFile, TERRAFORM_OUTPUTS_JSON);
    await writeFile(imagesFile, '{"api":"acme/qr-api:2.0","frontend":"acme/qr-frontend:2.0"}');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run a simulated deployment through az and kubectl', async () => {
    const runner = { run: vi.fn(fakeCli) };
    const config = buildConfig({ kubernetes: { manifests_dir: MANIFESTS_DIR } });

    const result = await createDeploymentOrchestrator(config, {
      logger: new Logger({ silent: true }),
      runner,
      outputsFile,
      imagesFile,
      env: { AZURE_CREDENTIALS: CREDENTIALS }
    }).deploy({ event: { kind: 'manual' } });

    expect(result.success).toBe(true);
    expect(result.simulated).toBe(true);
    expect(result.images).toEqual({
      images: { api: 'acme/qr-api:2.0', frontend: 'acme/qr-frontend:2.0' },
      source: 'artifact'
    });
    expect(result.secret).toEqual({
      name: 'azure-storage-secret',
      exists: true,
      keys: ['AZURE_STORAGE_CONNECTION_STRING'],
      action: 'created'
    });

    const commands = runner.run.mock.calls.map(([command, args]) => `${command} ${args.slice(0, 2).join(' ')}`);
    expect(commands).toEqual([
      'az login --service-principal',
      'az account set',
      'az aks get-credentials',
      'az configure --defaults',
      'az storage account',
      'kubectl apply -f',
      'kubectl get secret',
      'kubectl get pods',
      'kubectl get services'
    ]);
  });

  it('should fall back to configured images without an image artifact', async () => {
    const result = await deploy(
      buildConfig({ kubernetes: { manifests_dir: MANIFESTS_DIR } }),
      { kind: 'manual' },
      {
        logger: new Logger({ silent: true }),
        runner: { run: vi.fn(fakeCli) },
        outputsFile,
        env: { AZURE_CREDENTIALS: CREDENTIALS }
      }
    );

    expect(result.success).toBe(true);
    expect(result.images).toEqual({ images: FALLBACK_IMAGES, source: 'fallback' });
  });

  it('should fail authentication when the credentials variable is unset', async () => {
    const runner = { run: vi.fn(fakeCli) };

    const result = await createDeploymentOrchestrator(buildConfig(), {
      logger: new Logger({ silent: true }),
      runner,
      outputsFile,
      imagesFile,
      env: {}
    }).deploy({ event: { kind: 'manual' } });

    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatchObject({
      code: 'AUTHENTICATION_FAILED',
      message: 'No Azure credentials found in AZURE_CREDENTIALS'
    });
    expect(runner.run).not.toHaveBeenCalled();
  });
});
