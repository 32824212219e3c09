import { dump } from 'js-yaml';
import { ApplyAction, AppliedResource, PodSummary, ServiceSummary } from '../types/index.js';
import { CommandRunner } from '../utils/command-runner.js';
import { TransientError } from '../utils/errors.js';
import { ApplyOptions, ClusterClient, SecretInfo } from './types.js';

export interface KubectlOptions {
  kubeconfigPath: string;
  namespace: string;
}

type JsonObject = Record<string, unknown>;

function asObject(value: unknown): JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

const APPLY_LINE = /^(\S+) (created|configured|unchanged)\b/;

function isApplyAction(value: string): value is ApplyAction {
  return value === 'created' || value === 'configured' || value === 'unchanged';
}

/**
 * Parse `kubectl apply` output lines such as
 * `deployment.apps/api configured`.
 */
export function parseApplyOutput(stdout: string): AppliedResource[] {
  const resources: AppliedResource[] = [];
  for (const line of stdout.split('\n')) {
    const match = APPLY_LINE.exec(line.trim());
    if (match && isApplyAction(match[2])) {
      resources.push({ resource: match[1], action: match[2] });
    }
  }
  return resources;
}

export function summarizePods(list: unknown): PodSummary[] {
  return asArray(asObject(list).items).map(item => {
    const pod = asObject(item);
    const status = asObject(pod.status);
    const containers = asArray(status.containerStatuses).map(asObject);
    const ready = containers.filter(container => container.ready === true).length;
    const restarts = containers.reduce(
      (total, container) => total + (typeof container.restartCount === 'number' ? container.restartCount : 0),
      0
    );
    return {
      name: asString(asObject(pod.metadata).name),
      phase: asString(status.phase, 'Unknown'),
      ready: `${ready}/${containers.length}`,
      restarts
    };
  });
}

export function summarizeServices(list: unknown): ServiceSummary[] {
  return asArray(asObject(list).items).map(item => {
    const service = asObject(item);
    const spec = asObject(service.spec);
    return {
      name: asString(asObject(service.metadata).name),
      type: asString(spec.type, 'ClusterIP'),
      clusterIP: asString(spec.clusterIP, 'None'),
      ports: asArray(spec.ports).map(entry => {
        const port = asObject(entry);
        const nodePort = typeof port.nodePort === 'number' ? `:${port.nodePort}` : '';
        return `${String(port.port)}${nodePort}/${asString(port.protocol, 'TCP')}`;
      })
    };
  });
}

/**
 * ClusterClient backed by kubectl, pinned to one kubeconfig file and one
 * namespace so nothing depends on the ambient kube context.
 */
export class KubectlClient implements ClusterClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: KubectlOptions
  ) {}

  async apply(manifest: string, options: ApplyOptions = {}): Promise<AppliedResource[]> {
    const { stdout } = await this.kubectl(['apply', '-f', '-'], {
      input: manifest,
      timeoutMs: options.timeoutMs
    });
    return parseApplyOutput(stdout);
  }

  async createSecret(name: string, data: Record<string, string>): Promise<AppliedResource[]> {
    const encoded: Record<string, string> = {};
    for (const [key, value] of Object.entries(data)) {
      encoded[key] = Buffer.from(value, 'utf-8').toString('base64');
    }

    const manifest = dump({
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name, namespace: this.options.namespace },
      type: 'Opaque',
      data: encoded
    });

    const { stdout } = await this.kubectl(['apply', '-f', '-'], {
      input: manifest,
      secrets: [...Object.values(data), ...Object.values(encoded)]
    });
    return parseApplyOutput(stdout);
  }

  async getSecret(name: string): Promise<SecretInfo | undefined> {
    const { stdout } = await this.kubectl(['get', 'secret', name, '--ignore-not-found', '-o', 'json']);
    if (!stdout.trim()) {
      return undefined;
    }
    const secret = asObject(this.parseJson(stdout, `secret ${name}`));
    return {
      name: asString(asObject(secret.metadata).name, name),
      keys: Object.keys(asObject(secret.data)).sort()
    };
  }

  async listPods(): Promise<PodSummary[]> {
    const { stdout } = await this.kubectl(['get', 'pods', '-o', 'json']);
    return summarizePods(this.parseJson(stdout, 'pods'));
  }

  async listServices(): Promise<ServiceSummary[]> {
    const { stdout } = await this.kubectl(['get', 'services', '-o', 'json']);
    return summarizeServices(this.parseJson(stdout, 'services'));
  }

  async podLogs(pod: string): Promise<string> {
    const { stdout } = await this.kubectl(['logs', pod, '--all-containers']);
    return stdout;
  }

  private kubectl(args: string[], options: { input?: string; timeoutMs?: number; secrets?: string[] } = {}) {
    return this.runner.run('kubectl', [
      ...args,
      '--kubeconfig', this.options.kubeconfigPath,
      '--namespace', this.options.namespace
    ], options);
  }

  private parseJson(stdout: string, what: string): unknown {
    try {
      return JSON.parse(stdout);
    } catch (error) {
      throw new TransientError(`kubectl returned unreadable output for ${what}`, { cause: error });
    }
  }
}
