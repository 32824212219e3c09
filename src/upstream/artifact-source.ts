import { readFile, rm, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { CommandRunner } from '../utils/command-runner.js';
import { CommandError, PreconditionError, TransientError } from '../utils/errors.js';

export interface ArtifactRequest {
  /** Workflow file the artifact belongs to, e.g. terraform-infrastructure.yaml */
  workflowFile: string;
  artifact: string;
  /** File inside the artifact to read. */
  file: string;
  downloadDir: string;
  /** Run to download from; the latest successful run when omitted. */
  runId?: number;
  repository?: string;
}

export interface ArtifactSource {
  fetch(request: ArtifactRequest): Promise<string>;
}

async function readArtifactFile(path: string, artifact: string): Promise<string> {
  if (!existsSync(path)) {
    throw new PreconditionError(`Artifact "${artifact}" does not contain ${path}`, {
      remediation: 'Check the artifact name and file configured under upstream'
    });
  }
  return readFile(path, 'utf-8');
}

/**
 * Reads an artifact that is already on disk, either at a fixed path or at
 * `<downloadDir>/<file>`.
 */
export class LocalArtifactSource implements ArtifactSource {
  constructor(private readonly path?: string) {}

  async fetch(request: ArtifactRequest): Promise<string> {
    return readArtifactFile(this.path ?? join(request.downloadDir, request.file), request.artifact);
  }
}

interface WorkflowRun {
  databaseId: number;
}

function isWorkflowRun(value: unknown): value is WorkflowRun {
  return typeof value === 'object' && value !== null && 'databaseId' in value && typeof value.databaseId === 'number';
}

/**
 * Downloads workflow artifacts with the GitHub CLI. Download failures are
 * reported as transient so callers can retry them.
 */
export class GhCliArtifactSource implements ArtifactSource {
  constructor(private readonly runner: CommandRunner) {}

  async fetch(request: ArtifactRequest): Promise<string> {
    const runId = request.runId ?? await this.latestSuccessfulRun(request);

    await mkdir(request.downloadDir, { recursive: true });
    const target = join(request.downloadDir, request.file);
    // gh refuses to overwrite files left by an earlier run
    await rm(target, { force: true });

    try {
      await this.runner.run('gh', [
        'run', 'download', String(runId),
        '--name', request.artifact,
        '--dir', request.downloadDir,
        ...this.repoArgs(request)
      ]);
    } catch (error) {
      throw new TransientError(`Failed to download artifact "${request.artifact}" from run ${runId}`, {
        cause: error,
        remediation: 'Check GH_TOKEN permissions (actions: read) and that the artifact has not expired'
      });
    }

    return readArtifactFile(target, request.artifact);
  }

  private async latestSuccessfulRun(request: ArtifactRequest): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner.run('gh', [
        'run', 'list',
        '--workflow', request.workflowFile,
        '--status', 'success',
        '--limit', '1',
        '--json', 'databaseId',
        ...this.repoArgs(request)
      ]));
    } catch (error) {
      if (error instanceof CommandError && !error.transient) {
        throw error;
      }
      throw new TransientError(`Failed to list runs of ${request.workflowFile}`, { cause: error });
    }

    let runs: unknown;
    try {
      runs = JSON.parse(stdout || '[]');
    } catch (error) {
      throw new TransientError(`Unexpected output listing runs of ${request.workflowFile}`, { cause: error });
    }

    const latest = Array.isArray(runs) ? runs.find(isWorkflowRun) : undefined;
    if (!latest) {
      throw new PreconditionError(`No successful run of ${request.workflowFile} found`, {
        remediation: `Run the ${request.workflowFile} workflow successfully before deploying`
      });
    }
    return latest.databaseId;
  }

  private repoArgs(request: ArtifactRequest): string[] {
    return request.repository ? ['--repo', request.repository] : [];
  }
}
