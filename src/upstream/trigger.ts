import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { DeploymentConfig, TriggerDecision, TriggerEvent } from '../types/index.js';
import { ConfigurationError, PreconditionError } from '../utils/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) {
    return undefined;
  }
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Files added, modified or removed by the commits of a push. Undefined when
 * the payload carries no commit list.
 */
function changedFiles(payload: unknown): string[] | undefined {
  const commits = isRecord(payload) ? payload.commits : undefined;
  if (!Array.isArray(commits)) {
    return undefined;
  }
  const files = new Set<string>();
  for (const commit of commits) {
    if (!isRecord(commit)) {
      continue;
    }
    for (const key of ['added', 'modified', 'removed']) {
      const entries = commit[key];
      if (Array.isArray(entries)) {
        entries.filter((entry): entry is string => typeof entry === 'string').forEach(entry => files.add(entry));
      }
    }
  }
  return Array.from(files);
}

/**
 * Build a trigger from the CI event name and its JSON payload
 * (GITHUB_EVENT_NAME / GITHUB_EVENT_PATH).
 */
export function parseTriggerEvent(eventName: string, payload: unknown): TriggerEvent {
  switch (eventName) {
    case 'workflow_dispatch': {
      const inputs = isRecord(payload) ? payload.inputs : undefined;
      return {
        kind: 'manual',
        simulateInput: isRecord(inputs) ? inputs.simulate_deployment : undefined
      };
    }

    case 'workflow_run': {
      const run = isRecord(payload) ? payload.workflow_run : undefined;
      const id = isRecord(run) && typeof run.id === 'number' ? run.id : undefined;
      return {
        kind: 'upstream',
        workflow: stringField(run, 'name') ?? '',
        conclusion: stringField(run, 'conclusion') ?? '',
        runId: id
      };
    }

    case 'push':
      return { kind: 'push', ref: stringField(payload, 'ref') ?? '', changedFiles: changedFiles(payload) };

    case 'pull_request': {
      const pullRequest = isRecord(payload) ? payload.pull_request : undefined;
      const base = isRecord(pullRequest) ? pullRequest.base : undefined;
      return { kind: 'pull_request', baseRef: stringField(base, 'ref') ?? '' };
    }

    default:
      return { kind: 'unsupported', eventName };
  }
}

/**
 * Read the event payload file and build the trigger. A missing path gives
 * an empty payload, which for a manual run means every input takes its
 * default.
 */
export async function loadTriggerEvent(eventName: string, eventPath?: string): Promise<TriggerEvent> {
  if (!eventPath || !existsSync(eventPath)) {
    return parseTriggerEvent(eventName, {});
  }
  const content = await readFile(eventPath, 'utf-8');
  try {
    return parseTriggerEvent(eventName, JSON.parse(content));
  } catch (error) {
    throw new ConfigurationError(`Event payload ${eventPath} is not valid JSON`, { cause: error });
  }
}

/**
 * Resolve the manual `simulate_deployment` input. The CI provider may hand
 * it over as a boolean or as its string form; both are accepted, nothing
 * else is.
 */
export function parseSimulateInput(value: unknown, defaultValue: boolean): boolean {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  throw new ConfigurationError(`Invalid simulate_deployment input: ${JSON.stringify(value)}`, {
    remediation: 'Pass true or false'
  });
}

function matchesBranch(ref: string, branch: string): boolean {
  return ref === branch || ref === `refs/heads/${branch}`;
}

// `**` spans directories, `*` and `?` stay within one path segment
function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*' && pattern[i + 1] === '*') {
      if (pattern[i + 2] === '/') {
        source += '(?:.*/)?';
        i += 2;
      } else {
        source += '.*';
        i++;
      }
    } else if (char === '*') {
      source += '[^/]*';
    } else if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function matchesAnyPath(files: string[], patterns: string[]): boolean {
  const matchers = patterns.map(globToRegExp);
  return files.some(file => matchers.some(matcher => matcher.test(file)));
}

/**
 * Decide whether a trigger should run the pipeline and whether it runs in
 * simulation. Only manual runs can simulate. A completed upstream run that
 * did not succeed is a precondition failure.
 */
export function evaluateTrigger(
  event: TriggerEvent,
  config: Pick<DeploymentConfig, 'upstream' | 'triggers' | 'deployment'>
): TriggerDecision {
  switch (event.kind) {
    case 'manual': {
      const simulate = parseSimulateInput(event.simulateInput, config.deployment.simulate);
      return {
        run: true,
        simulate,
        reason: simulate ? 'manual trigger (simulation)' : 'manual trigger'
      };
    }

    case 'upstream': {
      const known = [config.upstream.infrastructure.workflow, config.upstream.images.workflow];
      if (!known.includes(event.workflow)) {
        return { run: false, simulate: false, reason: `workflow "${event.workflow}" is not an upstream of this deployment` };
      }
      if (event.conclusion !== 'success') {
        throw new PreconditionError(
          `Upstream workflow "${event.workflow}" concluded with "${event.conclusion || 'unknown'}"`,
          { remediation: `Fix and re-run "${event.workflow}" before deploying` }
        );
      }
      return { run: true, simulate: false, reason: `upstream workflow "${event.workflow}" succeeded` };
    }

    case 'push': {
      if (!matchesBranch(event.ref, config.triggers.branch)) {
        return { run: false, simulate: false, reason: `push to ${event.ref || 'unknown ref'} ignored` };
      }
      const { paths } = config.triggers;
      if (event.changedFiles && !matchesAnyPath(event.changedFiles, paths)) {
        return {
          run: false,
          simulate: false,
          reason: `push to ${config.triggers.branch} touches no file matching ${paths.join(', ')}`
        };
      }
      return { run: true, simulate: false, reason: `push to ${config.triggers.branch}` };
    }

    case 'pull_request':
      return matchesBranch(event.baseRef, config.triggers.branch)
        ? { run: true, simulate: false, reason: `pull request into ${config.triggers.branch}` }
        : { run: false, simulate: false, reason: `pull request into ${event.baseRef || 'unknown branch'} ignored` };

    case 'unsupported':
      return { run: false, simulate: false, reason: `event "${event.eventName}" does not trigger deployments` };
  }
}
