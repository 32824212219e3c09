import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { loadAll } from 'js-yaml';
import { ImageReferences, ManifestConfig, UpstreamOutputs } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { ManifestResource, RenderedManifest, TemplateValues } from './types.js';

export const TOKENS = {
  containerName: '<CONTAINER_NAME>',
  storageAccountName: '<STORAGE_ACCOUNT_NAME>',
  apiImage: '<API_IMAGE>',
  frontendImage: '<FRONTEND_IMAGE>'
} as const;

const TOKEN_PATTERN = /<[A-Z][A-Z0-9_]*>/g;

function isManifestResource(value: unknown): value is ManifestResource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'apiVersion' in value &&
    'kind' in value &&
    typeof value.apiVersion === 'string' &&
    typeof value.kind === 'string'
  );
}

/**
 * Materializes manifest templates: literal, global replacement of every
 * placeholder token, then a check that nothing token-shaped is left.
 */
export class TemplateEngine {
  buildValues(outputs: UpstreamOutputs, images?: ImageReferences): TemplateValues {
    const values: TemplateValues = {
      [TOKENS.containerName]: outputs.containerName,
      [TOKENS.storageAccountName]: outputs.storageAccountName
    };
    if (images) {
      values[TOKENS.apiImage] = images.api;
      values[TOKENS.frontendImage] = images.frontend;
    }
    return values;
  }

  /** Replaces every occurrence of every token. No regex semantics in values. */
  render(template: string, values: TemplateValues): string {
    let rendered = template;
    for (const [token, value] of Object.entries(values)) {
      rendered = rendered.split(token).join(value);
    }
    return rendered;
  }

  findUnresolvedTokens(content: string): string[] {
    return Array.from(new Set(content.match(TOKEN_PATTERN) ?? []));
  }

  validateManifest(content: string, source: string): ManifestResource[] {
    const unresolved = this.findUnresolvedTokens(content);
    if (unresolved.length > 0) {
      throw new ConfigurationError(`${source} still contains placeholder tokens: ${unresolved.join(', ')}`, {
        remediation: 'Every placeholder in a manifest template must have a value from the upstream outputs'
      });
    }

    let documents: unknown[];
    try {
      documents = loadAll(content);
    } catch (error) {
      throw new ConfigurationError(`${source} is not valid YAML: ${errorMessage(error)}`, { cause: error });
    }

    const resources = documents.filter(document => document !== null && document !== undefined);
    if (resources.length === 0) {
      throw new ConfigurationError(`${source} contains no Kubernetes resources`);
    }
    const invalid = resources.findIndex(document => !isManifestResource(document));
    if (invalid !== -1) {
      throw new ConfigurationError(`${source} document ${invalid + 1} is missing apiVersion or kind`);
    }
    return resources.filter(isManifestResource);
  }

  async renderFile(path: string, values: TemplateValues): Promise<string> {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Manifest template not found: ${path}`);
    }
    const template = await readFile(path, 'utf-8');
    const rendered = this.render(template, values);
    this.validateManifest(rendered, path);
    return rendered;
  }

  /** Renders the configured manifests, preserving their order. */
  async renderManifests(
    manifestsDir: string,
    manifests: ManifestConfig[],
    values: TemplateValues
  ): Promise<RenderedManifest[]> {
    const rendered: RenderedManifest[] = [];
    for (const manifest of manifests) {
      const content = await this.renderFile(join(manifestsDir, manifest.file), values);
      rendered.push({ service: manifest.service, file: manifest.file, content });
    }
    return rendered;
  }
}
