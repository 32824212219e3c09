// Template-specific types
import { ServiceName } from '../types/index.js';

/** Placeholder token (e.g. `<CONTAINER_NAME>`) to replacement value. */
export type TemplateValues = Record<string, string>;

export interface RenderedManifest {
  service: ServiceName;
  file: string;
  content: string;
}

export interface ManifestResource {
  apiVersion: string;
  kind: string;
  metadata?: {
    name?: string;
    namespace?: string;
  };
}
