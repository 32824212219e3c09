import { ImageReferences, ServiceName } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

export const SERVICES: ServiceName[] = ['api', 'frontend'];

// registry[:port]/path[:tag][@sha256:digest], lowercase repository names
const IMAGE_REFERENCE_PATTERN =
  /^[a-z0-9]([a-z0-9._-]*[a-z0-9])?(:[0-9]+)?(\/[a-z0-9]([a-z0-9._-]*[a-z0-9])?)*(:[A-Za-z0-9_][A-Za-z0-9_.-]{0,127})?(@sha256:[a-f0-9]{64})?$/;

export function isValidImageReference(reference: string): boolean {
  return IMAGE_REFERENCE_PATTERN.test(reference);
}

function pick(document: Record<string, unknown>, service: ServiceName): unknown {
  return document[service] ?? document[`${service}_image`];
}

/**
 * Parse the image publish pipeline's artifact. Accepts either
 * `{ "api": ..., "frontend": ... }` or the `*_image` key form.
 */
export function parseImageReferences(content: string): ImageReferences {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('Image references artifact is not valid JSON', { cause: error });
  }
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ConfigurationError('Image references artifact must be a JSON object');
  }
  const values: Record<string, unknown> = { ...document };

  const api = pick(values, 'api');
  const frontend = pick(values, 'frontend');
  if (typeof api !== 'string' || typeof frontend !== 'string') {
    throw new ConfigurationError('Image references artifact must name both the api and frontend images');
  }
  return validateImageReferences({ api: api.trim(), frontend: frontend.trim() });
}

export function validateImageReferences(images: ImageReferences): ImageReferences {
  const invalid = SERVICES.filter(service => !isValidImageReference(images[service]));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Invalid image reference for ${invalid.map(service => `${service} ("${images[service]}")`).join(', ')}`
    );
  }
  return images;
}

/** Fallback references from config, if both services have one. */
export function fallbackImages(fallback?: Partial<Record<ServiceName, string>>): ImageReferences | undefined {
  if (!fallback?.api || !fallback.frontend) {
    return undefined;
  }
  return validateImageReferences({ api: fallback.api, frontend: fallback.frontend });
}
