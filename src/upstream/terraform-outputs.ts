import { UpstreamOutputs } from '../types/index.js';
import { ConfigurationError, PreconditionError } from '../utils/errors.js';

/** Artifact key for each output field. */
export const OUTPUT_KEYS: Record<keyof UpstreamOutputs, string> = {
  aksClusterName: 'aks_cluster_name',
  containerName: 'container_name',
  resourceGroupName: 'resource_group_name',
  storageAccountName: 'storage_account_name'
};

const OUTPUT_FIELDS: Array<keyof UpstreamOutputs> = [
  'aksClusterName',
  'containerName',
  'resourceGroupName',
  'storageAccountName'
];

function readValue(document: Record<string, unknown>, key: string): string {
  const record = document[key];
  if (typeof record !== 'object' || record === null || !('value' in record)) {
    return '';
  }
  const value: unknown = record.value;
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

/**
 * Parse a `terraform output -json` document. Missing or non-scalar values
 * come back as empty strings; `requireOutputs` decides whether that is fatal.
 */
export function parseTerraformOutputs(content: string): UpstreamOutputs {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('Infrastructure outputs artifact is not valid JSON', {
      cause: error,
      remediation: 'Check that the infrastructure pipeline uploads the output of `terraform output -json`'
    });
  }

  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ConfigurationError('Infrastructure outputs artifact must be a JSON object');
  }
  const outputs: Record<string, unknown> = { ...document };

  return {
    aksClusterName: readValue(outputs, OUTPUT_KEYS.aksClusterName),
    containerName: readValue(outputs, OUTPUT_KEYS.containerName),
    resourceGroupName: readValue(outputs, OUTPUT_KEYS.resourceGroupName),
    storageAccountName: readValue(outputs, OUTPUT_KEYS.storageAccountName)
  };
}

export function missingOutputs(outputs: UpstreamOutputs): string[] {
  return OUTPUT_FIELDS
    .filter(field => outputs[field].length === 0)
    .map(field => OUTPUT_KEYS[field]);
}

export function requireOutputs(outputs: UpstreamOutputs): UpstreamOutputs {
  const missing = missingOutputs(outputs);
  if (missing.length > 0) {
    throw new PreconditionError(`Infrastructure outputs missing or empty: ${missing.join(', ')}`, {
      remediation: 'Re-run the infrastructure pipeline and confirm it exports every required output'
    });
  }
  return outputs;
}
