import Joi from 'joi';
import { DeploymentConfig } from '../types/index.js';
import { ConfigValidationResult } from './types.js';

const imageReference = Joi.string()
  .pattern(/^[a-z0-9][a-z0-9._\/:@-]*$/)
  .messages({
    'string.pattern.base': 'Image references must look like registry/repository:tag'
  });

// Joi schema for ApplicationConfig
const applicationConfigSchema = Joi.object({
  name: Joi.string()
    .required()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .min(1)
    .max(50)
    .messages({
      'string.pattern.base': 'Application name must contain only alphanumeric characters, hyphens, and underscores',
      'string.max': 'Application name must be no more than 50 characters long'
    })
});

// Joi schema for AzureConfig
const azureConfigSchema = Joi.object({
  credentials_env: Joi.string()
    .pattern(/^[A-Z_][A-Z0-9_]*$/)
    .default('AZURE_CREDENTIALS')
    .messages({
      'string.pattern.base': 'credentials_env must be an environment variable name'
    })
});

const infrastructureArtifactSchema = Joi.object({
  workflow: Joi.string().default('Terraform Infrastructure'),
  workflow_file: Joi.string().default('terraform-infrastructure.yaml'),
  artifact: Joi.string().default('terraform-outputs'),
  file: Joi.string().default('terraform-outputs.json'),
  download_dir: Joi.string().default('infrastructure')
});

const imageArtifactSchema = Joi.object({
  workflow: Joi.string().default('Build and publish image to Docker Hub'),
  workflow_file: Joi.string().optional(),
  artifact: Joi.string().optional(),
  file: Joi.string().default('image-references.json'),
  download_dir: Joi.string().default('images'),
  fallback: Joi.object({
    api: imageReference.optional(),
    frontend: imageReference.optional()
  }).optional()
}).and('workflow_file', 'artifact')
  .messages({
    'object.and': 'upstream.images needs both workflow_file and artifact, or neither'
  });

// Joi schema for UpstreamConfig
const upstreamConfigSchema = Joi.object({
  repository: Joi.string()
    .pattern(/^[\w.-]+\/[\w.-]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'upstream.repository must be in owner/name form'
    }),
  infrastructure: infrastructureArtifactSchema.default(),
  images: imageArtifactSchema.default()
});

// Joi schema for KubernetesConfig
const kubernetesConfigSchema = Joi.object({
  namespace: Joi.string()
    .pattern(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/)
    .max(63)
    .default('default')
    .messages({
      'string.pattern.base': 'Namespace must be a valid Kubernetes namespace name'
    }),
  manifests_dir: Joi.string().default('k8s'),
  manifests: Joi.array()
    .items(Joi.object({
      service: Joi.string().valid('api', 'frontend').required(),
      file: Joi.string().required()
    }))
    .min(1)
    .unique('service')
    .default([
      { service: 'api', file: 'backend-deployment.yaml' },
      { service: 'frontend', file: 'frontend-deployment.yaml' }
    ])
    .messages({
      'array.unique': 'Each service may only have one manifest',
      'any.only': 'Manifest service must be one of: api, frontend'
    }),
  apply_timeout_seconds: Joi.number()
    .integer()
    .min(1)
    .max(3600)
    .default(300)
    .messages({
      'number.min': 'Apply timeout must be at least 1 second',
      'number.max': 'Apply timeout must be no more than 3600 seconds'
    }),
  secret: Joi.object({
    name: Joi.string().pattern(/^[a-z0-9]([-.a-z0-9]*[a-z0-9])?$/).default('azure-storage-secret'),
    key: Joi.string().pattern(/^[-._a-zA-Z0-9]+$/).default('AZURE_STORAGE_CONNECTION_STRING')
  }).default()
});

const triggerConfigSchema = Joi.object({
  branch: Joi.string().default('main'),
  paths: Joi.array()
    .items(Joi.string())
    .min(1)
    .default(['k8s/*.yaml'])
    .messages({
      'array.min': 'triggers.paths needs at least one pattern'
    })
});

// Joi schema for DeploymentSettings
const deploymentSettingsSchema = Joi.object({
  simulate: Joi.boolean()
    .default(true)
    .messages({
      'boolean.base': 'simulate must be a boolean value'
    }),
  retry: Joi.object({
    max_attempts: Joi.number().integer().min(1).max(10).default(3),
    base_delay_ms: Joi.number().integer().min(0).default(1000),
    max_delay_ms: Joi.number().integer().min(0).default(8000)
  }).default()
});

const loggingConfigSchema = Joi.object({
  verbose: Joi.boolean().default(false),
  file: Joi.string().optional()
});

// Main DeploymentConfig schema
const deploymentConfigSchema = Joi.object({
  application: applicationConfigSchema.required(),
  azure: azureConfigSchema.default(),
  upstream: upstreamConfigSchema.default(),
  kubernetes: kubernetesConfigSchema.default(),
  triggers: triggerConfigSchema.default(),
  deployment: deploymentSettingsSchema.default(),
  logging: loggingConfigSchema.default()
}).unknown(false);

/**
 * Validates a deployment configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = deploymentConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and fills in every default.
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): DeploymentConfig {
  const { error, value } = deploymentConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false
  });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema {
  return deploymentConfigSchema;
}
