// Main entry point for the AKS deployment pipeline
export * from './types/index.js';
export * from './config/loader.js';
export * from './config/validator.js';
export * from './upstream/trigger.js';
export * from './upstream/terraform-outputs.js';
export * from './upstream/image-references.js';
export * from './upstream/artifact-source.js';
export * from './upstream/upstream-verifier.js';
export * from './provisioning/types.js';
export * from './provisioning/azure-manager.js';
export * from './provisioning/kubectl-client.js';
export * from './provisioning/secret-manager.js';
export * from './templates/template-engine.js';
export * from './templates/types.js';
export * from './orchestration/types.js';
export * from './orchestration/deployment-orchestrator.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/command-runner.js';

// Main deployment function
export { deploy, createDeploymentOrchestrator } from './orchestration/factory.js';
