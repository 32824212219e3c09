// Configuration-specific types
import { DeploymentConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<DeploymentConfig>;
  validate(config: unknown): ConfigValidationResult;
}
