#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { createConfigLoader, loadDefaultConfig } from './config/loader.js';
import { createDeploymentOrchestrator } from './orchestration/factory.js';
import { TemplateEngine } from './templates/template-engine.js';
import { DeploymentConfig, DeploymentResult } from './types/index.js';
import { loadTriggerEvent } from './upstream/trigger.js';
import { parseTerraformOutputs, requireOutputs } from './upstream/terraform-outputs.js';
import { fallbackImages, parseImageReferences } from './upstream/image-references.js';
import { errorMessage } from './utils/errors.js';
import { Logger, createLogger } from './utils/logger.js';

interface PackageInfo {
  version?: string;
}

function readPackageInfo(): PackageInfo {
  try {
    const parsed: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
      ? { version: parsed.version }
      : {};
  } catch {
    return {};
  }
}

async function loadConfig(path?: string): Promise<DeploymentConfig> {
  const config = path
    ? await createConfigLoader().load(resolve(process.cwd(), path))
    : await loadDefaultConfig();

  if (!config.upstream.repository && process.env.GITHUB_REPOSITORY) {
    config.upstream.repository = process.env.GITHUB_REPOSITORY;
  }
  return config;
}

function printResult(result: DeploymentResult): void {
  if (result.skipped) {
    console.log(chalk.gray('\n⏭️  Nothing to deploy for this trigger'));
    return;
  }

  if (result.success) {
    console.log(chalk.green(`\n✅ ${result.simulated ? 'Simulation' : 'Deployment'} Results:`));
    for (const entry of result.applied) {
      console.log(`📦 ${entry.service} (${entry.file})`);
      entry.resources.forEach(resource => console.log(`    ${resource.resource} ${resource.action}`));
    }
    if (result.secret) {
      console.log(`🔐 Secret ${result.secret.name}: ${result.secret.action ?? 'present'}`);
    }
  } else if (result.errors) {
    console.log(chalk.red('\n❌ Errors:'));
    result.errors.forEach(error => {
      console.log(`  ${error.code}: ${error.message}`);
      if (error.remediation) {
        console.log(chalk.yellow(`  💡 ${error.remediation}`));
      }
    });
    const partial = result.applied.map(entry => entry.file);
    if (partial.length > 0) {
      console.log(chalk.yellow(`  Applied before the failure: ${partial.join(', ')}`));
    }
  }

  console.log(chalk.gray(`\n⏱️  Took ${result.metadata.duration}ms`));
  console.log(chalk.gray(`🆔 Deployment ID: ${result.metadata.deploymentId}`));
}

const program = new Command();

program
  .name('aks-deploy')
  .description('Deploy the application to Azure Kubernetes Service once its upstream pipelines succeed')
  .version(readPackageInfo().version ?? '0.0.0');

program
  .command('deploy')
  .description('Verify upstream pipelines, then deploy the manifests to the cluster')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--event-name <name>', 'CI event name (defaults to GITHUB_EVENT_NAME)')
  .option('--event-path <path>', 'CI event payload file (defaults to GITHUB_EVENT_PATH)')
  .option('--simulate', 'Validate everything but skip applying manifests (manual triggers only)')
  .option('--no-simulate', 'Apply manifests even on a manual trigger')
  .option('--outputs-file <path>', 'Use a local infrastructure outputs file instead of downloading it')
  .option('--images-file <path>', 'Use a local image references file instead of downloading it')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--log-file <path>', 'Also write JSON logs to this file')
  .action(async (options) => {
    const spinner = ora('Loading deployment configuration...').start();
    let logger: Logger | undefined;

    try {
      const config = await loadConfig(options.config);
      logger = createLogger({
        verbose: Boolean(options.verbose) || config.logging.verbose,
        file: options.logFile ?? config.logging.file
      });
      const eventName: string = options.eventName ?? process.env.GITHUB_EVENT_NAME ?? 'workflow_dispatch';
      const event = await loadTriggerEvent(eventName, options.eventPath ?? process.env.GITHUB_EVENT_PATH);
      spinner.succeed(`Configuration loaded for ${config.application.name}`);

      logger.startExecution(`deploy (${eventName})`);
      const orchestrator = createDeploymentOrchestrator(config, {
        logger,
        outputsFile: options.outputsFile,
        imagesFile: options.imagesFile
      });
      const result = await orchestrator.deploy({ event, simulate: options.simulate });

      printResult(result);
      if (!result.success) {
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Deployment failed');
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      if (options.verbose) {
        console.error(error);
      }
      process.exitCode = 1;
    } finally {
      // flush the JSON log before the process exits
      await logger?.close();
    }
  });

program
  .command('verify-upstream')
  .description('Check both upstream pipelines and print what they produced')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--event-name <name>', 'CI event name (defaults to GITHUB_EVENT_NAME)')
  .option('--event-path <path>', 'CI event payload file (defaults to GITHUB_EVENT_PATH)')
  .option('--outputs-file <path>', 'Use a local infrastructure outputs file')
  .option('--images-file <path>', 'Use a local image references file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options) => {
    const spinner = ora('Verifying upstream pipelines...').start();

    try {
      const config = await loadConfig(options.config);
      const logger = createLogger({ verbose: Boolean(options.verbose), silent: !options.verbose });
      const event = await loadTriggerEvent(
        options.eventName ?? process.env.GITHUB_EVENT_NAME ?? 'workflow_dispatch',
        options.eventPath ?? process.env.GITHUB_EVENT_PATH
      );

      const verified = await createDeploymentOrchestrator(config, {
        logger,
        outputsFile: options.outputsFile,
        imagesFile: options.imagesFile
      }).verifyUpstream({ event });

      if (!verified) {
        spinner.info('This trigger does not start a deployment');
        return;
      }
      spinner.succeed('Upstream pipelines verified');
      console.log(JSON.stringify(verified, null, 2));
    } catch (error) {
      spinner.fail('Upstream verification failed');
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('render')
  .description('Substitute upstream values into the manifest templates without touching the cluster')
  .requiredOption('--outputs-file <path>', 'Infrastructure outputs file (terraform output -json)')
  .option('--images-file <path>', 'Image references file')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-o, --out-dir <path>', 'Write rendered manifests here instead of stdout')
  .action(async (options) => {
    try {
      const config = await loadConfig(options.config);
      const outputs = requireOutputs(parseTerraformOutputs(await readFile(options.outputsFile, 'utf-8')));
      const images = options.imagesFile
        ? parseImageReferences(await readFile(options.imagesFile, 'utf-8'))
        : fallbackImages(config.upstream.images.fallback);

      const engine = new TemplateEngine();
      const manifests = await engine.renderManifests(
        config.kubernetes.manifests_dir,
        config.kubernetes.manifests,
        engine.buildValues(outputs, images)
      );

      if (options.outDir) {
        mkdirSync(options.outDir, { recursive: true });
        for (const manifest of manifests) {
          writeFileSync(join(options.outDir, manifest.file), manifest.content);
          console.log(chalk.green(`✓ ${join(options.outDir, manifest.file)}`));
        }
      } else {
        console.log(manifests.map(manifest => manifest.content.trimEnd()).join('\n---\n'));
      }
    } catch (error) {
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('init')
  .description('Initialize a new deployment configuration')
  .option('-n, --name <name>', 'Application name', 'my-app')
  .option('-o, --output <path>', 'Output configuration file path', 'deploy.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options) => {
    const spinner = ora('Initializing deployment configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists (use --force to overwrite)`);
      }

      const yamlContent = `# AKS deployment configuration
# Generated on ${new Date().toISOString()}

application:
  name: ${options.name}

azure:
  # Environment variable holding the service principal JSON
  credentials_env: AZURE_CREDENTIALS

upstream:
  infrastructure:
    workflow: Terraform Infrastructure
    workflow_file: terraform-infrastructure.yaml
    artifact: terraform-outputs
    file: terraform-outputs.json
  images:
    workflow: Build and publish image to Docker Hub
    # workflow_file: docker-publish.yaml
    # artifact: image-references
    fallback:
      api: example/${options.name}-api:latest
      frontend: example/${options.name}-frontend:latest

kubernetes:
  namespace: default
  manifests_dir: k8s
  manifests:
    - service: api
      file: backend-deployment.yaml
    - service: frontend
      file: frontend-deployment.yaml
  apply_timeout_seconds: 300
  secret:
    name: azure-storage-secret
    key: AZURE_STORAGE_CONNECTION_STRING

triggers:
  branch: main
  paths:
    - k8s/*.yaml

deployment:
  # Manual runs only apply manifests when this (or the dispatch input) is false
  simulate: true
  retry:
    max_attempts: 3
    base_delay_ms: 1000
`;

      writeFileSync(options.output, yamlContent);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file');
      console.log('2. Store the service principal JSON in the AZURE_CREDENTIALS secret');
      console.log(`3. Run: ${chalk.cyan('aks-deploy deploy --simulate')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  process.exit(1);
});
