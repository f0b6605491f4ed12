#!/usr/bin/env node

import { DefaultAzureCredential } from '@azure/identity';
import chalk from 'chalk';
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { createConfigLoader } from './config/loader.js';
import { loadEnvironment } from './config/environment.js';
import { createNamingService } from './config/naming.js';
import { EnvironmentKeys } from './config/types.js';
import { TerminalConsole } from './console/terminal-console.js';
import { ConfigurationError, isProvisionError } from './errors/index.js';
import { createLogger, type Logger } from './logger.js';
import { DestroyOrchestrator } from './orchestration/destroy-orchestrator.js';
import { ProvisionOrchestrator } from './orchestration/provision-orchestrator.js';
import { DeploymentStateReconciler } from './orchestration/state-reconciler.js';
import type { OrchestrationContext } from './orchestration/types.js';
import { ParameterPrompter } from './parameters/prompt.js';
import { ParameterResolver } from './parameters/resolver.js';
import { AzureControlPlane } from './provisioning/azure-control-plane.js';
import { DeploymentLookup } from './provisioning/deployment-lookup.js';
import { ArmTemplateCompiler } from './templates/compiler.js';
import { ParameterFileLoader } from './templates/parameter-file.js';

interface CommonOptions {
  environment?: string;
  cwd?: string;
  verbose?: boolean;
}

interface ProvisionCommandOptions extends CommonOptions {
  state: boolean;
}

interface DownCommandOptions extends CommonOptions {
  force?: boolean;
  purge?: boolean;
}

interface Runtime {
  logger: Logger;
  provision: ProvisionOrchestrator;
  destroy: DestroyOrchestrator;
}

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

async function createRuntime(options: CommonOptions): Promise<Runtime> {
  const logger = createLogger(options.verbose);
  const projectRoot = resolve(options.cwd ?? process.cwd());
  const project = await createConfigLoader().loadFromDirectory(projectRoot);

  const environmentName =
    options.environment ?? process.env[EnvironmentKeys.EnvironmentName] ?? project.environment?.name;
  if (!environmentName) {
    throw new ConfigurationError('No environment selected', {
      remediation: `Pass --environment, set ${EnvironmentKeys.EnvironmentName}, or set environment.name in provision.yaml`
    });
  }

  const { environment, config } = await loadEnvironment(projectRoot, environmentName);
  const context: OrchestrationContext = {
    projectRoot,
    project,
    environment,
    config,
    session: { location: environment.get(EnvironmentKeys.Location) ?? process.env[EnvironmentKeys.Location] }
  };

  const terminal = new TerminalConsole();
  const controlPlane = new AzureControlPlane(new DefaultAzureCredential(), logger);
  const compiler = new ArmTemplateCompiler(logger);
  const lookup = new DeploymentLookup(terminal, logger);
  const naming = createNamingService();

  const provision = new ProvisionOrchestrator(
    {
      compiler,
      parameterFiles: new ParameterFileLoader(logger),
      resolver: new ParameterResolver(new ParameterPrompter(terminal, controlPlane, logger), config, logger),
      reconciler: new DeploymentStateReconciler(controlPlane, lookup, logger),
      lookup,
      controlPlane,
      naming,
      console: terminal,
      logger
    },
    context
  );
  const destroy = new DestroyOrchestrator(
    { compiler, lookup, controlPlane, naming, console: terminal, logger },
    context
  );

  return { logger, provision, destroy };
}

/**
 * Runs `operation` with a signal that the first Ctrl+C aborts. A second Ctrl+C exits
 * without waiting for the cancellation to finish.
 */
async function withCancellation<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error(chalk.yellow('\nCancelling, press Ctrl+C again to exit'));
    controller.abort();
  };

  process.on('SIGINT', onInterrupt);
  try {
    return await operation(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function handleError(error: unknown, verbose: boolean | undefined): void {
  if (isProvisionError(error)) {
    console.error(chalk.red(`ERROR: ${error.message}`));
    if (error.remediation) {
      console.error(chalk.yellow(`  ${error.remediation}`));
    }
  } else {
    console.error(chalk.red('ERROR:'), error instanceof Error ? error.message : error);
  }
  if (verbose) {
    console.error(error);
  }
  process.exitCode = 1;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-e, --environment <name>', 'Name of the environment to use')
    .option('-C, --cwd <path>', 'Project directory')
    .option('-v, --verbose', 'Enable verbose logging');
}

const program = new Command();

program
  .name('infra-provision')
  .description('Provision and tear down cloud infrastructure from a declarative template')
  .version(readVersion());

withCommonOptions(program.command('provision'))
  .description('Provision the infrastructure of an environment')
  .option('--no-state', 'Deploy even if the template and parameters did not change')
  .action(async (options: ProvisionCommandOptions) => {
    try {
      const runtime = await createRuntime(options);
      const result = await withCancellation(signal => runtime.provision.provision({ force: !options.state, signal }));

      const seconds = Math.round((result.metadata.duration ?? 0) / 1000);
      if (result.status === 'skipped') {
        console.log(chalk.green(`\nSUCCESS: Nothing changed since deployment ${result.deployment.name}`));
      } else {
        console.log(chalk.green(`\nSUCCESS: Your infrastructure was provisioned in ${seconds} seconds`));
      }
      const names = Object.keys(result.outputs);
      if (names.length > 0) {
        console.log(chalk.gray(`Saved ${names.length} outputs to the environment: ${names.join(', ')}`));
      }
    } catch (error) {
      handleError(error, options.verbose);
    }
  });

withCommonOptions(program.command('preview'))
  .description('Show the changes provisioning would make')
  .action(async (options: CommonOptions) => {
    try {
      const runtime = await createRuntime(options);
      const result = await runtime.provision.preview();

      if (result.changes.length === 0) {
        console.log('No changes.');
        return;
      }
      console.log(chalk.blue(`\nResources (${result.changes.length}):`));
      for (const change of result.changes) {
        console.log(`  ${chalk.bold(change.changeType.padEnd(12))} ${change.resourceId}`);
      }
    } catch (error) {
      handleError(error, options.verbose);
    }
  });

withCommonOptions(program.command('down'))
  .description('Delete the infrastructure of an environment')
  .option('--force', 'Delete without asking for confirmation')
  .option('--purge', 'Permanently delete resources that support soft delete')
  .action(async (options: DownCommandOptions) => {
    try {
      const runtime = await createRuntime(options);
      const result = await withCancellation(signal =>
        runtime.destroy.destroy({ force: options.force, purge: options.purge, signal })
      );

      const purged = result.purges.filter(outcome => outcome.status === 'purged').length;
      console.log(
        chalk.green(
          `\nSUCCESS: Deleted ${result.deletedResourceGroups.length} resource groups and purged ${purged} resources`
        )
      );
      if (result.invalidatedEnvKeys.length > 0) {
        runtime.logger.debug(`Removed from the environment: ${result.invalidatedEnvKeys.join(', ')}`);
      }
    } catch (error) {
      handleError(error, options.verbose);
    }
  });

withCommonOptions(program.command('state'))
  .description('Show the latest deployment of an environment')
  .action(async (options: CommonOptions) => {
    try {
      const runtime = await createRuntime(options);
      const result = await runtime.provision.state();

      console.log(chalk.blue(`\nDeployment ${result.deployment.name}`));
      console.log(`  State:     ${result.deployment.provisioningState}`);
      console.log(`  Timestamp: ${result.deployment.timestamp.toISOString()}`);
      console.log(`  Resources: ${result.resourceIds.length}`);
      for (const [name, output] of Object.entries(result.outputs)) {
        const value = typeof output.value === 'string' ? output.value : JSON.stringify(output.value);
        console.log(`  ${name}=${value}`);
      }
    } catch (error) {
      handleError(error, options.verbose);
    }
  });

program.parseAsync(process.argv).catch(error => handleError(error, false));
