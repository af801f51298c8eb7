#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { dump as dumpYaml } from 'js-yaml';
import * as packageJson from '../package.json';
import { ProvisioningSequencer, excludeKinds, resolveSteps } from './orchestration';
import { createAzureProvider, formatCommand, ProvisioningError } from './provisioning';
import {
  ConfigValidationError,
  createConfigLoader,
  createDefaultPlan,
  DEFAULT_RESOURCE_GROUP,
  LoadedPlan,
  loadDefaultConfig,
  maskSecrets
} from './config';
import { StepKind } from './types';

interface PlanSourceOptions {
  config?: string;
  resourceGroup?: string;
}

interface ProvisionOptions extends PlanSourceOptions {
  dryRun?: boolean;
  verbose?: boolean;
  skipLogin?: boolean;
  skipExtension?: boolean;
}

/**
 * An explicit --config must exist; otherwise provision.{yml,yaml,json} in
 * the working directory, otherwise the built-in plan
 */
async function loadPlan(options: PlanSourceOptions): Promise<LoadedPlan> {
  const overrides = { resourceGroup: options.resourceGroup };

  if (options.config) {
    const plan = await createConfigLoader().load(resolve(process.cwd(), options.config), overrides);
    return { plan, source: options.config };
  }

  return loadDefaultConfig(overrides);
}

function reportError(error: unknown, verbose?: boolean): void {
  if (error instanceof ConfigValidationError && error.errors.length > 0) {
    console.error(chalk.red('❌ Invalid configuration:'));
    error.errors.forEach(message => console.error(`  - ${message}`));
  } else {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  }
  if (error instanceof ProvisioningError && error.remediation) {
    console.error(chalk.yellow(`💡 ${error.remediation}`));
  }
  if (verbose) {
    console.error(error);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('az-provision')
    .description('Provision Azure resources from an ordered plan, stopping at the first failure')
    .version(packageJson.version);

  program
    .command('provision')
    .description('Run every step of the plan in order')
    .option('-c, --config <path>', 'Path to plan file (default: provision.yml, else the built-in plan)')
    .option('-g, --resource-group <name>', 'Default resource group for every step')
    .option('-v, --verbose', 'Echo az commands and their output')
    .option('--dry-run', 'Resolve the plan without invoking az')
    .option('--skip-login', 'Reuse the current az session instead of running login steps')
    .option('--skip-extension', 'Do not run extension install steps')
    .action(async (options: ProvisionOptions) => {
      const spinner = ora('Loading provisioning plan...').start();

      try {
        const { plan: loaded, source } = await loadPlan(options);
        const skipped: StepKind[] = [];
        if (options.skipLogin) skipped.push('login');
        if (options.skipExtension) skipped.push('extension');
        const plan = excludeKinds(loaded, skipped);

        spinner.info(`Using ${source} (resource group ${chalk.cyan(plan.resource_group)}, ${plan.steps.length} steps)`);

        const sequencer = new ProvisioningSequencer(createAzureProvider({ verbose: options.verbose }), {
          onStepStart: (step, total) => {
            spinner.start(`[${step.index + 1}/${total}] ${step.label}`);
          },
          onStepComplete: (step, record) => {
            spinner.succeed(`[${step.index + 1}] ${step.label} ${chalk.gray(`(${record.duration}ms)`)}`);
          },
          onStepFailed: (step, record) => {
            spinner.fail(`[${step.index + 1}] ${step.label} (exit code ${record.exitCode})`);
          }
        });

        const result = await sequencer.run(plan, { dryRun: options.dryRun });

        if (options.dryRun) {
          console.log(chalk.blue('\n📋 Steps that would run:'));
          result.steps.forEach(step => {
            const scope = step.resourceGroup ? chalk.gray(` [${step.resourceGroup}]`) : '';
            console.log(`  ${step.index + 1}. ${step.label}${scope}`);
          });
          return;
        }

        if (result.success) {
          console.log(chalk.green('\n✅ Provisioning completed'));
          console.log(`📦 Steps run: ${result.steps.length}`);

          if (result.endpoints.length > 0) {
            console.log(chalk.blue('\n🌐 Endpoints:'));
            result.endpoints.forEach(endpoint => {
              console.log(`  ${endpoint.description}: ${chalk.underline(endpoint.value)}`);
            });
          }
        } else {
          console.log(chalk.red('\n❌ Provisioning stopped'));
          result.errors?.forEach(error => {
            console.log(`  ${error.code}: ${error.message}`);
            if (error.remediation) {
              console.log(chalk.yellow(`  💡 ${error.remediation}`));
            }
          });

          const notRun = result.steps.filter(step => step.status === 'skipped');
          if (notRun.length > 0) {
            console.log(chalk.yellow('\n⏭️  Not run:'));
            notRun.forEach(step => console.log(`  ${step.index + 1}. ${step.label}`));
          }
        }

        console.log(chalk.gray(`\n⏱️  Took ${result.metadata.duration}ms`));
        console.log(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
        process.exit(result.exitCode);
      } catch (error) {
        spinner.fail('Provisioning failed');
        reportError(error, options.verbose);
        process.exit(1);
      }
    });

  program
    .command('plan')
    .description('Print the resolved steps with secrets masked')
    .option('-c, --config <path>', 'Path to plan file')
    .option('-g, --resource-group <name>', 'Default resource group for every step')
    .option('--commands', 'Print the az command lines instead of the plan')
    .action(async (options: PlanSourceOptions & { commands?: boolean }) => {
      try {
        const { plan, source } = await loadPlan(options);
        console.log(chalk.gray(`# ${source}`));

        if (!options.commands) {
          const masked = maskSecrets(plan);
          const steps = resolveSteps(masked).map(step => ({
            step: step.index + 1,
            label: step.label,
            resource_group: step.scoped ? step.resourceGroup : undefined,
            ...step.step
          }));
          console.log(dumpYaml({ resource_group: masked.resource_group, steps }, { lineWidth: -1, skipInvalid: true }));
          return;
        }

        const provider = createAzureProvider();
        resolveSteps(plan).forEach(step => {
          try {
            provider.describe(step).forEach(command => console.log(formatCommand(command)));
          } catch (error) {
            if (!(error instanceof ProvisioningError)) throw error;
            console.log(chalk.yellow(`# ${step.label}: ${error.message}`));
          }
        });
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });

  program
    .command('validate')
    .description('Validate a plan file')
    .option('-c, --config <path>', 'Path to plan file', 'provision.yml')
    .action(async (options: { config: string }) => {
      const spinner = ora(`Validating ${options.config}...`).start();

      try {
        const plan = await createConfigLoader().load(resolve(process.cwd(), options.config));
        spinner.succeed(`${options.config} is valid (${plan.steps.length} steps)`);
      } catch (error) {
        spinner.fail('Validation failed');
        reportError(error);
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Write a starter plan file')
    .option('-g, --resource-group <name>', 'Default resource group', DEFAULT_RESOURCE_GROUP)
    .option('-o, --output <path>', 'Output plan file path', 'provision.yml')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { resourceGroup: string; output: string; force?: boolean }) => {
      const spinner = ora('Writing provisioning plan...').start();

      try {
        if (existsSync(options.output) && !options.force) {
          throw new Error(`${options.output} already exists (use --force to overwrite)`);
        }

        const yamlContent =
          `# az-provision plan\n` +
          `# Generated on ${new Date().toISOString()}\n` +
          `# Secrets are read from the environment: AZURE_CREDENTIALS, VM_PASSWORD\n\n` +
          dumpYaml(createDefaultPlan(options.resourceGroup), { lineWidth: -1 });

        writeFileSync(options.output, yamlContent);

        spinner.succeed(`Plan written: ${options.output}`);
        console.log(chalk.green('\n✅ Next steps:'));
        console.log('1. Review the steps and locations');
        console.log('2. Export AZURE_CREDENTIALS and VM_PASSWORD');
        console.log(`3. Run: ${chalk.cyan('az-provision provision')}`);
      } catch (error) {
        spinner.fail('Initialization failed');
        reportError(error);
        process.exit(1);
      }
    });

  program
    .command('destroy')
    .description('Delete a resource group and everything in it')
    .requiredOption('-g, --resource-group <name>', 'Resource group to delete')
    .option('-y, --yes', 'Confirm the deletion')
    .option('--no-wait', 'Return without waiting for the deletion to finish')
    .option('-v, --verbose', 'Echo az commands and their output')
    .action(async (options: { resourceGroup: string; yes?: boolean; wait: boolean; verbose?: boolean }) => {
      if (!options.yes) {
        console.error(chalk.yellow(`⚠️  This deletes ${options.resourceGroup} and all of its resources. Re-run with --yes to confirm.`));
        process.exit(1);
        return;
      }

      const spinner = ora(`Deleting resource group ${options.resourceGroup}...`).start();

      try {
        await createAzureProvider({ verbose: options.verbose }).resourceGroups.delete(options.resourceGroup, options.wait);
        spinner.succeed(options.wait ? `Deleted ${options.resourceGroup}` : `Deletion of ${options.resourceGroup} started`);
      } catch (error) {
        spinner.fail('Destroy failed');
        reportError(error, options.verbose);
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  const program = createProgram();

  program.on('command:*', () => {
    console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
    process.exit(1);
  });

  program.parseAsync().catch((error: unknown) => {
    reportError(error);
    process.exit(1);
  });
}
