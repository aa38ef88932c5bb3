#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as packageJson from '../package.json';
import { preflight } from './config/environment';
import { loadPlan } from './config/loader';
import { ConfigurationError, errorMessage } from './errors';
import { Logger, createLogger } from './logging/logger';
import { DependencyGraph } from './orchestration/dependency-graph';
import { DeploymentOrchestrator } from './orchestration/deployment-orchestrator';
import { StatusReport, TeardownResult } from './orchestration/types';
import { KubernetesManager } from './provisioning/kubernetes-manager';
import { VaultManager } from './provisioning/vault-manager';
import { DeploymentResult, PhaseStatus, PlatformPlan } from './types';

const EXIT_SUCCESS = 0;
const EXIT_FATAL = 1;
const EXIT_CONFIGURATION = 2;

interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

interface DeployCommandOptions extends CommonOptions {
  dryRun?: boolean;
  watch?: boolean;
}

interface CleanupCommandOptions extends CommonOptions {
  force?: boolean;
}

const STATUS_COLOURS: Record<PhaseStatus, (text: string) => string> = {
  Pending: chalk.gray,
  Applying: chalk.blue,
  Waiting: chalk.blue,
  Succeeded: chalk.green,
  Failed: chalk.yellow,
  Skipped: chalk.gray,
  Fatal: chalk.red
};

/**
 * Abort controller tied to SIGINT and SIGTERM
 */
function cancellationSignal(logger: Logger): AbortSignal {
  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping`);
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  return controller.signal;
}

/**
 * Load and validate the plan and the environment, with a spinner. Any
 * configuration or pre-flight problem ends the process with exit code 2.
 */
async function prepare(options: CommonOptions, logger: Logger) {
  const spinner = ora('Validating configuration...').start();
  try {
    const plan = await loadPlan(options.config);
    const environment = preflight(plan);
    spinner.succeed(`Configuration valid: ${plan.phases.length} phase(s) for ${plan.platform.name}`);

    const orchestrator = new DeploymentOrchestrator({
      platform: new KubernetesManager(environment.kubeConfig),
      secrets: environment.secrets ? new VaultManager(environment.secrets) : undefined,
      logger
    });
    return { plan, orchestrator };
  } catch (error) {
    spinner.fail('Configuration invalid');
    reportConfigurationError(error);
    process.exit(error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FATAL);
  }
}

function reportConfigurationError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`\n❌ ${error.message.split('\n')[0]}`));
    for (const issue of error.issues) {
      console.error(`  ${chalk.bold(issue.location)}: ${issue.message}`);
    }
    return;
  }
  console.error(chalk.red('❌ Error:'), errorMessage(error));
}

function printOrder(plan: PlatformPlan, order: string[]): void {
  console.log(chalk.blue('\n📋 Execution order:'));
  order.forEach((name, index) => {
    const phase = plan.phases.find(item => item.name === name);
    const deps = phase && phase.dependsOn.length > 0 ? chalk.gray(` (after ${phase.dependsOn.join(', ')})`) : '';
    const kind = phase?.secrets ? chalk.magenta(' [secrets]') : phase?.gitops ? chalk.cyan(' [gitops]') : '';
    console.log(`  ${index + 1}. ${name}${kind}${deps}: ${phase?.resources.length ?? 0} resource(s), ${phase?.healthChecks.length ?? 0} check(s)`);
  });
}

function printDeployment(result: DeploymentResult): void {
  console.log(chalk.blue('\n📦 Phases:'));
  for (const state of result.states) {
    const phase = result.phases.find(item => item.phase === state.phaseName);
    const duration = phase ? chalk.gray(` ${phase.durationMs}ms`) : '';
    console.log(`  ${STATUS_COLOURS[state.status](state.status.padEnd(9))} ${state.phaseName}${duration}`);
    if (state.lastError && state.status !== 'Succeeded') {
      console.log(chalk.gray(`            ${state.lastError}`));
    }
    for (const warning of phase?.warnings ?? []) {
      console.log(chalk.yellow(`            ⚠ ${warning}`));
    }
  }

  if (result.errors.length > 0) {
    console.log(chalk.red('\n❌ Errors:'));
    for (const error of result.errors) {
      console.log(`  ${error.code}: ${error.message}`);
      if (error.remediation) {
        console.log(chalk.yellow(`  💡 ${error.remediation}`));
      }
    }
  }

  console.log(chalk.gray(`\n⏱️  Run took ${result.metadata.duration ?? 0}ms`));
  console.log(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
}

function printStatus(report: StatusReport): void {
  console.log(chalk.blue(`\n📊 ${report.platform}`));
  for (const phase of report.phases) {
    const { state } = phase;
    console.log(`  ${STATUS_COLOURS[state.status](state.status.padEnd(9))} ${state.phaseName}`);
    if (state.lastError) {
      console.log(chalk.gray(`            ${state.lastError}`));
    }
    for (const warning of phase.warnings) {
      console.log(chalk.yellow(`            ⚠ ${warning}`));
    }
  }
}

function printTeardown(result: TeardownResult): void {
  console.log(`  🗑️  ${result.deleted.length} deleted, ${result.absent.length} already absent`);
  for (const failure of result.failed) {
    console.log(chalk.red(`  ✖ ${failure.identity} (${failure.phase}): ${failure.error}`));
  }
}

const program = new Command();

program
  .name('platformctl')
  .description('Deploy a multi-service platform onto Kubernetes in dependency order')
  .version(packageJson.version);

program
  .command('deploy')
  .description('Run every phase in dependency order')
  .option('-c, --config <path>', 'Path to configuration file (default: platform.yml)')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--dry-run', 'Validate and print the execution order without touching the cluster')
  .option('--watch', 'Keep reconciling drift after the rollout until interrupted')
  .action(async (options: DeployCommandOptions) => {
    const logger = createLogger(options.verbose || undefined);
    const { plan, orchestrator } = await prepare(options, logger);
    const graph = orchestrator.plan(plan);
    printOrder(plan, graph.order.map(phase => phase.name));

    if (options.dryRun) {
      console.log(chalk.green('\n✅ Dry run completed - nothing was applied'));
      process.exit(EXIT_SUCCESS);
    }

    const signal = cancellationSignal(logger);
    try {
      const result = await orchestrator.deploy(plan, { signal });
      printDeployment(result);

      if (result.success && options.watch && !signal.aborted) {
        await orchestrator.createReconciler(plan).run(signal);
      }

      console.log(result.success ? chalk.green('\n✅ Deployment completed') : chalk.red('\n❌ Deployment failed'));
      process.exit(result.exitCode);
    } catch (error) {
      reportConfigurationError(error);
      process.exit(error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FATAL);
    }
  });

program
  .command('status')
  .description('Report each phase from the live state of the cluster')
  .option('-c, --config <path>', 'Path to configuration file (default: platform.yml)')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions) => {
    const logger = createLogger(options.verbose || undefined);
    const { plan, orchestrator } = await prepare(options, logger);
    const spinner = ora('Inspecting live state...').start();
    try {
      const report = await orchestrator.inspect(plan);
      if (report.exitCode === EXIT_SUCCESS) {
        spinner.succeed('Status check completed');
      } else {
        spinner.fail('One or more phases are Fatal');
      }
      printStatus(report);
      process.exit(report.exitCode);
    } catch (error) {
      spinner.fail('Status check failed');
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(EXIT_FATAL);
    }
  });

program
  .command('cleanup')
  .description('Delete every declared resource in reverse dependency order')
  .option('-c, --config <path>', 'Path to configuration file (default: platform.yml)')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-f, --force', 'Skip the confirmation delay')
  .action(async (options: CleanupCommandOptions) => {
    const logger = createLogger(options.verbose || undefined);
    const { plan, orchestrator } = await prepare(options, logger);
    const signal = cancellationSignal(logger);

    if (!options.force) {
      console.log(chalk.yellow(`⚠️  Removing ${plan.platform.name} in 5 seconds, press Ctrl+C to abort`));
      await new Promise(resolve => setTimeout(resolve, 5000));
      if (signal.aborted) {
        process.exit(EXIT_FATAL);
      }
    }

    const spinner = ora('Tearing down...').start();
    try {
      const result = await orchestrator.cleanup(plan, { signal });
      if (result.failed.length === 0) {
        spinner.succeed('Cleanup completed');
      } else {
        spinner.warn('Cleanup completed with errors');
      }
      printTeardown(result);
      process.exit(result.failed.length === 0 ? EXIT_SUCCESS : EXIT_FATAL);
    } catch (error) {
      spinner.fail('Cleanup failed');
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(EXIT_FATAL);
    }
  });

program
  .command('validate')
  .description('Validate the configuration and the phase graph')
  .option('-c, --config <path>', 'Path to configuration file (default: platform.yml)')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Validating configuration...').start();
    try {
      const plan = await loadPlan(options.config);
      spinner.succeed(`Configuration valid: ${plan.phases.length} phase(s)`);
      printOrder(plan, DependencyGraph.build(plan.phases).order.map(phase => phase.name));
      process.exit(EXIT_SUCCESS);
    } catch (error) {
      spinner.fail('Configuration invalid');
      reportConfigurationError(error);
      process.exit(error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FATAL);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(EXIT_CONFIGURATION);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  process.exit(EXIT_FATAL);
});
