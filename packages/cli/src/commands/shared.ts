import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader, ScreeningClient, ValidationError } from '@bgscreen/core';

export interface ConnectionOptions {
  config?: string;
  env?: string;
  verbose?: boolean;
}

export function withConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file (default: bgscreen.yaml)')
    .option('-e, --env <environment>', 'Server environment (Production, Testing)')
    .option('-v, --verbose', 'Debug logging, including request bodies with the password masked');
}

export function createClient(options: ConnectionOptions): ScreeningClient {
  if (options.verbose) {
    process.env.LOG_VERBOSITY = '3';
  }
  const config = ConfigLoader.load({
    projectPath: process.cwd(),
    configFile: options.config,
    environment: options.env,
  });
  return new ScreeningClient({ config, credential: ConfigLoader.loadCredential() });
}

export function printFailure(error: unknown): void {
  console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
  if (error instanceof ValidationError) {
    error.issues.forEach(issue => console.error(`  ${chalk.red('•')} [${issue.path}] ${issue.message}`));
  }
}
