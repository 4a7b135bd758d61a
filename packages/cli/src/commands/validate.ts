/**
 * Validate Command
 *
 * Checks an applicant file (and the config file, when present) without
 * contacting the vendor.
 *
 * Usage:
 *   bgscreen validate --applicants applicants.yaml
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, validateApplicantsFile, validateConfigFile } from '@bgscreen/core';
import { describeIssues } from './render';

interface ValidateCommandOptions {
  applicants: string;
  config?: string;
}

export async function validateCommand(options: ValidateCommandOptions): Promise<void> {
  console.log(chalk.bold('\nbgscreen - Validate\n'));

  const errors: string[] = [];

  const configFile = options.config ?? DEFAULT_CONFIG_FILE;
  const configPath = path.resolve(configFile);
  if (fs.existsSync(configPath)) {
    const configResult = validateConfigFile(configPath);
    if (configResult.valid && configResult.data) {
      console.log(chalk.green(`  ✓ ${configFile} (environment: ${configResult.data.environment})`));
    } else {
      console.log(chalk.red(`  ✗ ${configFile} - VALIDATION FAILED`));
      errors.push(...describeIssues(configFile, configResult.errors ?? []));
    }
  } else {
    console.log(chalk.dim(`  - ${configFile} not found (environment variables only)`));
  }

  const applicantsResult = validateApplicantsFile(path.resolve(options.applicants));
  if (applicantsResult.valid && applicantsResult.data) {
    console.log(chalk.green(`  ✓ ${options.applicants} (${applicantsResult.data.length} applicants)`));
  } else {
    console.log(chalk.red(`  ✗ ${options.applicants} - VALIDATION FAILED`));
    errors.push(...describeIssues(options.applicants, applicantsResult.errors ?? []));
  }

  if (errors.length > 0) {
    console.log(chalk.red(`\n✗  Errors (${errors.length}):`));
    errors.forEach(e => console.log(`   ${e}`));
    process.exit(1);
  }

  console.log(chalk.green('\n✓ VALIDATION PASSED\n'));
}
