/**
 * Submit Command
 *
 * Sends every applicant in a YAML/JSON file as one screening batch.
 *
 * Usage:
 *   bgscreen submit --applicants applicants.yaml
 *   bgscreen submit --applicants applicants.yaml --dry-run
 */

import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { formatXml, validateApplicantsFile } from '@bgscreen/core';
import { describeIssues } from './render';
import { createClient, printFailure, type ConnectionOptions } from './shared';

interface SubmitCommandOptions extends ConnectionOptions {
  applicants: string;
  account?: string;
  postback?: string;
  dryRun?: boolean;
}

export async function submitCommand(options: SubmitCommandOptions): Promise<void> {
  console.log(chalk.bold('\nbgscreen - Submit Applicants\n'));

  const spinner = ora('Validating applicants...').start();

  try {
    const applicantsPath = path.resolve(options.applicants);
    const validation = validateApplicantsFile(applicantsPath);

    if (!validation.valid || !validation.data) {
      spinner.fail('Applicant file is invalid');
      describeIssues(options.applicants, validation.errors ?? []).forEach(line =>
        console.log(`  ${chalk.red('•')} ${line}`)
      );
      process.exit(1);
    }

    const applicants = validation.data;
    const client = createClient(options);
    const target = { account: options.account, postBackUrl: options.postback };

    if (options.dryRun) {
      const preview = await client.previewSubmission(applicants, target);
      spinner.succeed(`${applicants.length} applicant(s) ready (dry run, nothing sent)`);
      console.log(`\n${preview}\n`);
      return;
    }

    spinner.text = `Submitting ${applicants.length} applicant(s) to ${client.environment}...`;
    const response = await client.submit(applicants, target);
    spinner.succeed(`Submitted ${applicants.length} applicant(s)`);

    console.log(chalk.bold('\nVendor response:\n'));
    console.log(formatXml(response.raw));
    console.log('');
  } catch (error) {
    spinner.fail('Submission failed');
    printFailure(error);
    process.exit(1);
  }
}
