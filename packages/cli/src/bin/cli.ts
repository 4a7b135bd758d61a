#!/usr/bin/env node

/**
 * bgscreen CLI
 *
 * Usage:
 *   bgscreen submit -a <file>          Submit a batch of applicants
 *   bgscreen status <fileNo...>        Poll report status
 *   bgscreen download <fileNo...>      Download completed report PDFs
 *   bgscreen validate -a <file>        Validate applicant and config files
 *   bgscreen format <file>             Pretty-print an XML file
 */

import { Command } from 'commander';
import { submitCommand } from '../commands/submit';
import { statusCommand } from '../commands/status';
import { downloadCommand } from '../commands/download';
import { validateCommand } from '../commands/validate';
import { formatCommand } from '../commands/format';
import { withConnectionOptions } from '../commands/shared';

const program = new Command();

program
  .name('bgscreen')
  .description('Submit, track and download background screening reports')
  .version('1.0.0');

// bgscreen submit --applicants <file>
withConnectionOptions(
  program
    .command('submit')
    .description('Submit every applicant in a YAML/JSON file as one batch')
    .requiredOption('-a, --applicants <file>', 'Applicant file (list, or { applicants: [...] })')
    .option('--account <account>', 'Six-character account number (default: from config)')
    .option('--postback <url>', 'Post-back URL for completion notices (default: from config)')
    .option('--dry-run', 'Print the request body with the password masked, send nothing')
).action(async options => {
  await submitCommand(options);
});

// bgscreen status <fileNo...>
withConnectionOptions(
  program.command('status <fileNumbers...>').description('Fetch the status of filed reports')
).action(async (fileNumbers: string[], options) => {
  await statusCommand(fileNumbers, options);
});

// bgscreen download <fileNo...>
withConnectionOptions(
  program
    .command('download <fileNumbers...>')
    .description('Download report PDFs as <output>/<fileNo>.pdf')
    .option('-o, --output <directory>', 'Output directory (default: from config)')
).action(async (fileNumbers: string[], options) => {
  await downloadCommand(fileNumbers, options);
});

// bgscreen validate --applicants <file>
program
  .command('validate')
  .description('Validate an applicant file and the config file')
  .requiredOption('-a, --applicants <file>', 'Applicant file to validate')
  .option('-c, --config <file>', 'Config file to validate (default: bgscreen.yaml)')
  .action(async options => {
    await validateCommand(options);
  });

// bgscreen format <file>
program
  .command('format <file>')
  .description('Pretty-print an XML file')
  .action(async (file: string) => {
    await formatCommand(file);
  });

program.parseAsync().catch(error => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
