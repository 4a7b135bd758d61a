/**
 * Download Command
 *
 * Usage:
 *   bgscreen download 100234 100235
 *   bgscreen download 100234 --output ./pdfs
 */

import chalk from 'chalk';
import ora from 'ora';
import { describeDownload } from './render';
import { createClient, printFailure, type ConnectionOptions } from './shared';

interface DownloadCommandOptions extends ConnectionOptions {
  output?: string;
}

export async function downloadCommand(
  fileNumbers: string[],
  options: DownloadCommandOptions
): Promise<void> {
  console.log(chalk.bold('\nbgscreen - Download Reports\n'));

  const spinner = ora(`Downloading ${fileNumbers.length} report(s)...`).start();

  try {
    const client = createClient(options);
    const results = await client.downloadReports(fileNumbers, options.output);
    const failed = results.filter(result => result.outcome === 'failed');

    if (failed.length === 0) {
      spinner.succeed(`${results.length} report(s) downloaded`);
    } else {
      spinner.warn(`${results.length - failed.length}/${results.length} report(s) downloaded`);
    }

    results.forEach(result => {
      const marker = result.outcome === 'written' ? chalk.green('✓') : chalk.red('✗');
      console.log(`  ${marker} ${describeDownload(result)}`);
    });
    console.log('');

    if (failed.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    spinner.fail('Download failed');
    printFailure(error);
    process.exit(1);
  }
}
