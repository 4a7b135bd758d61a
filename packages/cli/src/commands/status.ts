/**
 * Status Command
 *
 * Usage:
 *   bgscreen status 100234 100235
 */

import chalk from 'chalk';
import ora from 'ora';
import { describeStatus } from './render';
import { createClient, printFailure, type ConnectionOptions } from './shared';

export async function statusCommand(fileNumbers: string[], options: ConnectionOptions): Promise<void> {
  console.log(chalk.bold('\nbgscreen - Report Status\n'));

  const spinner = ora(`Fetching status for ${fileNumbers.length} file(s)...`).start();

  try {
    const client = createClient(options);
    const results = await client.fetchStatus(fileNumbers);
    spinner.succeed(`${results.length} report(s) returned`);

    results.forEach(result => {
      const line = describeStatus(result);
      if (result.errorText !== undefined) {
        console.log(`  ${chalk.red('✗')} ${line}`);
      } else if (result.status) {
        console.log(`  ${chalk.green('✓')} ${line}`);
      } else {
        console.log(`  ${chalk.dim('-')} ${line}`);
      }
    });
    console.log('');
  } catch (error) {
    spinner.fail('Status request failed');
    printFailure(error);
    process.exit(1);
  }
}
