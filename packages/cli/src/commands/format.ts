import * as fs from 'fs';
import chalk from 'chalk';
import { formatXml } from '@bgscreen/core';

/**
 * Pretty-prints an XML file (declaration dropped).
 */
export async function formatCommand(file: string): Promise<void> {
  try {
    console.log(formatXml(fs.readFileSync(file, 'utf-8')));
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
