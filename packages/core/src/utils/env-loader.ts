import * as fs from 'fs';
import * as path from 'path';
import { Logger } from './logger';

export class EnvLoader {
  /**
   * Reads `<projectDir>/.env` into process.env without overwriting
   * variables that are already set.
   */
  static load(projectDir: string = process.cwd()): void {
    const envFile = path.resolve(projectDir, '.env');

    if (!fs.existsSync(envFile)) {
      Logger.debug(`[EnvLoader] No .env file at ${envFile}`);
      return;
    }

    Logger.debug(`[EnvLoader] Loading environment from: ${envFile}`);

    const lines = fs.readFileSync(envFile, 'utf-8').split(/\r?\n/);

    lines.forEach(line => {
      const trimmed = line.trim();

      if (!trimmed || trimmed.startsWith('#')) {
        return;
      }

      const match = trimmed.match(/^([^=]+)=(.*)$/);
      if (match) {
        const key = match[1].trim();
        const value = match[2].trim().replace(/^(['"])(.*)\1$/, '$2');

        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
    });
  }
}
