import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors';
import { ClientConfigSchema, type ClientConfig } from '../schemas/config-schema';
import { CredentialSchema, type Credential } from '../schemas/request-schema';
import { formatZodIssues, loadStructuredFile } from '../schemas/schema-validator';
import { EnvLoader } from './env-loader';
import { Logger } from './logger';

export const DEFAULT_CONFIG_FILE = 'bgscreen.yaml';

export interface LoadConfigOptions {
  /** Directory holding the config file and `.env` (default: cwd) */
  projectPath?: string;
  /** Config file relative to projectPath (default: bgscreen.yaml) */
  configFile?: string;
  /** Overrides `environment` from file and env */
  environment?: string;
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * BGSCREEN_* variables take precedence over the file
 */
function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const servers: Record<string, string> = {};

  if (env.BGSCREEN_ENVIRONMENT) overrides.environment = env.BGSCREEN_ENVIRONMENT;
  if (env.BGSCREEN_PRODUCTION_URL) servers.Production = env.BGSCREEN_PRODUCTION_URL;
  if (env.BGSCREEN_TESTING_URL) servers.Testing = env.BGSCREEN_TESTING_URL;
  if (env.BGSCREEN_ACCOUNT) overrides.account = env.BGSCREEN_ACCOUNT;
  if (env.BGSCREEN_POSTBACK_URL) overrides.postBackUrl = env.BGSCREEN_POSTBACK_URL;
  if (env.BGSCREEN_OUTPUT_DIR) overrides.outputDirectory = env.BGSCREEN_OUTPUT_DIR;
  if (env.BGSCREEN_TIMEOUT_MS) overrides.timeoutMs = Number(env.BGSCREEN_TIMEOUT_MS);

  if (Object.keys(servers).length > 0) {
    overrides.servers = servers;
  }
  return overrides;
}

export class ConfigLoader {
  static load(options: LoadConfigOptions = {}, env: Env = process.env): ClientConfig {
    const projectPath = options.projectPath || process.cwd();
    const configPath = path.join(projectPath, options.configFile || DEFAULT_CONFIG_FILE);

    if (env === process.env) {
      EnvLoader.load(projectPath);
    }

    let fileConfig: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
      const loaded = loadStructuredFile(configPath);
      if (isRecord(loaded)) {
        fileConfig = loaded;
      } else if (loaded !== undefined && loaded !== null) {
        throw new ConfigError(`Config file ${configPath} must contain a mapping`);
      }
      Logger.debug(`[ConfigLoader] Loaded ${configPath}`);
    } else if (options.configFile) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    } else {
      Logger.debug(`[ConfigLoader] No ${DEFAULT_CONFIG_FILE} found, using environment only`);
    }

    const overrides = envOverrides(env);
    const fileServers = isRecord(fileConfig.servers) ? fileConfig.servers : {};
    const overrideServers = isRecord(overrides.servers) ? overrides.servers : {};
    const merged = {
      ...fileConfig,
      ...overrides,
      ...(options.environment ? { environment: options.environment } : {}),
      servers: { ...fileServers, ...overrideServers },
    };

    const result = ClientConfigSchema.safeParse(merged);
    if (!result.success) {
      const errors = formatZodIssues(result.error)
        .map(err => `  [${err.path}]: ${err.message}`)
        .join('\n');
      throw new ConfigError(`Config validation failed for ${configPath}:\n${errors}`);
    }

    Logger.debug(`[ConfigLoader] ✓ Config validated (environment: ${result.data.environment})`);
    return result.data;
  }

  /**
   * Credentials are only ever read from the environment.
   */
  static loadCredential(env: Env = process.env): Credential {
    const result = CredentialSchema.safeParse({
      username: env.BGSCREEN_USERNAME,
      password: env.BGSCREEN_PASSWORD,
    });
    if (!result.success) {
      throw new ConfigError('BGSCREEN_USERNAME and BGSCREEN_PASSWORD must both be set');
    }
    return result.data;
  }
}
