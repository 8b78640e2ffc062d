/**
 * Application configuration: a JSON file plus environment overrides.
 *
 * The token is stored unencrypted; file permissions are the only protection.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { AppConfig } from './types';

export const CONFIG_FILE = 'config.json';

const ConfigFileSchema = z.object({
  github: z
    .object({
      token: z.string().default(''),
      username: z.string().default(''),
    })
    .default({}),
  paths: z
    .object({
      dataDirectory: z.string().min(1).optional(),
    })
    .default({}),
  settings: z
    .object({
      theme: z.enum(['dark', 'light']).default('dark'),
      refreshInterval: z.number().int().positive().default(300),
    })
    .default({}),
});

export function defaultConfigDirectory(env: NodeJS.ProcessEnv = process.env): string {
  return env.ISSUE_DESK_CONFIG_DIR || path.join(os.homedir(), '.config', 'issue-desk');
}

export function defaultConfig(): AppConfig {
  return {
    github: { token: '', username: '' },
    paths: { dataDirectory: path.join(os.homedir(), 'Documents', 'issue-desk-data') },
    settings: { theme: 'dark', refreshInterval: 300 },
  };
}

export interface ConfigLoadOptions {
  configDirectory?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class ConfigManager {
  readonly configDirectory: string;
  private fileConfig: AppConfig;
  private env: NodeJS.ProcessEnv;
  private logger: Logger;

  private constructor(configDirectory: string, fileConfig: AppConfig, env: NodeJS.ProcessEnv, logger: Logger) {
    this.configDirectory = configDirectory;
    this.fileConfig = fileConfig;
    this.env = env;
    this.logger = logger;
  }

  /**
   * Load config.json, falling back to defaults when it is missing or invalid
   */
  static async load(options: ConfigLoadOptions = {}): Promise<ConfigManager> {
    const env = options.env ?? process.env;
    const logger = options.logger ?? defaultLogger;
    const configDirectory = options.configDirectory ?? defaultConfigDirectory(env);
    const filePath = path.join(configDirectory, CONFIG_FILE);

    let fileConfig = defaultConfig();
    try {
      const content = await readFile(filePath, 'utf-8');
      fileConfig = ConfigManager.parse(JSON.parse(content));
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        logger.debug(`No config at ${filePath}, using defaults`);
      } else {
        logger.warn(`Ignoring invalid config ${filePath}: ${errorMessage(error)}`);
      }
    }

    return new ConfigManager(configDirectory, fileConfig, env, logger);
  }

  /**
   * Validate raw config JSON and fill in defaults
   */
  static parse(raw: unknown): AppConfig {
    const parsed = ConfigFileSchema.parse(raw);
    const defaults = defaultConfig();
    return {
      github: parsed.github,
      paths: { dataDirectory: parsed.paths.dataDirectory ?? defaults.paths.dataDirectory },
      settings: parsed.settings,
    };
  }

  get configFilePath(): string {
    return path.join(this.configDirectory, CONFIG_FILE);
  }

  /**
   * Effective configuration: file values with environment overrides applied
   */
  get config(): AppConfig {
    const { github, paths, settings } = this.fileConfig;
    return {
      github: {
        token: this.env.GITHUB_TOKEN || github.token,
        username: this.env.GITHUB_USERNAME || github.username,
      },
      paths: {
        dataDirectory: this.env.ISSUE_DESK_DATA_DIR || paths.dataDirectory,
      },
      settings: { ...settings },
    };
  }

  hasToken(): boolean {
    return this.config.github.token !== '';
  }

  /**
   * Persist the file-backed values (environment overrides are never written)
   */
  async save(): Promise<void> {
    await mkdir(this.configDirectory, { recursive: true });
    await writeFile(this.configFilePath, JSON.stringify(this.fileConfig, null, 2) + '\n', {
      encoding: 'utf-8',
      mode: 0o600,
    });
    this.logger.debug(`Config saved to ${this.configFilePath}`);
  }

  async setToken(token: string, username?: string): Promise<void> {
    this.fileConfig.github.token = token;
    if (username !== undefined) {
      this.fileConfig.github.username = username;
    }
    await this.save();
  }

  async setUsername(username: string): Promise<void> {
    this.fileConfig.github.username = username;
    await this.save();
  }

  async setDataDirectory(dataDirectory: string): Promise<void> {
    this.fileConfig.paths.dataDirectory = path.resolve(dataDirectory);
    await mkdir(this.fileConfig.paths.dataDirectory, { recursive: true });
    await this.save();
  }
}
