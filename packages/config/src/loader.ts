import * as fs from 'node:fs';
import * as path from 'node:path';
import { type ConfigFileSchema, type ConfigSchema, configFileSchema, configSchema } from './config';
import { type EnvSchema, envSchema } from './env';
import { FatalConfigError } from './errors';

const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config/config.json');
const DEFAULT_ENV_PATH = path.resolve(process.cwd(), 'config/.env');

export interface LoadOptions {
  configPath?: string;
  envPath?: string;
  skipEnv?: boolean;
}

export interface LoadedConfig {
  config: ConfigSchema;
  env: EnvSchema;
}

interface LoadEnvOptions {
  envPath?: string;
  skipEnv?: boolean;
}

interface IssueLike {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  const { configPath = DEFAULT_CONFIG_PATH, envPath = DEFAULT_ENV_PATH, skipEnv = false } = options;

  const configFile = loadConfigFile(configPath);
  const env = loadEnv({ envPath, skipEnv });

  const mergedConfig = mergeConfig(configFile, env);
  const result = configSchema.safeParse(mergedConfig);

  if (!result.success) {
    throw new FatalConfigError('Configuration validation failed', formatIssues(result.error.issues));
  }

  return {
    config: result.data,
    env,
  };
}

export function loadConfigFile(configPath: string = DEFAULT_CONFIG_PATH): ConfigFileSchema {
  const rawConfig = fs.existsSync(configPath) ? readJson(configPath) : {};
  const result = configFileSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new FatalConfigError(`Configuration file validation failed (${configPath})`, formatIssues(result.error.issues));
  }

  return result.data;
}

export function loadEnv(options: LoadEnvOptions = {}): EnvSchema {
  const { envPath = DEFAULT_ENV_PATH, skipEnv = false } = options;
  const fileVars = skipEnv ? {} : readEnvFile(envPath);
  const processVars = readProcessEnv(Object.keys(envSchema.shape));
  const mergedEnv = { ...fileVars, ...processVars };

  const result = envSchema.safeParse(mergedEnv);

  if (!result.success) {
    throw new FatalConfigError('.env validation failed', formatIssues(result.error.issues));
  }

  return result.data;
}

function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new FatalConfigError(`Configuration file is not valid JSON (${filePath})`, [
      `  - ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
}

function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    return {};
  }

  const content = fs.readFileSync(envPath, 'utf-8');
  return parseEnvContent(content);
}

function parseEnvContent(content: string): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const equalsIndex = trimmed.indexOf('=');
    if (equalsIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, equalsIndex).trim();
    let value = trimmed.slice(equalsIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    envVars[key] = value;
  }

  return envVars;
}

function readProcessEnv(keys: string[]): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const key of keys) {
    const value = process.env[key];
    // Empty variables count as unset so they do not mask the .env file.
    if (typeof value === 'string' && value.trim().length > 0) {
      envVars[key] = value;
    }
  }

  return envVars;
}

function mergeConfig(configFile: ConfigFileSchema, env: EnvSchema): unknown {
  return {
    ...configFile,
    telemetry: {
      ...configFile.telemetry,
      notifyWebhookUrl: env.NOTIFY_WEBHOOK_URL,
    },
    monitor: {
      ...configFile.monitor,
      ...(env.MONITOR_URL ? { url: env.MONITOR_URL } : {}),
    },
  };
}

function formatIssues(issues: readonly IssueLike[]): string[] {
  return issues.map((issue) => {
    const issuePath = issue.path.length > 0 ? issue.path.map(String).join('.') : '<root>';
    return `  - ${issuePath}: ${issue.message}`;
  });
}

export function validateConfig(config: unknown): config is ConfigSchema {
  const result = configSchema.safeParse(config);
  return result.success;
}
