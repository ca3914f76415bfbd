import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError, FileSystemError } from '@ces/domain';
import type { ZodError } from 'zod';
import { type ConfigSchema, configSchema } from './config';
import { type EnvSchema, envSchema } from './env';

export const DEFAULT_DATA_DIR = 'data';
export const CONFIG_FILE_NAME = 'scanner.json';
export const ENV_FILE_NAME = '.env';

export interface LoadOptions {
  dataDir?: string;
  configPath?: string;
  envPath?: string;
  skipEnv?: boolean;
}

export interface LoadedConfig {
  config: ConfigSchema;
  env: EnvSchema;
  configPath: string;
}

interface LoadEnvOptions {
  envPath?: string;
  skipEnv?: boolean;
}

export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
  const configPath = path.resolve(options.configPath ?? path.join(dataDir, CONFIG_FILE_NAME));
  const envPath = path.resolve(options.envPath ?? path.join(dataDir, ENV_FILE_NAME));

  const configFile = loadConfigFile(configPath);
  const env = loadEnv({ envPath, skipEnv: options.skipEnv });

  return {
    config: mergeConfig(configFile, env),
    env,
    configPath,
  };
}

export function loadConfigFile(configPath: string): ConfigSchema {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const ioError = FileSystemError.from(configPath, error);
    throw new ConfigError(
      ioError.isNotFound ? `Configuration file not found: ${configPath}` : ioError.message,
      { cause: ioError },
    );
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${(error as Error).message}`, {
      cause: error,
    });
  }

  return parseConfig(rawConfig, configPath);
}

export function parseConfig(rawConfig: unknown, source = 'configuration'): ConfigSchema {
  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Configuration validation failed for ${source}:\n${formatZodIssues(result.error.issues)}`);
  }
  return result.data;
}

export function loadEnv(options: LoadEnvOptions = {}): EnvSchema {
  const { envPath = path.resolve(DEFAULT_DATA_DIR, ENV_FILE_NAME), skipEnv = false } = options;
  const fileVars = skipEnv ? {} : readEnvFile(envPath);
  const processVars = readProcessEnv(Object.keys(envSchema.shape));
  const mergedEnv = { ...fileVars, ...processVars };

  const result = envSchema.safeParse(mergedEnv);

  if (!result.success) {
    throw new ConfigError(`.env validation failed:\n${formatZodIssues(result.error.issues)}`);
  }

  return result.data;
}

function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    return {};
  }

  const content = fs.readFileSync(envPath, 'utf-8');
  return parseEnvContent(content);
}

export function parseEnvContent(content: string): Record<string, string> {
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
    if (typeof value === 'string' && value.trim().length > 0) {
      envVars[key] = value;
    }
  }

  return envVars;
}

function mergeConfig(configFile: ConfigSchema, env: EnvSchema): ConfigSchema {
  return {
    ...configFile,
    telemetry: {
      ...configFile.telemetry,
      logLevel: env.LOG_LEVEL ?? configFile.telemetry.logLevel,
    },
    tunnel: {
      ...configFile.tunnel,
      binaryPath: env.TUNNEL_BINARY_PATH ?? configFile.tunnel.binaryPath,
    },
  };
}

export function formatZodIssues(issues: ZodError['issues']): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}
