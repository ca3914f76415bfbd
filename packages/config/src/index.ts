export * from './config';
export { type EnvSchema, envSchema } from './env';
export {
  CONFIG_FILE_NAME,
  DEFAULT_DATA_DIR,
  ENV_FILE_NAME,
  formatZodIssues,
  type LoadedConfig,
  type LoadOptions,
  loadConfig,
  loadConfigFile,
  loadEnv,
  parseConfig,
  parseEnvContent,
} from './loader';
