export * from './config';
export { type EnvSchema, envSchema } from './env';
export { FatalConfigError } from './errors';
export {
  type LoadedConfig,
  type LoadOptions,
  loadConfig,
  loadConfigFile,
  loadEnv,
  validateConfig,
} from './loader';
