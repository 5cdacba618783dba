export { loadConfig, DEFAULT_API_URL, type AppConfig, type EnvConfig } from './config.js';
export { discoverEnvFile, envFileCandidates, readEnvFile, DEFAULT_ENV_FILES, type EnvFile } from './env-files.js';
export {
  resolveCredentials,
  KID_FILE_KEYS,
  SECRET_FILE_KEYS,
  type CaudenaCredentials,
} from './credentials.js';
export { ConfigError, MissingCredentialError } from './errors.js';
