import { discoverEnvFile, loadConfig, resolveCredentials, type AppConfig, type CaudenaCredentials } from '@txcheck/env';
import { ConsoleSink, FileSink, flushLoggers, getLogger, initLogger, isLogLevel, type LogLevel, type Sink } from '@txcheck/logger';
import type { Result } from 'neverthrow';
import pc from 'picocolors';

const logger = getLogger('command-runtime');

export interface RuntimeOptions {
  cwd?: string | undefined;
  env?: Record<string, string | undefined> | undefined;
  envFile?: string | undefined;
  verbose?: boolean | undefined;
}

/**
 * Everything a command needs before it talks to the API.
 */
export interface CommandRuntime {
  config: AppConfig;
  credentials: CaudenaCredentials;
  /** Env file the credentials and settings were read from, if any. */
  envFilePath: string | undefined;
}

/**
 * Route logs to stderr at the given level, and to a JSON-lines file when one
 * is configured. Pending entries of the previous configuration are flushed first.
 */
export function configureLogging(level: LogLevel, logFile?: string): void {
  flushLoggers();
  const sinks: Sink[] = [new ConsoleSink({ color: pc.isColorSupported })];
  if (logFile) {
    sinks.push(new FileSink({ path: logFile }));
  }
  initLogger({ level, sinks });
}

/**
 * Level before any env file is read: --verbose wins, then TXCHECK_LOG_LEVEL.
 */
export function initialLogLevel(env: Record<string, string | undefined>, verbose?: boolean): LogLevel {
  if (verbose) return 'debug';
  const configured = env['TXCHECK_LOG_LEVEL'];
  return configured && isLogLevel(configured) ? configured : 'warn';
}

/**
 * Read the env file, validate configuration and resolve credentials.
 * Process environment values take precedence over file values.
 */
export function resolveCommandRuntime(options: RuntimeOptions = {}): Result<CommandRuntime, Error> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  return discoverEnvFile(cwd, options.envFile).andThen((envFile) => {
    const fileVars = envFile?.vars ?? {};
    if (envFile) {
      logger.debug(`Using env file ${envFile.path}`);
    }

    return loadConfig({ ...fileVars, ...env }).andThen((config) =>
      resolveCredentials(env, fileVars).map((credentials) => ({
        config: options.verbose ? { ...config, logLevel: 'debug' as const } : config,
        credentials,
        envFilePath: envFile?.path,
      }))
    );
  });
}
