import { ConfigurationError, getErrorMessage } from '@txledger/core';
import { ConsoleSink, initLogger, validateLoggerEnv, type LoggerEnvConfig, type LogLevel } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

/**
 * Route all logging to stderr. `--verbose` overrides TXLEDGER_LOG_LEVEL with debug.
 */
export function configureCliLogger(
  options: { verbose?: boolean | undefined },
  env: NodeJS.ProcessEnv = process.env
): Result<LogLevel, ConfigurationError> {
  let config: LoggerEnvConfig;
  try {
    config = validateLoggerEnv(env);
  } catch (error) {
    return err(new ConfigurationError(getErrorMessage(error)));
  }

  const level: LogLevel = options.verbose ? 'debug' : config.TXLEDGER_LOG_LEVEL;
  initLogger({ level, sinks: [new ConsoleSink({ color: config.TXLEDGER_LOG_COLOR })] });
  return ok(level);
}
