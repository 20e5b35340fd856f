import { LogLevel, parseLogLevel } from '@tallykit/serialization';
import { CliConfig, CliError, CliErrorCode } from './types.js';

const parseCount = (value: string | undefined): number | undefined =>
  value ? Number(value) : undefined;

/**
 * Loads configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => {
  const logLevel = env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : LogLevel.INFO;
  if (logLevel === undefined) {
    throw new CliError(CliErrorCode.INVALID_CONFIG, `Unknown LOG_LEVEL "${env.LOG_LEVEL}"`, {
      logLevel: env.LOG_LEVEL
    });
  }

  return {
    guardianCount: parseCount(env.TALLYKIT_GUARDIAN_COUNT),
    quorum: parseCount(env.TALLYKIT_QUORUM),
    manifest: env.TALLYKIT_MANIFEST || undefined,
    outDir: env.TALLYKIT_OUT_DIR || undefined,
    logLevel
  };
};

/**
 * Validates the configuration
 */
export const validateConfig = (config: CliConfig): void => {
  if (config.guardianCount !== undefined && !isPositiveInteger(config.guardianCount)) {
    throw new CliError(
      CliErrorCode.INVALID_CONFIG,
      'TALLYKIT_GUARDIAN_COUNT must be a positive integer',
      { guardianCount: config.guardianCount }
    );
  }

  if (config.quorum !== undefined && !isPositiveInteger(config.quorum)) {
    throw new CliError(CliErrorCode.INVALID_CONFIG, 'TALLYKIT_QUORUM must be a positive integer', {
      quorum: config.quorum
    });
  }
};

export function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
