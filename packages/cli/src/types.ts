/**
 * CLI types and errors
 */

import type { LogLevel } from '@tallykit/serialization';

/**
 * Configuration read from the environment (and a .env file)
 */
export interface CliConfig {
  guardianCount?: number;
  quorum?: number;
  manifest?: string;
  outDir?: string;
  logLevel: LogLevel;
}

/**
 * Options of the `setup` command after merging flags over configuration
 */
export interface SetupElectionOptions {
  guardianCount: number;
  quorum: number;
  manifest: string;
  out: string;
}

/**
 * CLI error codes
 */
export enum CliErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  INVALID_INPUTS = 'INVALID_INPUTS',
  STEP_FAILED = 'STEP_FAILED'
}

/**
 * Custom CLI error class
 */
export class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly cause?: unknown;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: CliErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}
