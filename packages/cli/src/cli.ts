import { Command, CommanderError, InvalidArgumentError, OutputConfiguration } from 'commander';
import dotenv from 'dotenv';
import { Logger, LoggerAdapter } from '@tallykit/serialization';
import { loadConfig, validateConfig } from './config.js';
import { cliLogger, createCliLogger } from './logger.js';
import { CliConfig, CliError, CliErrorCode, SetupElectionOptions } from './types.js';
import { runSetupElection } from './setup/setup-election.js';
import type { SetupSteps } from './setup/steps.js';

export const PROGRAM_NAME = 'tallykit';
export const PROGRAM_VERSION = '0.1.0';

export interface ProgramOptions {
  /** Defaults to the environment, read when the command runs */
  config?: CliConfig;
  logger?: Logger;
  output?: OutputConfiguration;
}

export interface RunCliOptions {
  /** Variables to configure from instead of a .env file and process.env */
  env?: NodeJS.ProcessEnv;
  envFile?: string;
  adapter?: LoggerAdapter;
  output?: OutputConfiguration;
}

interface SetupFlags {
  guardianCount?: number;
  quorum?: number;
  manifest?: string;
  out?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Merge command-line flags over configuration; flags win
 */
export function resolveSetupOptions(flags: SetupFlags, config: CliConfig): SetupElectionOptions {
  const guardianCount = flags.guardianCount ?? config.guardianCount;
  const quorum = flags.quorum ?? config.quorum;
  const manifest = flags.manifest ?? config.manifest;
  const out = flags.out ?? config.outDir;

  if (guardianCount === undefined || quorum === undefined || !manifest || !out) {
    const missing = [
      guardianCount === undefined && '--guardian-count',
      quorum === undefined && '--quorum',
      !manifest && '--manifest',
      !out && '--out'
    ].filter((name): name is string => typeof name === 'string');

    throw new CliError(
      CliErrorCode.INVALID_OPTIONS,
      `Missing required options: ${missing.join(', ')}`,
      { missing }
    );
  }

  return { guardianCount, quorum, manifest, out };
}

function registerSetupCommand(program: Command, steps: SetupSteps, options: ProgramOptions): void {
  program
    .command('setup')
    .description(
      'Run an automated key ceremony and produce the files needed to encrypt ballots, ' +
        'decrypt an election and produce an election record'
    )
    .option(
      '--guardian-count <n>',
      'The number of guardians that will participate in the key ceremony and tally',
      parseInteger
    )
    .option('--quorum <n>', 'The minimum number of guardians required for the tally', parseInteger)
    .option('--manifest <path>', 'The location of an election manifest')
    .option(
      '--out <dir>',
      'Directory for the context, constants and guardian keys. Existing files are overwritten'
    )
    .action(async (flags: SetupFlags) => {
      const config = options.config ?? loadConfig();
      validateConfig(config);

      const logger = options.logger ?? cliLogger;
      await runSetupElection(
        resolveSetupOptions(flags, config),
        steps,
        logger.child('setup')
      );
    });
}

/**
 * Build the command-line program. Commander errors are thrown as
 * CommanderError instead of exiting the process.
 */
export function createProgram(steps: SetupSteps, options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Election setup using the TallyKit document formats')
    .version(PROGRAM_VERSION)
    .exitOverride();

  if (options.output) {
    program.configureOutput(options.output);
  }

  registerSetupCommand(program, steps, options);
  return program;
}

function loadEnvironment(envFile?: string): NodeJS.ProcessEnv {
  const result = dotenv.config(envFile ? { path: envFile } : undefined);
  if (envFile && result.error) {
    throw new CliError(CliErrorCode.INVALID_CONFIG, `Failed to load ${envFile}`, { envFile }, result.error);
  }
  return process.env;
}

/**
 * Parse and run user arguments (without the node and script entries).
 * Resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  steps: SetupSteps,
  options: RunCliOptions = {}
): Promise<number> {
  let logger = options.adapter ? createCliLogger(cliLogger.getLevel(), options.adapter) : cliLogger;

  try {
    const config = loadConfig(options.env ?? loadEnvironment(options.envFile));
    validateConfig(config);
    logger = createCliLogger(config.logLevel, options.adapter);

    const program = createProgram(steps, { config, logger, output: options.output });
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.error('Command failed', error);
    return 1;
  }
}
