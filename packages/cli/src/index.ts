/**
 * TallyKit CLI - Main Entry Point
 */

export { createProgram, resolveSetupOptions, runCli, PROGRAM_NAME, PROGRAM_VERSION } from './cli.js';
export type { ProgramOptions, RunCliOptions } from './cli.js';
export { loadConfig, validateConfig } from './config.js';
export { cliLogger, createCliLogger } from './logger.js';
export { CliError, CliErrorCode } from './types.js';
export type { CliConfig, SetupElectionOptions } from './types.js';
export { runSetupElection } from './setup/setup-election.js';
export {
  CONSTANTS_FILE_NAME,
  CONTEXT_FILE_NAME,
  FileOutputSetupFilesStep,
  GUARDIAN_DIRECTORY,
  GUARDIAN_FILE_PREFIX,
  MANIFEST_FILE_NAME,
  ManifestInputRetrievalStep,
  guardianIdsFor
} from './setup/steps.js';
export type {
  BuildElectionResults,
  ElectionBuilderStep,
  KeyCeremonyResult,
  KeyCeremonyStep,
  OutputSetupFilesStep,
  SetupInputRetrievalStep,
  SetupInputs,
  SetupOutput,
  SetupSteps
} from './setup/steps.js';
export * from './setup/records.js';
