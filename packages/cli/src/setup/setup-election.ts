import { Logger } from '@tallykit/serialization';
import { cliLogger } from '../logger.js';
import { CliError, CliErrorCode, SetupElectionOptions } from '../types.js';
import type { SetupOutput, SetupSteps } from './steps.js';

type StepName = 'inputRetrieval' | 'keyCeremony' | 'electionBuilder' | 'output';

async function runStep<T>(logger: Logger, step: StepName, run: () => Promise<T>): Promise<T> {
  logger.info('Running setup step', { step });
  try {
    return await run();
  } catch (error) {
    if (error instanceof CliError) {
      throw error;
    }
    logger.error('Setup step failed', error, { step });
    throw new CliError(
      CliErrorCode.STEP_FAILED,
      `Setup step ${step} failed: ${error instanceof Error ? error.message : String(error)}`,
      { step },
      error
    );
  }
}

/**
 * Runs the automated key ceremony and writes the files needed to encrypt
 * ballots, decrypt the election and produce an election record.
 */
export async function runSetupElection(
  options: SetupElectionOptions,
  steps: SetupSteps,
  logger: Logger = cliLogger.child('setup')
): Promise<SetupOutput> {
  const inputs = await runStep(logger, 'inputRetrieval', () =>
    steps.inputRetrieval.getInputs(
      options.guardianCount,
      options.quorum,
      options.manifest,
      options.out
    )
  );
  const ceremony = await runStep(logger, 'keyCeremony', () =>
    steps.keyCeremony.runKeyCeremony(inputs.guardianIds, inputs.quorum)
  );
  const results = await runStep(logger, 'electionBuilder', () =>
    steps.electionBuilder.buildElectionWithKey(inputs, ceremony)
  );
  const output = await runStep(logger, 'output', () => steps.output.output(inputs, results));

  logger.info('Election setup complete', {
    outputDirectory: inputs.outputDirectory,
    guardianKeys: output.guardianKeyPaths.length
  });
  return output;
}
