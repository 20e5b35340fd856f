/**
 * The collaborators `setup` sequences. Input retrieval and file output are
 * file based; the key ceremony and election builder are supplied by the host.
 */

import * as path from 'path';
import { defaultSerializationContext, fromFile, toFile } from '@tallykit/serialization';
import type { ElementModP, ElementModQ, SerializationContext } from '@tallykit/serialization';
import { CliError, CliErrorCode } from '../types.js';
import { isPositiveInteger } from '../config.js';
import {
  CiphertextElectionContext,
  ElectionConstants,
  ElectionPublicKey,
  Manifest,
  ciphertextElectionContext,
  electionConstants,
  electionPublicKey,
  manifest as manifestRecord
} from './records.js';

export const GUARDIAN_DIRECTORY = 'guardians';
export const MANIFEST_FILE_NAME = 'manifest';
export const CONTEXT_FILE_NAME = 'context';
export const CONSTANTS_FILE_NAME = 'constants';
export const GUARDIAN_FILE_PREFIX = 'guardian_';

export interface SetupInputs {
  guardianCount: number;
  quorum: number;
  manifest: Manifest;
  guardianIds: string[];
  outputDirectory: string;
}

export interface KeyCeremonyResult {
  guardianKeys: ElectionPublicKey[];
  jointPublicKey: ElementModP;
  commitmentHash: ElementModQ;
}

export interface BuildElectionResults {
  manifest: Manifest;
  context: CiphertextElectionContext;
  constants: ElectionConstants;
  guardianKeys: ElectionPublicKey[];
}

export interface SetupOutput {
  manifestPath: string;
  contextPath: string;
  constantsPath: string;
  guardianKeyPaths: string[];
}

export interface SetupInputRetrievalStep {
  getInputs(
    guardianCount: number,
    quorum: number,
    manifestPath: string,
    out: string
  ): Promise<SetupInputs>;
}

export interface KeyCeremonyStep {
  runKeyCeremony(guardianIds: string[], quorum: number): Promise<KeyCeremonyResult>;
}

export interface ElectionBuilderStep {
  buildElectionWithKey(
    inputs: SetupInputs,
    ceremony: KeyCeremonyResult
  ): Promise<BuildElectionResults>;
}

export interface OutputSetupFilesStep {
  output(inputs: SetupInputs, results: BuildElectionResults): Promise<SetupOutput>;
}

export interface SetupSteps {
  inputRetrieval: SetupInputRetrievalStep;
  keyCeremony: KeyCeremonyStep;
  electionBuilder: ElectionBuilderStep;
  output: OutputSetupFilesStep;
}

export function guardianIdsFor(guardianCount: number): string[] {
  return Array.from({ length: guardianCount }, (_, i) => `guardian-${i + 1}`);
}

/**
 * Reads the manifest document and checks the guardian counts
 */
export class ManifestInputRetrievalStep implements SetupInputRetrievalStep {
  constructor(private readonly context: SerializationContext = defaultSerializationContext) {}

  async getInputs(
    guardianCount: number,
    quorum: number,
    manifestPath: string,
    out: string
  ): Promise<SetupInputs> {
    if (!isPositiveInteger(guardianCount)) {
      throw new CliError(CliErrorCode.INVALID_INPUTS, 'Guardian count must be a positive integer', {
        guardianCount
      });
    }
    if (!isPositiveInteger(quorum) || quorum > guardianCount) {
      throw new CliError(
        CliErrorCode.INVALID_INPUTS,
        `Quorum must be between 1 and the guardian count (${guardianCount})`,
        { guardianCount, quorum }
      );
    }

    return {
      guardianCount,
      quorum,
      manifest: fromFile(manifestRecord, manifestPath, this.context),
      guardianIds: guardianIdsFor(guardianCount),
      outputDirectory: path.resolve(out)
    };
  }
}

/**
 * Writes the setup documents into the output directory, overwriting existing files
 */
export class FileOutputSetupFilesStep implements OutputSetupFilesStep {
  constructor(private readonly context: SerializationContext = defaultSerializationContext) {}

  async output(inputs: SetupInputs, results: BuildElectionResults): Promise<SetupOutput> {
    // owner ids name the key files
    const unknownOwners = results.guardianKeys
      .map(key => key.ownerId)
      .filter(ownerId => !inputs.guardianIds.includes(ownerId));
    if (unknownOwners.length > 0) {
      throw new CliError(
        CliErrorCode.INVALID_INPUTS,
        `Guardian keys belong to unknown guardians: ${unknownOwners.join(', ')}`,
        { unknownOwners }
      );
    }

    const directory = inputs.outputDirectory;
    const guardianDirectory = path.join(directory, GUARDIAN_DIRECTORY);

    return {
      manifestPath: toFile(manifestRecord, results.manifest, MANIFEST_FILE_NAME, directory, this.context),
      contextPath: toFile(
        ciphertextElectionContext,
        results.context,
        CONTEXT_FILE_NAME,
        directory,
        this.context
      ),
      constantsPath: toFile(
        electionConstants,
        results.constants,
        CONSTANTS_FILE_NAME,
        directory,
        this.context
      ),
      guardianKeyPaths: results.guardianKeys.map(key =>
        toFile(
          electionPublicKey,
          key,
          `${GUARDIAN_FILE_PREFIX}${key.ownerId}`,
          guardianDirectory,
          this.context
        )
      )
    };
  }
}
