/**
 * Fakes and fixtures for CLI tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BigInteger, ElementModP, ElementModQ, ProofUsage } from '@tallykit/serialization';
import {
  FileOutputSetupFilesStep,
  ManifestInputRetrievalStep,
  type BuildElectionResults,
  type ElectionBuilderStep,
  type ElectionPublicKey,
  type KeyCeremonyResult,
  type KeyCeremonyStep,
  type SetupInputs,
  type SetupSteps
} from '../src';

export const MANIFEST_FIXTURE = path.join(__dirname, 'fixtures', 'manifest.json');

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tallykit-cli-'));
}

export function removeTempDir(directory: string): void {
  fs.rmSync(directory, { recursive: true, force: true });
}

export function fakeGuardianKey(ownerId: string, sequenceOrder: number): ElectionPublicKey {
  const key = new ElementModP(BigInt(1000 + sequenceOrder));
  return {
    ownerId,
    sequenceOrder,
    key,
    coefficientCommitments: [key, new ElementModP(BigInt(2 * sequenceOrder + 1))],
    coefficientProofs: [
      {
        publicKey: key,
        commitment: new ElementModP(BigInt(5)),
        challenge: new ElementModQ(BigInt(7)),
        response: new ElementModQ(BigInt(9)),
        usage: ProofUsage.SecretValue
      }
    ]
  };
}

/**
 * Key ceremony stand-in producing deterministic keys
 */
export class FakeKeyCeremonyStep implements KeyCeremonyStep {
  public readonly calls: Array<{ guardianIds: string[]; quorum: number }> = [];

  constructor(private readonly journal: string[] = []) {}

  async runKeyCeremony(guardianIds: string[], quorum: number): Promise<KeyCeremonyResult> {
    this.journal.push('keyCeremony');
    this.calls.push({ guardianIds, quorum });
    return {
      guardianKeys: guardianIds.map((id, index) => fakeGuardianKey(id, index + 1)),
      jointPublicKey: new ElementModP(BigInt(4242)),
      commitmentHash: new ElementModQ(BigInt(17))
    };
  }
}

export class FakeElectionBuilderStep implements ElectionBuilderStep {
  constructor(private readonly journal: string[] = []) {}

  async buildElectionWithKey(
    inputs: SetupInputs,
    ceremony: KeyCeremonyResult
  ): Promise<BuildElectionResults> {
    this.journal.push('electionBuilder');
    return {
      manifest: inputs.manifest,
      context: {
        numberOfGuardians: inputs.guardianCount,
        quorum: inputs.quorum,
        elgamalPublicKey: ceremony.jointPublicKey,
        commitmentHash: ceremony.commitmentHash,
        manifestHash: new ElementModQ(BigInt(1)),
        cryptoBaseHash: new ElementModQ(BigInt(2)),
        cryptoExtendedBaseHash: new ElementModQ(BigInt(3))
      },
      constants: {
        largePrime: new BigInteger(BigInt(23)),
        smallPrime: new BigInteger(BigInt(11)),
        cofactor: new BigInteger(BigInt(2)),
        generator: new BigInteger(BigInt(4))
      },
      guardianKeys: ceremony.guardianKeys
    };
  }
}

/**
 * File based steps around the fake key ceremony and election builder
 */
export function createTestSteps(journal: string[] = []): SetupSteps & {
  keyCeremony: FakeKeyCeremonyStep;
} {
  return {
    inputRetrieval: new ManifestInputRetrievalStep(),
    keyCeremony: new FakeKeyCeremonyStep(journal),
    electionBuilder: new FakeElectionBuilderStep(journal),
    output: new FileOutputSetupFilesStep()
  };
}
