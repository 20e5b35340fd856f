/**
 * Documents produced and consumed by election setup
 */

import { t, type Infer } from '@tallykit/serialization';

export const geopoliticalUnit = t.object(
  {
    objectId: t.string(),
    name: t.string(),
    type: t.reportingUnitType(),
    contactInformation: t.optional(t.string())
  },
  'GeopoliticalUnit'
);

export const candidate = t.object(
  {
    objectId: t.string(),
    name: t.optional(t.string()),
    partyId: t.optional(t.string()),
    isWriteIn: t.optional(t.boolean())
  },
  'Candidate'
);

export const selectionDescription = t.object(
  {
    objectId: t.string(),
    sequenceOrder: t.integer(),
    candidateId: t.string()
  },
  'SelectionDescription'
);

export const contestDescription = t.object(
  {
    objectId: t.string(),
    sequenceOrder: t.integer(),
    electoralDistrictId: t.string(),
    voteVariation: t.voteVariationType(),
    numberElected: t.integer(),
    votesAllowed: t.optional(t.integer()),
    name: t.string(),
    ballotSelections: t.array(selectionDescription)
  },
  'ContestDescription'
);

export const manifest = t.object(
  {
    electionScopeId: t.string(),
    specVersion: t.specVersion(),
    type: t.electionType(),
    startDate: t.datetime(),
    endDate: t.datetime(),
    geopoliticalUnits: t.array(geopoliticalUnit),
    candidates: t.array(candidate),
    contests: t.array(contestDescription),
    name: t.optional(t.string())
  },
  'Manifest'
);

export const electionConstants = t.object(
  {
    largePrime: t.bigInteger(),
    smallPrime: t.bigInteger(),
    cofactor: t.bigInteger(),
    generator: t.bigInteger()
  },
  'ElectionConstants'
);

export const schnorrProof = t.object(
  {
    publicKey: t.elementModP(),
    commitment: t.elementModP(),
    challenge: t.elementModQ(),
    response: t.elementModQ(),
    usage: t.proofUsage()
  },
  'SchnorrProof'
);

export const electionPublicKey = t.object(
  {
    ownerId: t.string(),
    sequenceOrder: t.integer(),
    key: t.elementModP(),
    coefficientCommitments: t.array(t.elementModP()),
    coefficientProofs: t.array(schnorrProof)
  },
  'ElectionPublicKey'
);

export const ciphertextElectionContext = t.object(
  {
    numberOfGuardians: t.integer(),
    quorum: t.integer(),
    elgamalPublicKey: t.elementModP(),
    commitmentHash: t.elementModQ(),
    manifestHash: t.elementModQ(),
    cryptoBaseHash: t.elementModQ(),
    cryptoExtendedBaseHash: t.elementModQ(),
    extendedData: t.optional(t.record(t.string()))
  },
  'CiphertextElectionContext'
);

export type Manifest = Infer<typeof manifest>;
export type ElectionConstants = Infer<typeof electionConstants>;
export type SchnorrProof = Infer<typeof schnorrProof>;
export type ElectionPublicKey = Infer<typeof electionPublicKey>;
export type CiphertextElectionContext = Infer<typeof ciphertextElectionContext>;
