/**
 * Enumerations carried by election records
 */

export enum ElectionType {
  Unknown = 'unknown',
  General = 'general',
  PartisanPrimaryClosed = 'partisan_primary_closed',
  PartisanPrimaryOpen = 'partisan_primary_open',
  Primary = 'primary',
  Runoff = 'runoff',
  Special = 'special',
  Other = 'other'
}

export enum ReportingUnitType {
  Unknown = 'unknown',
  BallotBatch = 'ballot_batch',
  BallotStyleArea = 'ballot_style_area',
  City = 'city',
  CityCouncil = 'city_council',
  CombinedPrecinct = 'combined_precinct',
  Congressional = 'congressional',
  Country = 'country',
  County = 'county',
  CountyCouncil = 'county_council',
  DropBox = 'drop_box',
  Judicial = 'judicial',
  Municipality = 'municipality',
  PollingPlace = 'polling_place',
  Precinct = 'precinct',
  School = 'school',
  Special = 'special',
  SplitPrecinct = 'split_precinct',
  State = 'state',
  StateHouse = 'state_house',
  StateSenate = 'state_senate',
  Township = 'township',
  Utility = 'utility',
  Village = 'village',
  VoteCenter = 'vote_center',
  Ward = 'ward',
  Water = 'water',
  Other = 'other'
}

export enum VoteVariationType {
  OneOfM = 'one_of_m',
  Approval = 'approval',
  Borda = 'borda',
  Cumulative = 'cumulative',
  Majority = 'majority',
  NOfM = 'n_of_m',
  Plurality = 'plurality',
  Proportional = 'proportional',
  Range = 'range',
  Rcv = 'rcv',
  SuperMajority = 'super_majority',
  Other = 'other'
}

export enum SpecVersion {
  EG0_95 = 'v0.95',
  EG1_0 = 'v1.0'
}

/**
 * State of a ballot once it has been submitted to the ballot box
 */
export enum BallotBoxState {
  CAST = 1,
  SPOILED = 2,
  UNKNOWN = 999
}

export enum ProofUsage {
  Unknown = 'Unknown',
  SecretValue = 'Prove knowledge of secret value',
  SelectionLimit = "Prove value within selection's limit",
  SelectionValue = "Prove selection's value (0 or 1)"
}

export enum ContestErrorType {
  Default = 'default',
  NullVote = 'null_vote',
  UnderVote = 'under_vote',
  OverVote = 'over_vote'
}
