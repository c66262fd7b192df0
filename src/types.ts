export type RoleKind = 'member' | 'deputy' | 'chair' | 'acting';

export interface FactionMembership {
  factionId: number | null;
  name: string;
  startDate: string | null;
  finishDate: string | null;
  knessetNum: number;
}

export interface MinistryPosition {
  ministry: string;
  position: string;
  startDate: string | null;
  finishDate: string | null;
  knessetNum: number;
}

// Committee row as carried on an Open Knesset member record
export interface PersonCommitteePosition {
  committeeId: number | null;
  committeeName: string;
  position: string;
  startDate: string | null;
  finishDate: string | null;
  knessetNum: number;
}

export interface Person {
  mkId: number;
  personId: number | null;
  firstName: string;
  lastName: string;
  fullName: string;
  altNames: string[];
  isCurrent: boolean;
  email: string | null;
  party: string | null; // faction resolved for the requested Knesset
  factions: FactionMembership[];
  ministryPositions: MinistryPosition[];
  committeePositions: PersonCommitteePosition[];
}

export interface Profile extends Person {
  multipleMatches: boolean;
  otherMatches: string[];
}

export interface PartyTally {
  party: string;
  count: number;
}

export interface Committee {
  committeeId: number;
  name: string;
  knessetNum: number | null;
  isCurrent: boolean;
  type: string | null;
  category: string | null;
  email: string | null;
}

// One person-to-position row of a committee, classified at ingestion
export interface CommitteePositionRow {
  personId: number;
  fullName: string;
  duty: string;
  roleKind: RoleKind;
  startDate: string | null;
  finishDate: string | null;
  knessetNum: number | null;
}

export interface CommitteeMember {
  personId: number;
  fullName: string;
  role: string;
  roleKind: RoleKind;
  roles: string[];
  startDate: string | null;
  finishDate: string | null;
  party: string | null;
}

export interface BillInitiator {
  personId: number;
  fullName: string;
  isInitiator: boolean;
  ordinal: number | null;
}

export interface BillDocument {
  documentId: number;
  billId: number;
  group: string;
  format: string;
  url: string;
  lastUpdatedDate: string | null;
}

export interface Bill {
  billId: number;
  name: string;
  number: number | null;
  privateNumber: number | null;
  knessetNum: number | null;
  subType: string | null;
  status: string | null;
  committeeId: number | null;
  publicationDate: string | null;
  lastUpdatedDate: string | null;
  summary: string | null;
  initiators: BillInitiator[];
  documents: BillDocument[];
}

export interface BillText {
  billId: number;
  billName: string;
  text: string;
  truncated: boolean;
  sourceUrl: string;
  documentGroup: string;
}

// `'all-time'` turns off the membership time window
export type RosterWindow = Date | 'all-time';

export interface CommitteeRoster {
  committee: Committee;
  members: CommitteeMember[];
}
