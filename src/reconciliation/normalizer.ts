import type {
  RawBill,
  RawCommittee,
  RawDocumentBill,
  RawPerson,
  RawPersonToPosition,
} from '../sources/knesset-odata/types';
import type { RawMember } from '../sources/open-knesset/types';
import type {
  Bill,
  BillDocument,
  BillInitiator,
  Committee,
  CommitteePositionRow,
  FactionMembership,
  MinistryPosition,
  Person,
  PersonCommitteePosition,
} from '../types';
import { rankDocuments } from './document-ranker';
import { resolveFaction } from './faction-resolver';
import { classifyDuty } from './role-merger';

// Looks a display name up by Knesset person id when the row carries none
export type NameLookup = (personId: number) => string | undefined;

const noNames: NameLookup = () => undefined;

function text(value: string | null | undefined): string {
  return value?.trim() ?? '';
}

function optionalText(value: string | null | undefined): string | null {
  return text(value) || null;
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function personName(person: RawPerson | null | undefined): string {
  if (!person) return '';
  return `${text(person.FirstName)} ${text(person.LastName)}`.trim();
}

/**
 * Faction history of a member; memberships without a Knesset number cannot be
 * placed in a term and are left out.
 */
export function normalizeFactions(raw: RawMember): FactionMembership[] {
  const factions: FactionMembership[] = [];
  for (const faction of (raw.factions ?? []).filter(isPresent)) {
    if (typeof faction.knesset !== 'number') continue;
    factions.push({
      factionId: faction.faction_id ?? null,
      name: text(faction.faction_name),
      startDate: optionalText(faction.start_date),
      finishDate: optionalText(faction.finish_date),
      knessetNum: faction.knesset,
    });
  }
  return factions;
}

/**
 * Maps an Open Knesset member record to a Person for one Knesset term:
 * the party is the term's resolved faction, and ministry and committee
 * positions are limited to the term. The input record is not modified.
 */
export function normalizePerson(raw: RawMember, knessetNum: number): Person {
  const firstName = text(raw.mk_individual_first_name);
  const lastName = text(raw.mk_individual_name);
  const factions = normalizeFactions(raw);
  const party = resolveFaction(factions, knessetNum);

  const ministryPositions: MinistryPosition[] = (raw.govministries ?? [])
    .filter(isPresent)
    .filter((ministry) => ministry.knesset === knessetNum)
    .map((ministry) => ({
      ministry: text(ministry.govministry_name),
      position: text(ministry.position_name),
      startDate: optionalText(ministry.start_date),
      finishDate: optionalText(ministry.finish_date),
      knessetNum,
    }));

  const committeePositions: PersonCommitteePosition[] = (raw.committee_positions ?? [])
    .filter(isPresent)
    .filter((position) => position.knesset === knessetNum)
    .map((position) => ({
      committeeId: position.committee_id ?? null,
      committeeName: text(position.committee_name),
      position: text(position.position_name),
      startDate: optionalText(position.start_date),
      finishDate: optionalText(position.finish_date),
      knessetNum,
    }));

  return {
    mkId: raw.mk_individual_id,
    personId: raw.PersonID ?? null,
    firstName,
    lastName,
    fullName: `${firstName} ${lastName}`.trim(),
    altNames: (raw.altnames ?? []).map(text).filter(Boolean),
    isCurrent: raw.IsCurrent ?? false,
    email: optionalText(raw.mk_individual_email),
    party: optionalText(party?.name),
    factions,
    ministryPositions,
    committeePositions,
  };
}

export function normalizeCommittee(raw: RawCommittee): Committee {
  return {
    committeeId: raw.CommitteeID,
    name: text(raw.Name),
    knessetNum: raw.KnessetNum ?? null,
    isCurrent: raw.IsCurrent ?? false,
    type: optionalText(raw.CommitteeTypeDesc),
    category: optionalText(raw.CategoryDesc),
    email: optionalText(raw.Email),
  };
}

/**
 * Ingests one person-to-position row. The duty label falls back to the
 * position description; rows without a person id yield null.
 */
export function normalizePositionRow(
  raw: RawPersonToPosition,
  lookupName: NameLookup = noNames
): CommitteePositionRow | null {
  const personId = raw.PersonID ?? raw.KNS_Person?.PersonID;
  if (personId === undefined || personId === null) return null;

  const duty = text(raw.DutyDesc) || text(raw.KNS_Position?.Description);
  return {
    personId,
    fullName: personName(raw.KNS_Person) || lookupName(personId) || '',
    duty,
    roleKind: classifyDuty(duty),
    startDate: optionalText(raw.StartDate),
    finishDate: optionalText(raw.FinishDate),
    knessetNum: raw.KnessetNum ?? null,
  };
}

export function normalizeDocument(raw: RawDocumentBill): BillDocument {
  return {
    documentId: raw.DocumentBillID,
    billId: raw.BillID,
    group: text(raw.GroupTypeDesc),
    format: text(raw.ApplicationDesc),
    url: text(raw.FilePath).replace(/\\/g, '/'),
    lastUpdatedDate: optionalText(raw.LastUpdatedDate),
  };
}

/**
 * Bill with its initiators (by ordinal) and its documents in text-source order.
 */
export function normalizeBill(
  raw: RawBill,
  documents: readonly RawDocumentBill[],
  lookupName: NameLookup = noNames
): Bill {
  const initiators: BillInitiator[] = (raw.KNS_BillInitiators ?? [])
    .map((initiator) => ({
      personId: initiator.PersonID,
      fullName: personName(initiator.KNS_Person) || lookupName(initiator.PersonID) || '',
      isInitiator: initiator.IsInitiator ?? true,
      ordinal: initiator.Ordinal ?? null,
    }))
    .sort(
      (a, b) => (a.ordinal ?? Number.MAX_SAFE_INTEGER) - (b.ordinal ?? Number.MAX_SAFE_INTEGER)
    );

  return {
    billId: raw.BillID,
    name: text(raw.Name),
    number: raw.Number ?? null,
    privateNumber: raw.PrivateNumber ?? null,
    knessetNum: raw.KnessetNum ?? null,
    subType: optionalText(raw.SubTypeDesc),
    status: optionalText(raw.KNS_Status?.Desc),
    committeeId: raw.CommitteeID ?? null,
    publicationDate: optionalText(raw.PublicationDate),
    lastUpdatedDate: optionalText(raw.LastUpdatedDate),
    summary: optionalText(raw.SummaryLaw),
    initiators,
    documents: rankDocuments(documents.map(normalizeDocument)),
  };
}
