import { type APIRequestContext, request } from 'playwright';
import { type CacheOptions, MemberListCache } from './cache';
import { DEFAULT_KNESSET_NUM, KNESSET_CONFIG } from './constants';
import { UpstreamRequestError } from './errors';
import { compareNames } from './reconciliation/collation';
import { isExtractableFormat } from './reconciliation/document-ranker';
import { type NameMatcher, SubstringNameMatcher } from './reconciliation/name-matcher';
import {
  type NameLookup,
  normalizeBill,
  normalizeCommittee,
  normalizePerson,
  normalizePositionRow,
} from './reconciliation/normalizer';
import { mergeCommitteeRoles } from './reconciliation/role-merger';
import { assertValidInstant, filterActiveAt, filterByTerm } from './reconciliation/term-filter';
import { KnessetODataClient } from './sources/knesset-odata';
import type { RawBill } from './sources/knesset-odata/types';
import { OpenKnessetClient } from './sources/open-knesset';
import type { RawMember } from './sources/open-knesset/types';
import type { RequestClient } from './sources/request-client';
import type { BillSource, CommitteeSource, DocumentSource, MemberSource } from './sources/types';
import { PdfTextExtractor, type TextExtractor } from './text-extraction';
import type {
  Bill,
  BillText,
  Committee,
  CommitteeMember,
  CommitteePositionRow,
  CommitteeRoster,
  PartyTally,
  Person,
  Profile,
  RosterWindow,
} from './types';

export interface KnessetServiceOptions {
  memberSource?: MemberSource;
  committeeSource?: CommitteeSource;
  billSource?: BillSource;
  documentSource?: DocumentSource;
  textExtractor?: TextExtractor;
  nameMatcher?: NameMatcher;
  cache?: CacheOptions;
}

/**
 * Cuts text to at most `maxChars` UTF-16 units without leaving half a surrogate pair.
 */
export function truncateText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  let cut = text.slice(0, maxChars);
  const last = cut.charCodeAt(cut.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    cut = cut.slice(0, -1);
  }
  return { text: cut, truncated: true };
}

function latestUpdated(bills: readonly RawBill[]): RawBill | null {
  let latest: RawBill | null = null;
  for (const bill of bills) {
    if (!latest || (bill.LastUpdatedDate ?? '') > (latest.LastUpdatedDate ?? '')) {
      latest = bill;
    }
  }
  return latest;
}

export class KnessetService {
  private requestContext: APIRequestContext | null = null;
  // Clients created here (not injected) get the shared request context
  private readonly ownedClients: RequestClient[] = [];

  private readonly members: MemberListCache;
  private readonly committees: CommitteeSource;
  private readonly bills: BillSource;
  private readonly documents: DocumentSource;
  private readonly textExtractor: TextExtractor;
  private readonly nameMatcher: NameMatcher;

  constructor(options: KnessetServiceOptions = {}) {
    let odata: KnessetODataClient | null = null;
    const odataClient = (): KnessetODataClient => {
      if (!odata) {
        odata = new KnessetODataClient();
        this.ownedClients.push(odata);
      }
      return odata;
    };

    let memberSource = options.memberSource;
    if (!memberSource) {
      const openKnesset = new OpenKnessetClient();
      this.ownedClients.push(openKnesset);
      memberSource = openKnesset;
    }

    this.members = new MemberListCache(memberSource, {
      maxAgeHours: KNESSET_CONFIG.CACHE.MEMBER_MAX_AGE_HOURS,
      ...options.cache,
    });
    this.committees = options.committeeSource ?? odataClient();
    this.bills = options.billSource ?? odataClient();
    this.documents = options.documentSource ?? odataClient();
    this.textExtractor = options.textExtractor ?? new PdfTextExtractor();
    this.nameMatcher = options.nameMatcher ?? new SubstringNameMatcher();
  }

  async initialize(): Promise<void> {
    if (this.requestContext || this.ownedClients.length === 0) return;
    this.requestContext = await request.newContext({ timeout: KNESSET_CONFIG.TIMEOUTS.REQUEST });
    // Share the same request context
    for (const client of this.ownedClients) {
      client.useRequestContext(this.requestContext);
    }
  }

  async close(): Promise<void> {
    if (this.requestContext) {
      await this.requestContext.dispose();
      this.requestContext = null;
    }
    for (const client of this.ownedClients) {
      await client.close();
    }
  }

  /**
   * Drops the memoized member lists so the next lookup refetches them.
   */
  invalidateMembers(isCurrent?: boolean): void {
    this.members.invalidate(isCurrent);
  }

  /**
   * Every MK with a faction membership in the Knesset, sorted by last name.
   */
  async listMembers(knessetNum: number = DEFAULT_KNESSET_NUM): Promise<Person[]> {
    try {
      const members = await this.allMembers();
      return members
        .map((member) => normalizePerson(member, knessetNum))
        .filter((person) => filterByTerm(person.factions, knessetNum).length > 0)
        .sort((a, b) => compareNames(a.lastName, b.lastName));
    } catch (error) {
      return this.upstreamFailure('listMembers', error, []);
    }
  }

  /**
   * Seat count per faction, largest first; equal counts keep roster order.
   */
  async listParties(knessetNum: number = DEFAULT_KNESSET_NUM): Promise<PartyTally[]> {
    const roster = await this.listMembers(knessetNum);
    const counts = new Map<string, number>();
    for (const person of roster) {
      if (person.party) {
        counts.set(person.party, (counts.get(person.party) ?? 0) + 1);
      }
    }

    return [...counts.entries()]
      .map(([party, count]) => ({ party, count }))
      .sort((a, b) => b.count - a.count);
  }

  /**
   * All current and former MKs whose names match the query.
   */
  async findByName(query: string, knessetNum: number = DEFAULT_KNESSET_NUM): Promise<Person[]> {
    try {
      const members = await this.allMembers();
      return members
        .map((member) => normalizePerson(member, knessetNum))
        .filter((person) => this.nameMatcher.matches(person, query));
    } catch (error) {
      return this.upstreamFailure('findByName', error, []);
    }
  }

  /**
   * First name match, flagged when the query was ambiguous. Null when nobody matches.
   */
  async getProfile(
    query: string,
    knessetNum: number = DEFAULT_KNESSET_NUM
  ): Promise<Profile | null> {
    const [first, ...others] = await this.findByName(query, knessetNum);
    if (!first) {
      return null;
    }

    return {
      ...first,
      multipleMatches: others.length > 0,
      otherMatches: others.map((person) => person.fullName),
    };
  }

  async findCommittee(
    query: string,
    knessetNum: number = DEFAULT_KNESSET_NUM
  ): Promise<Committee[]> {
    try {
      const committees = await this.committees.findCommittees(query, knessetNum);
      return filterByTerm(committees.map(normalizeCommittee), knessetNum);
    } catch (error) {
      return this.upstreamFailure('findCommittee', error, []);
    }
  }

  /**
   * Members of a committee in a Knesset term, one entry per person.
   * By default only tenures active now are kept; pass a date for another
   * point in time, or 'all-time' for every tenure in the term.
   */
  async committeeRoster(
    committeeId: number,
    knessetNum: number = DEFAULT_KNESSET_NUM,
    window: RosterWindow = new Date()
  ): Promise<CommitteeMember[]> {
    if (window !== 'all-time') {
      assertValidInstant(window);
    }

    try {
      const positions = await this.committees.fetchCommitteePositions(committeeId, knessetNum);
      const directory = await this.memberDirectory();
      const lookupName: NameLookup = (personId) => {
        const member = directory.get(personId);
        return member && normalizePerson(member, knessetNum).fullName;
      };

      let rows = filterByTerm(
        positions
          .map((position) => normalizePositionRow(position, lookupName))
          .filter((row): row is CommitteePositionRow => row !== null),
        knessetNum
      );
      if (window !== 'all-time') {
        rows = filterActiveAt(rows, window, `committee ${committeeId} position`);
      }

      return mergeCommitteeRoles(rows, (personId) => {
        const member = directory.get(personId);
        return member ? normalizePerson(member, knessetNum).party : null;
      });
    } catch (error) {
      return this.upstreamFailure('committeeRoster', error, []);
    }
  }

  /**
   * Roster of the best committee match for a name: an exact name wins,
   * otherwise the first result.
   */
  async committeeRosterByName(
    query: string,
    knessetNum: number = DEFAULT_KNESSET_NUM,
    window: RosterWindow = new Date()
  ): Promise<CommitteeRoster | null> {
    const committees = await this.findCommittee(query, knessetNum);
    const committee =
      committees.find((candidate) => candidate.name === query.trim()) ?? committees[0];
    if (!committee) {
      return null;
    }

    const members = await this.committeeRoster(committee.committeeId, knessetNum, window);
    return { committee, members };
  }

  /**
   * Most recently updated bill whose name contains the query.
   */
  async findBill(query: string, knessetNum?: number): Promise<Bill | null> {
    try {
      const bill = latestUpdated(await this.bills.findBills(query, knessetNum));
      return bill ? await this.buildBill(bill) : null;
    } catch (error) {
      return this.upstreamFailure('findBill', error, null);
    }
  }

  async billDetails(billId: number): Promise<Bill | null> {
    try {
      const bill = await this.bills.fetchBill(billId);
      return bill ? await this.buildBill(bill) : null;
    } catch (error) {
      return this.upstreamFailure('billDetails', error, null);
    }
  }

  async billText(
    billId: number,
    maxChars: number = KNESSET_CONFIG.LIMITS.BILL_TEXT_MAX_CHARS
  ): Promise<BillText | null> {
    const bill = await this.billDetails(billId);
    return bill ? this.extractBillText(bill, maxChars) : null;
  }

  async billTextByName(
    query: string,
    knessetNum?: number,
    maxChars: number = KNESSET_CONFIG.LIMITS.BILL_TEXT_MAX_CHARS
  ): Promise<BillText | null> {
    const bill = await this.findBill(query, knessetNum);
    return bill ? this.extractBillText(bill, maxChars) : null;
  }

  /**
   * Tries the bill's documents in rank order and returns the first one that
   * yields text. Any failure moves on to the next document.
   */
  private async extractBillText(bill: Bill, maxChars: number): Promise<BillText | null> {
    // Character budget as a non-negative integer
    const limit = Math.max(0, Math.floor(Number(maxChars) || 0));

    for (const document of bill.documents) {
      if (!isExtractableFormat(document.format)) {
        console.log(`Skipping ${document.format || 'unknown'} document: ${document.url}`);
        continue;
      }

      try {
        const data = await this.documents.fetchDocument(document.url);
        const pages = await this.textExtractor.extractPages(data);
        const fullText = pages
          .map((page) => page.trim())
          .filter(Boolean)
          .join('\n\n');

        if (!fullText) {
          console.warn(`No text extracted from ${document.url}`);
          continue;
        }

        const { text, truncated } = truncateText(fullText, limit);
        return {
          billId: bill.billId,
          billName: bill.name,
          text,
          truncated,
          sourceUrl: document.url,
          documentGroup: document.group,
        };
      } catch (error) {
        console.warn(`Failed to extract text from ${document.url}:`, error);
      }
    }

    console.warn(`No text available for bill ${bill.billId} (${bill.name})`);
    return null;
  }

  private async buildBill(raw: RawBill): Promise<Bill> {
    const documents = await this.bills.fetchBillDocuments(raw.BillID);
    const directory = await this.memberDirectory();
    return normalizeBill(raw, documents, (personId) => {
      const member = directory.get(personId);
      return member && normalizePerson(member, raw.KnessetNum ?? DEFAULT_KNESSET_NUM).fullName;
    });
  }

  // Current members first, then former ones not already listed
  private async allMembers(): Promise<RawMember[]> {
    const current = await this.members.get(true);
    const former = await this.members.get(false);

    const seen = new Set<number>();
    const members: RawMember[] = [];
    for (const member of [...current, ...former]) {
      if (seen.has(member.mk_individual_id)) continue;
      seen.add(member.mk_individual_id);
      members.push(member);
    }
    return members;
  }

  /**
   * Members keyed by Knesset person id, for naming rows that arrive without
   * a nested person. Best effort: an unreachable member list gives an empty map.
   */
  private async memberDirectory(): Promise<Map<number, RawMember>> {
    const directory = new Map<number, RawMember>();
    try {
      for (const member of await this.allMembers()) {
        if (typeof member.PersonID === 'number' && !directory.has(member.PersonID)) {
          directory.set(member.PersonID, member);
        }
      }
    } catch (error) {
      if (!(error instanceof UpstreamRequestError)) throw error;
      console.warn('Member list unavailable; names come from position rows only:', error.message);
    }
    return directory;
  }

  private upstreamFailure<T>(operation: string, error: unknown, fallback: T): T {
    if (!(error instanceof UpstreamRequestError)) {
      throw error;
    }
    console.error(`Error in ${operation}:`, error.message);
    return fallback;
  }
}
