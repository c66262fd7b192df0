import { expect, test } from '@playwright/test';
import {
  normalizeBill,
  normalizeCommittee,
  normalizeDocument,
  normalizePerson,
  normalizePositionRow,
} from '../src/reconciliation/normalizer';
import {
  BILL_DOCUMENTS,
  BILLS,
  COMMITTEES,
  CURRENT_MEMBERS,
  FINANCE_POSITIONS,
  GAZETTE_URL,
} from './helpers/fakes';

test.describe('normalizePerson', () => {
  test('should map a full member record for the requested term', () => {
    const [netanyahu] = CURRENT_MEMBERS;
    if (!netanyahu) throw new Error('fixture missing');

    const person = normalizePerson(netanyahu, 25);

    expect(person.mkId).toBe(1);
    expect(person.personId).toBe(101);
    expect(person.fullName).toBe('בנימין נתניהו');
    expect(person.altNames).toEqual(['ביבי', 'Benjamin Netanyahu']);
    expect(person.email).toBe('mk1@example.test');
    expect(person.isCurrent).toBe(true);
    expect(person.party).toBe('הליכוד');
    expect(person.factions).toHaveLength(2);
    expect(person.ministryPositions).toEqual([
      {
        ministry: 'משרד ראש הממשלה',
        position: 'ראש הממשלה',
        startDate: '2022-12-29T00:00:00',
        finishDate: null,
        knessetNum: 25,
      },
    ]);
  });

  test('should fill defaults for a record carrying only its id', () => {
    expect(normalizePerson({ mk_individual_id: 9 }, 25)).toEqual({
      mkId: 9,
      personId: null,
      firstName: '',
      lastName: '',
      fullName: '',
      altNames: [],
      isCurrent: false,
      email: null,
      party: null,
      factions: [],
      ministryPositions: [],
      committeePositions: [],
    });
  });

  test('should skip null list elements and memberships without a term', () => {
    const person = normalizePerson(
      {
        mk_individual_id: 8,
        mk_individual_first_name: ' יעל ',
        mk_individual_name: 'לוי',
        altnames: [null, ' ', 'Yael Levi'],
        factions: [null, { faction_name: 'ללא סיעה', knesset: null }, { faction_name: 'העבודה', knesset: 25 }],
        committee_positions: [
          null,
          { committee_id: 10, committee_name: 'ועדת הכספים', position_name: 'חברת הוועדה', knesset: 25 },
          { committee_id: 12, committee_name: 'ועדת הכספים', position_name: 'חברת הוועדה', knesset: 24 },
        ],
      },
      25
    );

    expect(person.fullName).toBe('יעל לוי');
    expect(person.altNames).toEqual(['Yael Levi']);
    expect(person.factions.map((faction) => faction.name)).toEqual(['העבודה']);
    expect(person.party).toBe('העבודה');
    expect(person.committeePositions.map((position) => position.committeeId)).toEqual([10]);
  });

  test('should have no party in a term without a membership', () => {
    const [netanyahu] = CURRENT_MEMBERS;
    if (!netanyahu) throw new Error('fixture missing');
    expect(normalizePerson(netanyahu, 20).party).toBeNull();
  });

  test('should not modify its input', () => {
    const [netanyahu] = CURRENT_MEMBERS;
    if (!netanyahu) throw new Error('fixture missing');
    const before = structuredClone(netanyahu);

    normalizePerson(netanyahu, 25);

    expect(netanyahu).toEqual(before);
  });
});

test.describe('Committee and position rows', () => {
  test('normalizeCommittee should map committee fields', () => {
    const [, finance] = COMMITTEES;
    if (!finance) throw new Error('fixture missing');

    expect(normalizeCommittee(finance)).toEqual({
      committeeId: 10,
      name: 'ועדת הכספים',
      knessetNum: 25,
      isCurrent: true,
      type: 'ועדה קבועה',
      category: null,
      email: null,
    });
  });

  test('normalizePositionRow should prefer the nested person name', () => {
    const [first] = FINANCE_POSITIONS;
    if (!first) throw new Error('fixture missing');

    expect(normalizePositionRow(first, () => 'someone else')).toEqual({
      personId: 101,
      fullName: 'בנימין נתניהו',
      duty: 'חבר הוועדה',
      roleKind: 'member',
      startDate: '2023-01-01T00:00:00',
      finishDate: null,
      knessetNum: 25,
    });
  });

  test('normalizePositionRow should fall back to the name lookup and the position description', () => {
    const row = normalizePositionRow(
      {
        PersonToPositionID: 40,
        PersonID: 102,
        KnessetNum: 25,
        KNS_Position: { PositionID: 41, Description: 'יו"ר הוועדה' },
      },
      (personId) => (personId === 102 ? 'יאיר לפיד' : undefined)
    );

    expect(row?.fullName).toBe('יאיר לפיד');
    expect(row?.duty).toBe('יו"ר הוועדה');
    expect(row?.roleKind).toBe('chair');
  });

  test('normalizePositionRow should drop rows without a person', () => {
    expect(normalizePositionRow({ PersonToPositionID: 50, DutyDesc: 'חבר הוועדה' })).toBeNull();
  });
});

test.describe('Bills', () => {
  test('normalizeDocument should turn backslashes into slashes', () => {
    const [gazette] = BILL_DOCUMENTS;
    if (!gazette) throw new Error('fixture missing');
    expect(normalizeDocument(gazette).url).toBe(GAZETTE_URL);
  });

  test('normalizeBill should order initiators and rank documents', () => {
    const [, bill] = BILLS;
    if (!bill) throw new Error('fixture missing');

    const normalized = normalizeBill(bill, BILL_DOCUMENTS, () => 'יאיר לפיד');

    expect(normalized.billId).toBe(501);
    expect(normalized.status).toBe('התקבלה בקריאה שלישית');
    expect(normalized.subType).toBe('פרטית');
    expect(normalized.number).toBe(1234);
    expect(normalized.initiators).toEqual([
      { personId: 101, fullName: 'בנימין נתניהו', isInitiator: true, ordinal: 1 },
      { personId: 102, fullName: 'יאיר לפיד', isInitiator: true, ordinal: 2 },
    ]);
    expect(normalized.documents.map((document) => document.documentId)).toEqual([2, 1, 3]);
  });

  test('normalizeBill should accept a bill without documents or initiators', () => {
    const normalized = normalizeBill({ BillID: 7 }, []);
    expect(normalized.name).toBe('');
    expect(normalized.status).toBeNull();
    expect(normalized.initiators).toEqual([]);
    expect(normalized.documents).toEqual([]);
  });
});
