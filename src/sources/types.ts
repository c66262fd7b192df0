import type {
  RawBill,
  RawCommittee,
  RawDocumentBill,
  RawPersonToPosition,
} from './knesset-odata/types';
import type { RawMember } from './open-knesset/types';

export interface MemberSource {
  fetchMembers(isCurrent: boolean): Promise<RawMember[]>;
}

export interface CommitteeSource {
  findCommittees(name: string, knessetNum: number): Promise<RawCommittee[]>;
  fetchCommitteePositions(committeeId: number, knessetNum: number): Promise<RawPersonToPosition[]>;
}

export interface BillSource {
  findBills(query: string, knessetNum?: number): Promise<RawBill[]>;
  fetchBill(billId: number): Promise<RawBill | null>;
  fetchBillDocuments(billId: number): Promise<RawDocumentBill[]>;
}

export interface DocumentSource {
  fetchDocument(url: string): Promise<Uint8Array>;
}
