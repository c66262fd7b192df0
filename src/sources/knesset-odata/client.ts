import type { z } from 'zod';
import { UpstreamRequestError } from '../../errors';
import { type QueryParams, RequestClient } from '../request-client';
import type { BillSource, CommitteeSource, DocumentSource } from '../types';
import { KNESSET_ODATA_CONFIG } from './constants';
import {
  ODataCollectionSchema,
  type RawBill,
  RawBillSchema,
  type RawCommittee,
  RawCommitteeSchema,
  type RawDocumentBill,
  RawDocumentBillSchema,
  type RawPersonToPosition,
  RawPersonToPositionSchema,
} from './types';

const { ENTITIES, EXPAND, PAGE_SIZE } = KNESSET_ODATA_CONFIG;

/**
 * Quotes a value as an OData string literal (single quotes doubled).
 */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class KnessetODataClient
  extends RequestClient
  implements CommitteeSource, BillSource, DocumentSource
{
  protected readonly baseUrl: string = KNESSET_ODATA_CONFIG.URLS.BASE_URL;

  async findCommittees(name: string, knessetNum: number): Promise<RawCommittee[]> {
    return this.query(ENTITIES.COMMITTEE, RawCommitteeSchema, 'committee', {
      $filter: `contains(Name,${odataString(name.trim())}) and KnessetNum eq ${knessetNum}`,
      $top: PAGE_SIZE.COMMITTEES,
    });
  }

  async fetchCommitteePositions(
    committeeId: number,
    knessetNum: number
  ): Promise<RawPersonToPosition[]> {
    return this.query(ENTITIES.PERSON_TO_POSITION, RawPersonToPositionSchema, 'position', {
      $filter: `CommitteeID eq ${committeeId} and KnessetNum eq ${knessetNum}`,
      $expand: EXPAND.PERSON_TO_POSITION,
      $top: PAGE_SIZE.POSITIONS,
    });
  }

  /**
   * Bills whose name contains the query, most recently updated first.
   */
  async findBills(query: string, knessetNum?: number): Promise<RawBill[]> {
    const clauses = [`contains(Name,${odataString(query.trim())})`];
    if (knessetNum !== undefined) {
      clauses.push(`KnessetNum eq ${knessetNum}`);
    }

    return this.query(ENTITIES.BILL, RawBillSchema, 'bill', {
      $filter: clauses.join(' and '),
      $expand: EXPAND.BILL,
      $orderby: 'LastUpdatedDate desc',
      $top: PAGE_SIZE.BILLS,
    });
  }

  async fetchBill(billId: number): Promise<RawBill | null> {
    const bills = await this.query(ENTITIES.BILL, RawBillSchema, 'bill', {
      $filter: `BillID eq ${billId}`,
      $expand: EXPAND.BILL,
      $top: 1,
    });
    return bills[0] ?? null;
  }

  async fetchBillDocuments(billId: number): Promise<RawDocumentBill[]> {
    return this.query(ENTITIES.DOCUMENT_BILL, RawDocumentBillSchema, 'document', {
      $filter: `BillID eq ${billId}`,
      $top: PAGE_SIZE.DOCUMENTS,
    });
  }

  async fetchDocument(url: string): Promise<Uint8Array> {
    console.log(`Downloading document: ${url}`);
    return this.getBytes(url);
  }

  private async query<T>(
    entity: string,
    schema: z.ZodType<T>,
    label: string,
    params: QueryParams
  ): Promise<T[]> {
    const payload = await this.getJson(entity, params);
    const collection = ODataCollectionSchema.safeParse(payload);
    if (!collection.success) {
      throw new UpstreamRequestError(
        `${this.baseUrl}${entity}`,
        200,
        'expected an OData collection'
      );
    }
    return this.parseRecords(schema, collection.data.value, label);
  }
}
