import { z } from 'zod';
import { UpstreamRequestError } from '../../errors';
import { RequestClient } from '../request-client';
import type { MemberSource } from '../types';
import { OPEN_KNESSET_CONFIG } from './constants';
import { type RawMember, RawMemberSchema } from './types';

const MemberListSchema = z.array(z.unknown());

export class OpenKnessetClient extends RequestClient implements MemberSource {
  protected readonly baseUrl: string = OPEN_KNESSET_CONFIG.URLS.BASE_URL;

  /**
   * Fetches every current (or every former) member with their faction,
   * ministry and committee history.
   */
  async fetchMembers(isCurrent: boolean): Promise<RawMember[]> {
    const label = isCurrent ? 'current' : 'former';
    console.log(`Fetching ${label} members from Open Knesset...`);

    const payload = await this.getJson(OPEN_KNESSET_CONFIG.ENDPOINTS.MEMBERS, {
      is_current: isCurrent ? 'true' : 'false',
    });
    const list = MemberListSchema.safeParse(payload);
    if (!list.success) {
      throw new UpstreamRequestError(
        `${this.baseUrl}${OPEN_KNESSET_CONFIG.ENDPOINTS.MEMBERS}`,
        200,
        'expected a member array'
      );
    }

    const members = this.parseRecords(RawMemberSchema, list.data, 'member');
    console.log(`Fetched ${members.length} ${label} members`);
    return members;
  }
}
