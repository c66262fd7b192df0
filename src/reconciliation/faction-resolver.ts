import type { FactionMembership } from '../types';
import { filterByTerm } from './term-filter';

/**
 * The faction membership that represents a Knesset term: the one that started
 * last. Memberships with the same start date keep input order, so the first
 * of them wins.
 */
export function resolveFaction(
  factions: readonly FactionMembership[],
  knessetNum: number
): FactionMembership | null {
  let latest: FactionMembership | null = null;
  for (const faction of filterByTerm(factions, knessetNum)) {
    if (!latest || (faction.startDate ?? '') > (latest.startDate ?? '')) {
      latest = faction;
    }
  }
  return latest;
}
