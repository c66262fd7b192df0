import { DUTY_MARKERS } from '../constants';
import type { CommitteeMember, CommitteePositionRow, RoleKind } from '../types';
import { compareNames } from './collation';

const ROLE_RANK: Record<RoleKind, number> = {
  acting: 0,
  member: 1,
  deputy: 2,
  chair: 3,
};

/**
 * Classifies a committee duty label. Acting and deputy markers are checked
 * before the chair marker because their labels also contain it
 * ("ממלא מקום יו"ר", "סגן יו"ר").
 */
export function classifyDuty(label: string): RoleKind {
  const duty = label.trim();
  if (DUTY_MARKERS.ACTING.some((marker) => duty.includes(marker))) return 'acting';
  if (DUTY_MARKERS.DEPUTY.some((marker) => duty.includes(marker))) return 'deputy';
  if (DUTY_MARKERS.CHAIR.some((marker) => duty.includes(marker))) return 'chair';
  return 'member';
}

function earliest(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return b < a ? b : a;
}

// null finish date means the tenure is still open
function latestFinish(a: string | null, b: string | null): string | null {
  if (!a || !b) return null;
  return b > a ? b : a;
}

/**
 * Collapses a committee's position rows into one entry per person.
 * Acting rows are left out; the primary role is the highest-ranked one seen.
 */
export function mergeCommitteeRoles(
  rows: readonly CommitteePositionRow[],
  resolveParty: (personId: number) => string | null = () => null
): CommitteeMember[] {
  const merged = new Map<number, CommitteeMember>();

  for (const row of rows) {
    if (row.roleKind === 'acting') continue;

    const existing = merged.get(row.personId);
    if (!existing) {
      merged.set(row.personId, {
        personId: row.personId,
        fullName: row.fullName,
        role: row.duty,
        roleKind: row.roleKind,
        roles: row.duty ? [row.duty] : [],
        startDate: row.startDate,
        finishDate: row.finishDate,
        party: null,
      });
      continue;
    }

    if (row.duty && !existing.roles.includes(row.duty)) {
      existing.roles.push(row.duty);
    }

    const rank = ROLE_RANK[row.roleKind];
    const currentRank = ROLE_RANK[existing.roleKind];
    if (rank > currentRank || (rank === currentRank && !existing.role && row.duty)) {
      existing.role = row.duty;
      existing.roleKind = row.roleKind;
    }

    if (!existing.fullName) existing.fullName = row.fullName;
    existing.startDate = earliest(existing.startDate, row.startDate);
    existing.finishDate = latestFinish(existing.finishDate, row.finishDate);
  }

  return [...merged.values()]
    .map((member) => ({ ...member, party: resolveParty(member.personId) }))
    .sort((a, b) => compareNames(a.fullName, b.fullName));
}
