import type { RawMember } from './sources/open-knesset/types';
import type { MemberSource } from './sources/types';

export interface CacheOptions {
  maxAgeHours?: number; // Default: 0, never expires
}

interface CacheEntry {
  members: Promise<RawMember[]>;
  storedAt: number;
}

/**
 * Check if a cache entry is still valid
 */
export function isCacheValid(
  storedAt: number,
  maxAgeHours: number = 0,
  now: number = Date.now()
): boolean {
  if (maxAgeHours <= 0) {
    return true;
  }

  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  return now - storedAt < maxAgeMs;
}

/**
 * Process-wide memo of the two member lists (current and former), keyed by
 * the is-current flag. Concurrent callers share one in-flight fetch; a failed
 * fetch is forgotten so the next call tries again.
 */
export class MemberListCache {
  private readonly entries = new Map<boolean, CacheEntry>();
  private readonly maxAgeHours: number;

  constructor(
    private readonly source: MemberSource,
    options: CacheOptions = {}
  ) {
    this.maxAgeHours = options.maxAgeHours ?? 0;
  }

  get(isCurrent: boolean): Promise<RawMember[]> {
    const cached = this.entries.get(isCurrent);
    if (cached && isCacheValid(cached.storedAt, this.maxAgeHours)) {
      return cached.members;
    }

    const members = Promise.resolve().then(() => this.source.fetchMembers(isCurrent));
    const entry: CacheEntry = { members, storedAt: Date.now() };
    this.entries.set(isCurrent, entry);

    void members.catch(() => {
      if (this.entries.get(isCurrent) === entry) {
        this.entries.delete(isCurrent);
      }
    });
    return members;
  }

  /**
   * Drop one list, or both when no flag is given
   */
  invalidate(isCurrent?: boolean): void {
    if (isCurrent === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(isCurrent);
    }
  }
}
