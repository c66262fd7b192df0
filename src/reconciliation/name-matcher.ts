import type { Person } from '../types';

export type NameFields = Pick<Person, 'firstName' | 'lastName' | 'altNames'>;

/**
 * Strategy deciding whether a free-text query identifies a person.
 */
export interface NameMatcher {
  matches(person: NameFields, query: string): boolean;
}

/**
 * Every rendering a person can be looked up by: "first last", "last first",
 * each name alone, and the alternate spellings.
 */
export function nameCandidates(person: NameFields): string[] {
  const { firstName, lastName } = person;
  return [
    `${firstName} ${lastName}`.trim(),
    `${lastName} ${firstName}`.trim(),
    firstName,
    lastName,
    ...person.altNames,
  ];
}

function fold(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

/**
 * Permissive matcher: exact equality, or containment in either direction
 * after case folding. A query that carries a title ("ח"כ ...") still finds
 * the stored name it contains; an empty query is contained in every name.
 */
export class SubstringNameMatcher implements NameMatcher {
  matches(person: NameFields, query: string): boolean {
    const trimmed = query.trim();
    const foldedQuery = fold(trimmed);

    return nameCandidates(person).some((candidate) => {
      const name = candidate.trim();
      if (!name) return false;
      if (name === trimmed) return true;

      const foldedName = fold(name);
      return foldedName.includes(foldedQuery) || foldedQuery.includes(foldedName);
    });
  }
}
