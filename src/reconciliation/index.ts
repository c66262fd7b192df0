export { compareNames, nameCollator } from './collation';
export {
  hasUsableUrl,
  isExtractableFormat,
  rankDocuments,
  stagePriority,
} from './document-ranker';
export { resolveFaction } from './faction-resolver';
export {
  type NameFields,
  type NameMatcher,
  nameCandidates,
  SubstringNameMatcher,
} from './name-matcher';
export {
  type NameLookup,
  normalizeBill,
  normalizeCommittee,
  normalizeDocument,
  normalizeFactions,
  normalizePerson,
  normalizePositionRow,
} from './normalizer';
export { classifyDuty, mergeCommitteeRoles } from './role-merger';
export {
  type Activity,
  activityAt,
  assertValidInstant,
  type DatedRecord,
  filterActiveAt,
  filterByTerm,
  isActiveAt,
  parseDate,
  type TermScoped,
} from './term-filter';
