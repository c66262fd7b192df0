import { DOCUMENT_STAGE_PRIORITY, EXTRACTABLE_FORMATS } from '../constants';
import type { BillDocument } from '../types';

export function stagePriority(group: string): number {
  const label = group.trim();
  const index = DOCUMENT_STAGE_PRIORITY.findIndex((stage) => stage === label);
  return index === -1 ? DOCUMENT_STAGE_PRIORITY.length : index;
}

export function isExtractableFormat(format: string): boolean {
  const normalized = format.trim().toUpperCase();
  return EXTRACTABLE_FORMATS.some((accepted) => accepted === normalized);
}

/**
 * Accepts absolute http(s) URLs only
 */
export function hasUsableUrl(document: BillDocument): boolean {
  if (!document.url) return false;
  try {
    const url = new URL(document.url);
    return ['http:', 'https:'].includes(url.protocol);
  } catch (_error) {
    return false;
  }
}

/**
 * Orders a bill's documents so the best text source comes first. Groups outside
 * the stage list go last, keeping their relative order.
 */
export function rankDocuments(documents: readonly BillDocument[]): BillDocument[] {
  return documents
    .filter(hasUsableUrl)
    .sort((a, b) => stagePriority(a.group) - stagePriority(b.group));
}
