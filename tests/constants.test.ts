import { expect, test } from '@playwright/test';
import {
  DEFAULT_KNESSET_NUM,
  DOCUMENT_STAGE_PRIORITY,
  DUTY_MARKERS,
  EXTRACTABLE_FORMATS,
  KNESSET_CONFIG,
} from '../src/constants';
import { KNESSET_ODATA_CONFIG } from '../src/sources/knesset-odata';
import { OPEN_KNESSET_CONFIG } from '../src/sources/open-knesset';

test.describe('Constants', () => {
  test('DOCUMENT_STAGE_PRIORITY should list the four bill stages without duplicates', () => {
    expect(DOCUMENT_STAGE_PRIORITY).toHaveLength(4);
    expect(new Set(DOCUMENT_STAGE_PRIORITY).size).toBe(4);
    expect(DOCUMENT_STAGE_PRIORITY[0]).toBe('הצעת חוק לקריאה השנייה והשלישית');
    expect(DOCUMENT_STAGE_PRIORITY[3]).toBe('חוק - פרסום ברשומות');
  });

  test('EXTRACTABLE_FORMATS should be upper case', () => {
    for (const format of EXTRACTABLE_FORMATS) {
      expect(format).toBe(format.toUpperCase());
    }
  });

  test('DUTY_MARKERS should cover both quotation styles of the chair abbreviation', () => {
    expect(DUTY_MARKERS.CHAIR).toContain('יו"ר');
    expect(DUTY_MARKERS.CHAIR).toContain('יו״ר');
    expect(DUTY_MARKERS.ACTING).toContain('מ"מ');
    expect(DUTY_MARKERS.ACTING).toContain('מ״מ');
  });

  test('KNESSET_CONFIG should have sensible defaults', () => {
    expect(DEFAULT_KNESSET_NUM).toBeGreaterThan(0);
    expect(KNESSET_CONFIG.TIMEOUTS.REQUEST).toBeGreaterThan(0);
    expect(KNESSET_CONFIG.LIMITS.BILL_TEXT_MAX_CHARS).toBeGreaterThan(0);
    expect(KNESSET_CONFIG.CACHE.MEMBER_MAX_AGE_HOURS).toBeGreaterThanOrEqual(0);
  });

  test('source URLs should be absolute https URLs', () => {
    for (const url of [OPEN_KNESSET_CONFIG.URLS.BASE_URL, KNESSET_ODATA_CONFIG.URLS.BASE_URL]) {
      expect(new URL(url).protocol).toBe('https:');
    }
  });
});
