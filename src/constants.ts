// Knesset number used when a caller does not name one
export const DEFAULT_KNESSET_NUM = Number(process.env.DEFAULT_KNESSET_NUM) || 25;

// Configuration constants for upstream requests
export const KNESSET_CONFIG = {
  URLS: {
    OKNESSET_API: process.env.OKNESSET_API_URL || 'https://backend.oknesset.org',
    KNESSET_ODATA: process.env.KNESSET_ODATA_URL || 'https://knesset.gov.il/OdataV4/ParliamentInfo',
  },
  TIMEOUTS: {
    REQUEST: Number(process.env.REQUEST_TIMEOUT) || 15000,
  },
  LIMITS: {
    BILL_TEXT_MAX_CHARS: Number(process.env.BILL_TEXT_MAX_CHARS) || 20000,
  },
  // Zone of upstream timestamps that carry no offset
  TIME_ZONE: process.env.KNESSET_TIME_ZONE || 'Asia/Jerusalem',
  CACHE: {
    // 0 keeps member lists for the lifetime of the process
    MEMBER_MAX_AGE_HOURS: Number(process.env.MEMBER_CACHE_MAX_AGE_HOURS) || 0,
  },
} as const;

// Bill document groups, best text source first
export const DOCUMENT_STAGE_PRIORITY = [
  'הצעת חוק לקריאה השנייה והשלישית', // second/third reading
  'הצעת חוק לקריאה הראשונה', // first reading
  'חוק - נוסח משולב', // consolidated law
  'חוק - פרסום ברשומות', // official gazette
] as const;

// Document formats the text extractor is tried on
export const EXTRACTABLE_FORMATS = ['PDF', 'PPT'] as const;

// Substrings of committee duty labels, checked in this order
export const DUTY_MARKERS = {
  ACTING: ['ממלא מקום', 'ממלאת מקום', 'מ"מ', 'מ״מ'],
  DEPUTY: ['סגן', 'סגנית'],
  CHAIR: [
    'יו"ר',
    'יו״ר',
    'יושב ראש',
    'יושבת ראש',
    'יושב-ראש',
    'יושבת-ראש',
  ],
} as const;
