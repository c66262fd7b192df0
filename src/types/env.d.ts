declare namespace NodeJS {
  interface ProcessEnv {
    OKNESSET_API_URL?: string;
    KNESSET_ODATA_URL?: string;
    REQUEST_TIMEOUT?: string;
    DEFAULT_KNESSET_NUM?: string;
    BILL_TEXT_MAX_CHARS?: string;
    MEMBER_CACHE_MAX_AGE_HOURS?: string;
    KNESSET_TIME_ZONE?: string;
  }
}
