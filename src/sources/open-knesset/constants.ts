import { KNESSET_CONFIG } from '../../constants';

// Configuration constants for the Open Knesset backend
export const OPEN_KNESSET_CONFIG = {
  URLS: {
    BASE_URL: KNESSET_CONFIG.URLS.OKNESSET_API,
  },
  ENDPOINTS: {
    MEMBERS: '/members',
  },
} as const;
