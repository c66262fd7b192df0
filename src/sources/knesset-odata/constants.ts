import { KNESSET_CONFIG } from '../../constants';

// Configuration constants for the Knesset OData (v4) service
export const KNESSET_ODATA_CONFIG = {
  URLS: {
    BASE_URL: KNESSET_CONFIG.URLS.KNESSET_ODATA,
  },
  ENTITIES: {
    COMMITTEE: '/KNS_Committee',
    PERSON_TO_POSITION: '/KNS_PersonToPosition',
    BILL: '/KNS_Bill',
    DOCUMENT_BILL: '/KNS_DocumentBill',
  },
  EXPAND: {
    PERSON_TO_POSITION: 'KNS_Person,KNS_Position',
    BILL: 'KNS_Status,KNS_BillInitiators($expand=KNS_Person)',
  },
  PAGE_SIZE: {
    COMMITTEES: 100,
    POSITIONS: 200,
    BILLS: 1,
    DOCUMENTS: 100,
  },
} as const;
