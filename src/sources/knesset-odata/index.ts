export { KnessetODataClient, odataString } from './client';
export { KNESSET_ODATA_CONFIG } from './constants';
export * from './types';
