export { OpenKnessetClient } from './client';
export { OPEN_KNESSET_CONFIG } from './constants';
export * from './types';
