export const PROXY_CATALOG = 'PROXY_CATALOG';
export const PROXY_STATE_STORE = 'PROXY_STATE_STORE';

export const PROXY_STATE_VERSION = 2;
