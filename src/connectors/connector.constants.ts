/** DI token for the ordered list of IRateProvider, most authoritative first. */
export const RATE_PROVIDERS_TOKEN = 'RATE_PROVIDERS';

/** DI token for the IHttpClient shared by the live providers. */
export const HTTP_CLIENT_TOKEN = 'HTTP_CLIENT';

export const PROVIDER_KEYS = ['exchangerate-api', 'coingecko', 'fallback'] as const;
export type ProviderKey = (typeof PROVIDER_KEYS)[number];
