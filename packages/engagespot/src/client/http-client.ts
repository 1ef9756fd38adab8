import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { ConfigurationError } from '../errors/errors.js';
import { getLogger } from '../logging/logger.js';
import { USER_AGENT } from '../version.js';

const httpClientLogger = getLogger('http-client');

export const API_KEY_HEADER = 'X-ENGAGESPOT-API-KEY';
export const API_SECRET_HEADER = 'X-ENGAGESPOT-API-SECRET';

// Tab plus visible ASCII.
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e]*$/;

export interface HttpClientConfig {
  /** Replaces the axios network adapter, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

function validateHeaderValue(header: string, value: string): string {
  if (!HEADER_VALUE_PATTERN.test(value)) {
    throw ConfigurationError.invalidHeaderValue(header);
  }
  return value;
}

/**
 * Create the axios instance shared by every call of a client.
 *
 * The instance carries the credentials as default headers, accepts every
 * status code and hands bodies through untouched in both directions: callers
 * send JSON they encoded themselves and receive the response as raw text.
 *
 * @throws ConfigurationError when a credential holds a character that cannot go in a header
 */
export function createHttpClient(apiKey: string, apiSecret: string, config: HttpClientConfig = {}): AxiosInstance {
  const headers = {
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
    [API_KEY_HEADER]: validateHeaderValue(API_KEY_HEADER, apiKey),
    [API_SECRET_HEADER]: validateHeaderValue(API_SECRET_HEADER, apiSecret),
  };

  httpClientLogger.debug('Creating Engagespot HTTP client', { customAdapter: Boolean(config.adapter) });

  return axios.create({
    headers,
    responseType: 'text',
    validateStatus: () => true,
    transformRequest: [(data: unknown) => data],
    transformResponse: [(data: unknown) => data],
    ...(config.adapter && { adapter: config.adapter }),
  });
}
