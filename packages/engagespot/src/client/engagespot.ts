import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { createHttpClient } from './http-client.js';
import { DEFAULT_BASE_URL, loadEngagespotConfig, type EnvSource } from '../config/environment-config.js';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import type { Notification } from '../notifications/notification.js';
import type { EngagespotResult, HttpMethod } from '../types.js';

const logger = getLogger('engagespot-client');

// Applied per request so an injected instance gets the same wire behaviour.
const RAW_TEXT_EXCHANGE: AxiosRequestConfig = {
  headers: { 'Content-Type': 'application/json' },
  responseType: 'text',
  validateStatus: () => true,
  transformRequest: [(data: unknown) => data],
  transformResponse: [(data: unknown) => data],
};

export interface EngagespotClientOptions {
  baseUrl: string;
  httpClient: AxiosInstance;
}

/**
 * Builder for the Engagespot client. The HTTP client, credentials included,
 * is created as soon as the builder is, so bad credentials fail here.
 *
 * @example
 * const engagespot = new EngagespotBuilder('key', 'secret')
 *   .baseUrl('https://engagespot.internal.example.com/v3')
 *   .build();
 */
export class EngagespotBuilder {
  private url: string = DEFAULT_BASE_URL;
  private client: AxiosInstance;

  /**
   * @throws ConfigurationError when a credential cannot be sent as a header value
   */
  constructor(apiKey: string, apiSecret: string) {
    this.client = createHttpClient(apiKey, apiSecret);
  }

  /**
   * Override the API base URL. Only needed for self-hosted Engagespot.
   */
  baseUrl(baseUrl: string): this {
    this.url = baseUrl;
    return this;
  }

  /**
   * Use a preconfigured axios instance. It replaces the one built from the
   * credentials, so it must send the auth headers itself (see createHttpClient).
   * Body encoding and status handling are set per request and do not depend on
   * the instance's defaults.
   */
  httpClient(client: AxiosInstance): this {
    this.client = client;
    return this;
  }

  build(): Engagespot {
    return new Engagespot({ baseUrl: this.url, httpClient: this.client });
  }
}

/**
 * Engagespot API client. Safe to share: it holds no per-call state.
 *
 * Both operations resolve to an EngagespotResult and never reject.
 */
export class Engagespot {
  readonly baseUrl: string;
  private readonly httpClient: AxiosInstance;

  constructor(options: EngagespotClientOptions) {
    this.baseUrl = options.baseUrl;
    this.httpClient = options.httpClient;
  }

  /**
   * Client with the default configuration.
   */
  static create(apiKey: string, apiSecret: string): Engagespot {
    return new EngagespotBuilder(apiKey, apiSecret).build();
  }

  static builder(apiKey: string, apiSecret: string): EngagespotBuilder {
    return new EngagespotBuilder(apiKey, apiSecret);
  }

  /**
   * Client configured from ENGAGESPOT_API_KEY, ENGAGESPOT_API_SECRET and
   * the optional ENGAGESPOT_BASE_URL.
   */
  static fromEnv(env?: EnvSource): Engagespot {
    const config = loadEngagespotConfig(env);
    return new EngagespotBuilder(config.apiKey, config.apiSecret).baseUrl(config.baseUrl).build();
  }

  /**
   * Send a notification built with NotificationBuilder.
   *
   * @example
   * const result = await engagespot.send(new NotificationBuilder('Hello', ['jane@example.com']).build());
   * if (!result.success) console.error(result.error);
   */
  async send<T>(notification: Notification<T>): Promise<EngagespotResult> {
    return this.request('POST', 'notifications', notification);
  }

  /**
   * Create the user if needed and set the given attributes. The identifier is
   * placed in the path as-is.
   */
  async createOrUpdateUserAttrs<T>(identifier: string, attrs: T): Promise<EngagespotResult> {
    return this.request('PUT', `users/${identifier}`, attrs);
  }

  private async request(method: HttpMethod, path: string, payload: unknown): Promise<EngagespotResult> {
    const url = this.getUrl(path);

    let body: string;
    try {
      body = encodeBody(payload);
    } catch (error) {
      const serialized = serializeError(error);
      logger.error('Failed to encode Engagespot request body', { method, url, error: serialized });
      return { success: false, kind: 'serialization', error: serialized.message };
    }

    logger.debug('Engagespot request', { method, url });
    const startTime = Date.now();

    try {
      const response = await this.httpClient.request<unknown>({ ...RAW_TEXT_EXCHANGE, method, url, data: body });
      const durationMs = Date.now() - startTime;
      const text = toText(response.data);

      if (response.status < 200 || response.status >= 300) {
        logger.warn('Engagespot request rejected', { method, url, status: response.status, durationMs });
        return { success: false, kind: 'http', status: response.status, error: text };
      }

      logger.debug('Engagespot request succeeded', { method, url, status: response.status, durationMs });
      return { success: true, status: response.status, data: text };
    } catch (error) {
      const serialized = serializeError(error);
      logger.error('Engagespot request failed', { method, url, error: serialized });
      return { success: false, kind: 'transport', error: serialized.message };
    }
  }

  private getUrl(path: string): string {
    return `${this.baseUrl}/${path}`;
  }
}

// undefined encodes as null, the way an absent optional payload goes on the wire
function encodeBody(payload: unknown): string {
  const json: string | undefined = JSON.stringify(payload);
  return json ?? 'null';
}

function toText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}
