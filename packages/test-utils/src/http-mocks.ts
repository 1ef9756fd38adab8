import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  /** Header names lower-cased. */
  headers: Record<string, string>;
  data: unknown;
}

export type MockReply = { status: number; data?: string } | { networkError: string; code?: string };

export interface MockAdapter {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
  /** Queue a reply for the next unanswered request. */
  reply(reply: MockReply): MockAdapter;
}

function toHeaderRecord(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON(true))) {
    if (value !== null && value !== undefined) {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return headers;
}

/**
 * In-process stand-in for the axios network adapter. Records every request
 * and answers from the reply queue, falling back to `defaultReply`.
 */
export function createMockAdapter(defaultReply: MockReply = { status: 200, data: '' }): MockAdapter {
  const requests: RecordedRequest[] = [];
  const queue: MockReply[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse<string>> => {
    requests.push({
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      headers: toHeaderRecord(config),
      data: config.data,
    });

    const next = queue.shift() ?? defaultReply;
    if ('networkError' in next) {
      throw new AxiosError(next.networkError, next.code ?? AxiosError.ERR_NETWORK, config);
    }

    const response: AxiosResponse<string> = {
      data: next.data ?? '',
      status: next.status,
      statusText: String(next.status),
      headers: {},
      config,
    };

    // Same settle step the built-in adapters run.
    if (config.validateStatus && !config.validateStatus(response.status)) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      );
    }

    return response;
  };

  const mock: MockAdapter = {
    adapter,
    requests,
    reply(reply: MockReply): MockAdapter {
      queue.push(reply);
      return mock;
    },
  };

  return mock;
}
