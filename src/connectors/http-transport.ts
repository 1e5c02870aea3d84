import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { QueryBody, ResponseHeaders } from '../types';
import { FatalApiError, TransientApiError } from '../utils/errors';
import { createSilentLogger, type Logger } from '../utils/logger';
import type { Authenticator } from './auth';
import type { PageTransport, TransportResponse } from './types';

const DEFAULT_TIMEOUT_MS = 60000;

/** Network error codes worth another attempt */
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK'
]);

export interface HttpTransportOptions {
  authenticator: Authenticator;
  timeoutMs?: number;
  logger?: Logger;
  /** Preconfigured client, mainly for tests */
  client?: AxiosInstance;
}

function normalizeHeaders(headers: AxiosResponse['headers']): ResponseHeaders {
  const normalized: ResponseHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    const raw: unknown = value;
    if (Array.isArray(raw)) {
      normalized[key.toLowerCase()] = raw.join(', ');
    } else if (typeof raw === 'string' || typeof raw === 'number') {
      normalized[key.toLowerCase()] = String(raw);
    }
  }
  return normalized;
}

function toText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  return Buffer.isBuffer(data) ? data.toString('utf-8') : String(data);
}

/**
 * POSTs query bodies with axios and hands back the undecoded body. Every
 * status resolves; the retry policy decides what a status means.
 */
export class HttpPageTransport implements PageTransport {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        responseType: 'text',
        // keep the raw text; decoding happens after sanitization
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...options.authenticator.getAuthHeaders()
        }
      });
  }

  async post(url: string, body: QueryBody): Promise<TransportResponse> {
    const started = Date.now();

    try {
      const response = await this.client.post<unknown>(url, body);
      this.logger.logApiCall('POST', url, Date.now() - started, response.status);

      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: toText(response.data)
      };
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }

      this.logger.logApiCall('POST', url, Date.now() - started, undefined, error);

      const code = error.code;
      if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
        throw new TransientApiError(`POST ${url} failed: ${error.message}`, url, undefined, code);
      }

      throw new FatalApiError(`POST ${url} failed: ${error.message}`, url);
    }
  }
}
