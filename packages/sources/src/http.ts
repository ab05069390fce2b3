/**
 * JSON-over-HTTP client for remote annotation sources
 *
 * Features:
 * - Retry with exponential backoff on 429 (honours Retry-After), 5xx and timeouts
 * - Per-request timeout
 * - Structured logging (paths only, never query secrets)
 * - Bodies come back as `unknown`; callers validate them
 */

import { createLogger, type Logger } from '@allelebase/config';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface HttpClient {
  getJson(path: string): Promise<unknown>;
  postJson(path: string, body: unknown): Promise<unknown>;
}

const MAX_BACKOFF_MS = 10_000;
const BODY_EXCERPT_LENGTH = 500;

export class HttpError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody = '') {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export function excerpt(text: string): string {
  return text.length > BODY_EXCERPT_LENGTH ? text.substring(0, BODY_EXCERPT_LENGTH) + '...' : text;
}

export function backoffMs(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), MAX_BACKOFF_MS);
}

function retryAfterMs(header: string | null, attempt: number): number {
  if (header) {
    const seconds = Number.parseInt(header, 10);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.min(seconds * 1000, MAX_BACKOFF_MS);
    }
  }
  return backoffMs(attempt);
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createHttpClient(config: HttpClientConfig): HttpClient {
  const baseUrl = config.baseUrl.replace(/\/$/, '');
  const timeoutMs = config.timeoutMs ?? 30_000;
  const maxRetries = config.maxRetries ?? 3;
  const fetchImpl: FetchLike = config.fetchImpl ?? ((url, init) => fetch(url, init));
  const sleep = config.sleep ?? defaultSleep;
  const logger = config.logger ?? createLogger('http');

  async function request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    const startTime = Date.now();

    logger.debug({ event: 'http.request.start', method, path }, 'HTTP request');

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < maxRetries;
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      let response: Response;
      let responseText: string;
      try {
        response = await fetchImpl(url, {
          method,
          headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });

        if ((response.status === 429 || response.status >= 500) && canRetry) {
          clearTimeout(timeoutId);
          const waitMs =
            response.status === 429 ? retryAfterMs(response.headers.get('Retry-After'), attempt) : backoffMs(attempt);
          logger.warn(
            { event: 'http.request.retry', method, path, status: response.status, attempt: attempt + 1, waitMs },
            'Retryable response, backing off'
          );
          await response.body?.cancel();
          await sleep(waitMs);
          continue;
        }

        // The timeout covers the body as well as the headers
        responseText = await response.text();
      } catch (error: unknown) {
        if (error instanceof Error && error.name === 'AbortError') {
          if (canRetry) {
            const waitMs = backoffMs(attempt);
            logger.warn(
              { event: 'http.request.retry', method, path, reason: 'timeout', attempt: attempt + 1, waitMs },
              'Request timed out, retrying'
            );
            await sleep(waitMs);
            continue;
          }
          logger.error(
            { event: 'http.request.fail', method, path, status: 408, durationMs: Date.now() - startTime },
            'Request timed out'
          );
          throw new HttpError(`Request timeout (${timeoutMs}ms): ${method} ${path}`, 408);
        }
        throw error;
      } finally {
        clearTimeout(timeoutId);
      }
      const durationMs = Date.now() - startTime;

      if (!response.ok) {
        logger.warn(
          { event: 'http.request.fail', method, path, status: response.status, durationMs },
          'Request failed'
        );
        throw new HttpError(
          `HTTP ${response.status} ${response.statusText}: ${method} ${path}`,
          response.status,
          excerpt(responseText)
        );
      }

      let data: unknown;
      try {
        data = JSON.parse(responseText || 'null');
      } catch (parseError) {
        throw new HttpError(
          `Response is not JSON: ${parseError instanceof Error ? parseError.message : 'unknown error'}`,
          response.status,
          excerpt(responseText)
        );
      }

      logger.debug(
        { event: 'http.request.success', method, path, status: response.status, durationMs },
        'HTTP request complete'
      );
      return data;
    }
  }

  return {
    getJson: (path) => request('GET', path),
    postJson: (path, body) => request('POST', path, body),
  };
}
