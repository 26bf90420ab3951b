import type { Logger } from 'pino';

import { OpenDtuError } from '../errors.js';
import type { LimitCommand } from '../limit/limitSpec.js';
import {
  normalizeLimitStatusPayload,
  normalizeLiveDataPayload,
  type LimitStatusMap,
  type LiveDataSummary
} from './normalizer.js';

export interface OpenDtuClientOptions {
  baseUrl: string;
  user: string;
  password: string;
  timeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

export type LimitOutcome =
  | { applied: true; message: string; code?: number }
  | { applied: false; type: string; message: string; code?: number };

interface FetchedResponse {
  response: Response;
  text: string;
}

interface RequestOptions {
  method: 'GET' | 'POST';
  body?: URLSearchParams;
}

export const OPENDTU_PATHS = {
  liveData: '/api/livedata/status',
  limitStatus: '/api/limit/status',
  limitConfig: '/api/limit/config'
} as const;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function sanitizeUrlForLog(url: URL): string {
  const sanitized = new URL(url.toString());
  sanitized.username = '';
  sanitized.password = '';
  return sanitized.toString();
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export class OpenDtuClient {
  private readonly fetchImpl: typeof fetch;
  private readonly authorization: string;

  constructor(private readonly options: OpenDtuClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.authorization = `Basic ${Buffer.from(`${options.user}:${options.password}`, 'utf8').toString('base64')}`;
  }

  private buildUrl(path: string): URL {
    return new URL(path, `${this.options.baseUrl}/`);
  }

  // Resolves with the body text, or rejects with the abort reason once the
  // request timer fires, whichever happens first.
  private readBody(response: Response, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      void response
        .text()
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  private async executeFetch(url: URL, init: RequestInit, options: { idempotent: boolean }): Promise<FetchedResponse> {
    // Writes have a physical side effect on the inverter and are sent exactly once.
    const retries = options.idempotent ? Math.min(1, Math.max(0, this.options.readRetries)) : 0;

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt += 1) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          ...init,
          signal: controller.signal
        });
        // The timer also bounds the body, so a stalled or dropped stream fails the attempt.
        const text = await this.readBody(response, controller.signal);
        return { response, text };
      } catch (error) {
        lastError = error;
        if (attempt >= retries) {
          break;
        }
        this.options.logger.warn(
          { path: url.pathname, attempt: attempt + 1, error: String(error) },
          'OpenDTU request failed, retrying'
        );
        await wait(this.options.readRetryBackoffMs);
      } finally {
        clearTimeout(timeout);
      }
    }

    const timedOut = lastError instanceof Error && lastError.name === 'AbortError';
    throw new OpenDtuError(
      'ApplianceUnreachableError',
      timedOut
        ? `Request to OpenDTU timed out after ${this.options.timeoutMs} ms (${url.pathname}).`
        : `Could not connect to OpenDTU at ${this.options.baseUrl} (${url.pathname}).`,
      { cause: lastError, details: { path: url.pathname, attempts: retries + 1 } }
    );
  }

  private parseResponse({ response, text: rawText }: FetchedResponse, path: string): unknown {
    if (response.status === 401) {
      throw new OpenDtuError('AuthenticationError', `OpenDTU rejected the credentials (HTTP 401) for ${path}.`, {
        statusCode: 401
      });
    }

    if (response.status === 403) {
      throw new OpenDtuError(
        'ApplianceError',
        `OpenDTU denied access (HTTP 403) for ${path}. Read-only mode is active or the user lacks rights.`,
        {
          statusCode: 403,
          details: { path },
          fixHint:
            'Disable read-only access in the OpenDTU security settings, or set OPENDTU_USER to an account allowed to change limits.'
        }
      );
    }

    if (!response.ok) {
      throw new OpenDtuError('ApplianceError', `HTTP ${response.status} ${response.statusText}: ${truncate(rawText)}`, {
        statusCode: response.status,
        details: { path }
      });
    }

    try {
      return JSON.parse(rawText) as unknown;
    } catch (error) {
      throw new OpenDtuError('ApplianceError', `OpenDTU returned a non-JSON body for ${path}: ${truncate(rawText)}`, {
        cause: error,
        statusCode: response.status,
        details: { path }
      });
    }
  }

  private async request(path: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(path);

    this.options.logger.debug({ method: options.method, url: sanitizeUrlForLog(url) }, 'OpenDTU request');

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: this.authorization
    };
    if (options.body) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const fetched = await this.executeFetch(
      url,
      {
        method: options.method,
        headers,
        body: options.body?.toString()
      },
      { idempotent: options.method === 'GET' }
    );

    return this.parseResponse(fetched, path);
  }

  async getLiveData(): Promise<LiveDataSummary> {
    const payload = await this.request(OPENDTU_PATHS.liveData, { method: 'GET' });
    return normalizeLiveDataPayload(payload);
  }

  async getLimitStatus(serial?: string): Promise<LimitStatusMap> {
    const payload = await this.request(OPENDTU_PATHS.limitStatus, { method: 'GET' });
    const statuses = normalizeLimitStatusPayload(payload);

    const target = serial?.trim();
    if (!target) {
      return statuses;
    }

    const entry = statuses[target];
    return entry ? { [target]: entry } : {};
  }

  async setLimit(command: LimitCommand): Promise<LimitOutcome> {
    const body = new URLSearchParams();
    body.set(
      'data',
      JSON.stringify({
        serial: command.serial,
        limit_type: command.limitType,
        limit_value: command.value
      })
    );

    const payload = await this.request(OPENDTU_PATHS.limitConfig, { method: 'POST', body });
    if (!isRecord(payload)) {
      throw new OpenDtuError('ApplianceError', 'OpenDTU returned an unexpected response to the limit command.', {
        details: { path: OPENDTU_PATHS.limitConfig }
      });
    }

    const type = typeof payload.type === 'string' ? payload.type : '';
    const message = typeof payload.message === 'string' ? payload.message : '';
    const code = typeof payload.code === 'number' ? payload.code : undefined;

    if (type === 'success') {
      return { applied: true, message, ...(code === undefined ? {} : { code }) };
    }

    return {
      applied: false,
      type: type || 'unknown',
      message: message || type || 'OpenDTU did not confirm the limit command.',
      ...(code === undefined ? {} : { code })
    };
  }
}
