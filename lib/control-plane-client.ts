import { DEFAULT_CONTROL_TIMEOUT_MS } from './api-config';
import { log } from './debug';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ControlPlaneOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface ControlPlaneResponse {
  status: number;
  ok: boolean;
  body: string;
}

export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.body = body;
  }
}

/**
 * Parse a response body as JSON, or undefined when it is empty or not JSON.
 */
export function parseJsonBody(body: string): unknown {
  if (!body.trim()) return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Extract the `detail` string of an error payload, falling back to the raw text.
 */
export function detailOf(body: string, fallback: string): string {
  const parsed = parseJsonBody(body);
  if (typeof parsed === 'object' && parsed !== null && 'detail' in parsed) {
    const { detail } = parsed;
    if (typeof detail === 'string' && detail) return detail;
  }
  return body.trim() || fallback;
}

export class ControlPlaneClient {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: ControlPlaneOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  urlFor(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  async postJson(path: string, payload: unknown, timeoutMs?: number): Promise<ControlPlaneResponse> {
    return this.request('POST', path, JSON.stringify(payload), timeoutMs);
  }

  async get(path: string, timeoutMs?: number): Promise<ControlPlaneResponse> {
    return this.request('GET', path, undefined, timeoutMs);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: string | undefined,
    timeoutMs?: number
  ): Promise<ControlPlaneResponse> {
    const url = this.urlFor(path);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      'X-API-Key': this.apiKey,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log(`${method} ${url}`);
    const response = await this.fetchImpl(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs ?? this.timeoutMs),
    });
    const text = await response.text();
    log(`${method} ${url} -> ${response.status}`);

    return { status: response.status, ok: response.ok, body: text };
  }
}
