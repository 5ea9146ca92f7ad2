import fetch, { Response } from 'node-fetch';
import {
  ClientConfig,
  DocumentData,
  ErrorResponse,
  GetOptions,
  IndexClient,
  SearchOptions,
  SearchResponse,
  XapiandError,
} from './types';

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RawSearchResponse {
  '#query'?: {
    '#hits'?: DocumentData[];
    '#count'?: number;
    '#total'?: number;
  };
  '#aggregations'?: Record<string, unknown>;
}

/**
 * Read an error body that claims to be JSON. Returns null when it is not a
 * JSON object, so the caller falls back to the raw text.
 */
function parseErrorBody(text: string): Partial<ErrorResponse> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  const body: Partial<ErrorResponse> = {};
  if ('error' in parsed && typeof parsed.error === 'string') {
    body.error = parsed.error;
  }
  if ('message' in parsed && typeof parsed.message === 'string') {
    body.message = parsed.message;
  }
  if ('code' in parsed && typeof parsed.code === 'number') {
    body.code = parsed.code;
  }
  return body;
}

/**
 * Xapiand HTTP client
 *
 * Implements the document operations the model layer relies on:
 * upsert, fetch by id, search and delete.
 */
export class XapiandClient implements IndexClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(config: ClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.timeout = config.timeout || 30000; // Default 30 seconds

    this.headers = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      'User-Agent': 'xapiand-model/1.0.0',
      ...config.headers,
    };

    if (config.username && config.password) {
      const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
      this.headers['Authorization'] = `Basic ${credentials}`;
    }
  }

  /**
   * Build a request URL, encoding every path segment of the index
   */
  private url(index: string, suffix: string, query: QueryParams = {}): string {
    const path = index
      .replace(/^\/+|\/+$/g, '')
      .split('/')
      .map(segment => encodeURIComponent(segment))
      .join('/');

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();

    return `${this.baseUrl}/${path}/${suffix}${search ? `?${search}` : ''}`;
  }

  /**
   * Make an HTTP request to the server
   */
  private async request<T>(method: Method, url: string, body?: DocumentData): Promise<T | undefined> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response: Response = await fetch(url, {
        method,
        headers: this.headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      const contentType = response.headers.get('content-type');
      const isJson = contentType !== null && contentType.includes('application/json');

      if (!response.ok) {
        const errorText = await response.text();
        const errorData = isJson ? parseErrorBody(errorText) : null;
        if (errorData) {
          const message = errorData.message || `HTTP ${response.status}: ${response.statusText}`;
          throw new XapiandError(
            message,
            {
              error: errorData.error || 'http_error',
              message,
              code: errorData.code ?? response.status,
            },
            response.status
          );
        }
        throw new XapiandError(
          `HTTP ${response.status}: ${errorText || response.statusText}`,
          {
            error: 'http_error',
            message: errorText || response.statusText,
            code: response.status,
          },
          response.status
        );
      }

      if (isJson) {
        return (await response.json()) as T;
      }
      // Deletes answer with an empty body
      await response.text();
      return undefined;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof XapiandError) {
        throw error;
      }

      if (error && typeof error === 'object' && 'name' in error && error.name === 'AbortError') {
        throw new XapiandError(
          `Request timeout after ${this.timeout}ms`,
          {
            error: 'timeout',
            message: `Request timeout after ${this.timeout}ms`,
            code: 408,
          },
          408
        );
      }

      const errorMessage = error && typeof error === 'object' && 'message' in error
        ? String(error.message)
        : 'Unknown error occurred';

      throw new XapiandError(
        errorMessage,
        {
          error: 'network_error',
          message: errorMessage,
          code: 0,
        },
        0
      );
    }
  }

  /**
   * Create or replace a document
   * @param index - Index path
   * @param body - Document fields
   * @param id - Document id; the server assigns one when omitted
   * @returns The stored document as returned by the server
   */
  async put(index: string, body: DocumentData, id?: string | null): Promise<DocumentData> {
    const data = id
      ? await this.request<DocumentData>('PUT', this.url(index, encodeURIComponent(id)), body)
      : await this.request<DocumentData>('POST', this.url(index, ''), body);
    return data ?? {};
  }

  /**
   * Fetch a document by id
   */
  async get(index: string, id: string, options: GetOptions = {}): Promise<DocumentData> {
    if (!id) {
      throw new Error('Document id is required');
    }
    const query: QueryParams = options.volatile ? { volatile: true } : {};
    const data = await this.request<DocumentData>('GET', this.url(index, encodeURIComponent(id), query));
    return data ?? {};
  }

  /**
   * Search documents in an index
   */
  async search(index: string, options: SearchOptions = {}): Promise<SearchResponse> {
    if (options.limit !== undefined && options.limit < 0) {
      throw new Error('Limit parameter cannot be negative');
    }

    if (options.offset !== undefined && options.offset < 0) {
      throw new Error('Offset parameter cannot be negative');
    }

    const raw = (await this.request<RawSearchResponse>(
      'GET',
      this.url(index, ':search', {
        q: options.query,
        limit: options.limit,
        offset: options.offset,
        sort: options.sort,
        check_at_least: options.checkAtLeast,
      })
    )) ?? {};

    const hits = raw['#query']?.['#hits'] ?? [];
    const result: SearchResponse = {
      hits,
      count: raw['#query']?.['#count'] ?? hits.length,
      total: raw['#query']?.['#total'] ?? hits.length,
    };
    if (raw['#aggregations'] !== undefined) {
      result.aggregations = raw['#aggregations'];
    }
    return result;
  }

  /**
   * Delete a document by id
   */
  async delete(index: string, id: string): Promise<void> {
    if (!id) {
      throw new Error('Document id is required');
    }
    await this.request<unknown>('DELETE', this.url(index, encodeURIComponent(id)));
  }
}
