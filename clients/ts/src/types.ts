/**
 * Configuration for the Xapiand client
 */
export interface ClientConfig {
  /** Base URL of the Xapiand server */
  baseUrl: string;
  /** Username for basic authentication (if required) */
  username?: string;
  /** Password for basic authentication (if required) */
  password?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to include in requests */
  headers?: Record<string, string>;
}

/**
 * Error response from the API
 */
export interface ErrorResponse {
  error: string;
  message: string;
  code: number;
}

/**
 * Custom error class for transport failures
 */
export class XapiandError extends Error {
  constructor(
    message: string,
    public readonly response: ErrorResponse,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'XapiandError';
  }
}

/**
 * Field name to value mapping of a single document
 */
export type DocumentData = Record<string, unknown>;

/**
 * Values used to resolve an index template, never stored as document fields
 */
export type IndexParams = Record<string, unknown>;

/**
 * Static field definitions sent to the server when an index has no schema yet
 */
export type Schema = Record<string, unknown>;

/**
 * Options for fetching a single document
 */
export interface GetOptions {
  /** Bypass the server-side cache */
  volatile?: boolean;
}

/**
 * Search parameters
 */
export interface SearchOptions {
  /** Query string; omitted matches every document */
  query?: string;
  /** Number of results to return */
  limit?: number;
  /** Number of results to skip (for pagination) */
  offset?: number;
  /** Sort expression */
  sort?: string;
  /** Minimum number of documents to check when estimating the total */
  checkAtLeast?: number;
}

/**
 * Normalized search response
 */
export interface SearchResponse {
  hits: DocumentData[];
  /** Number of hits returned */
  count: number;
  /** Estimated number of matching documents */
  total: number;
  aggregations?: Record<string, unknown>;
}

/**
 * Operations the model layer needs from the Index Service
 *
 * Implementations report failures by rejecting with `XapiandError`. A `put`
 * into an index that has no schema yet must reject with `statusCode` 412:
 * that is the only signal on which the model layer retries the write with
 * the schema attached.
 */
export interface IndexClient {
  put(index: string, body: DocumentData, id?: string | null): Promise<DocumentData>;
  get(index: string, id: string, options?: GetOptions): Promise<DocumentData>;
  search(index: string, options?: SearchOptions): Promise<SearchResponse>;
  delete(index: string, id: string): Promise<void>;
}
