/**
 * The fetch function used by the HTTP transport.
 */
type Fetcher = (input: string, init: RequestInit) => Promise<Response>;

/**
 * The interface representing the configuration of the HTTP transport.
 */
type IHttpTransportConfig = {
  /**
   * The daemon endpoint.
   * @example 'http://localhost:8089/v2'
   */
  endpoint: string;
  /**
   * The request timeout in milliseconds.
   * There is no timeout unless one is set.
   * @example 1000
   */
  timeout?: number;
  /**
   * A signal that aborts every request made by the transport.
   */
  signal?: AbortSignal;
  /**
   * The fetch function to be used for making requests.
   * This is useful for testing purposes.
   * @default globalThis.fetch
   */
  fetcher?: Fetcher;
  /**
   * The headers to be sent with the request.
   * @example { 'Authorization': 'Basic dXNlcjpwYXNz' }
   * @default {}
   */
  headers?: Record<string, string>;
};

export type { IHttpTransportConfig, Fetcher };
