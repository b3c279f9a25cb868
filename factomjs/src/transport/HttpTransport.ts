import { TransportError } from "../errors/FactomError.js";
import { requestHeadersWithDefaults } from "../utils/rpc.js";
import type { Fetcher, IHttpTransportConfig } from "./types/IHttpTransportConfig.js";
import type { ITransport } from "./types/ITransport.js";

const getIsomorphicFetch = (): Fetcher => {
  if (typeof globalThis.fetch === "function") {
    return globalThis.fetch;
  }

  throw new Error("No fetch implementation found");
};

/**
 * Combines the transport signal and the timeout into the signal of one request.
 * Returns a cleanup function that must be called once the request settles.
 */
const requestSignal = (
  timeout: number | undefined,
  signal: AbortSignal | undefined,
): { signal?: AbortSignal; cleanup: () => void } => {
  if (timeout === undefined && signal === undefined) {
    return { cleanup: () => {} };
  }

  const abortController = new AbortController();
  const abort = () => abortController.abort(signal?.reason);

  if (signal?.aborted) {
    abort();
  } else {
    signal?.addEventListener("abort", abort, { once: true });
  }

  const timer =
    timeout === undefined
      ? undefined
      : setTimeout(
          () => abortController.abort(new Error(`Request timed out after ${timeout}ms`)),
          timeout,
        );

  return {
    signal: abortController.signal,
    cleanup: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", abort);
    },
  };
};

/**
 * HttpTransport represents the HTTP transport for connecting to a Factom daemon.
 *
 * The HTTP status is not inspected: the daemons answer errors with a JSON-RPC envelope,
 * so any body that was read is handed back to the client.
 *
 * @class HttpTransport
 * @typedef {HttpTransport}
 * @implements {ITransport}
 */
class HttpTransport implements ITransport {
  /**
   * The endpoint to which the transport connects.
   */
  public readonly endpoint: string;

  /**
   * The timeout for the requests. No timeout if undefined.
   */
  public readonly timeout?: number;

  /**
   * The signal that aborts the requests.
   */
  public readonly signal?: AbortSignal;

  /**
   * The headers to be used in the requests.
   */
  public readonly headers: Record<string, string>;

  /**
   * The fetcher to be used in the requests.
   */
  public readonly fetcher: Fetcher;

  constructor({ endpoint, timeout, signal, headers, fetcher }: IHttpTransportConfig) {
    this.endpoint = endpoint;
    this.timeout = timeout;
    this.signal = signal;
    this.headers = requestHeadersWithDefaults(headers);
    this.fetcher = fetcher ?? getIsomorphicFetch();
  }

  /**
   * Sends a request to the daemon.
   *
   * @public
   * @async
   * @param {string} body The encoded request.
   * @returns {Promise<string>} The response body.
   */
  public async request(body: string): Promise<string> {
    try {
      new URL(this.endpoint);
    } catch (error) {
      throw new TransportError(`Unable to parse endpoint: ${this.endpoint}`, this.endpoint, {
        cause: error,
      });
    }

    const { signal, cleanup } = requestSignal(this.timeout, this.signal);

    try {
      const response = await this.fetcher(this.endpoint, {
        method: "POST",
        headers: this.headers,
        body,
        signal,
      });

      return await response.text();
    } catch (error) {
      const reason = signal?.aborted ? signal.reason : error;
      const message = reason instanceof Error ? reason.message : String(reason);
      throw new TransportError(`Request to ${this.endpoint} failed: ${message}`, this.endpoint, {
        cause: error,
      });
    } finally {
      cleanup();
    }
  }
}

export { HttpTransport };
