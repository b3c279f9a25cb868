import {
  JSONRPCErrorException,
  type JSONRPCRequest,
  type JSONRPCResponse,
  createJSONRPCErrorResponse,
  createJSONRPCSuccessResponse,
  isJSONRPCRequest,
} from "json-rpc-2.0";
import { TransportError } from "../errors/FactomError.js";
import type { ITransport } from "./types/ITransport.js";

/**
 * The partial type representing the request arguments, which we typically use in clients.
 */
type RequestArguments = {
  method: string;
  params: Record<string, unknown>;
};

/**
 * The handler answering the requests of a {@link MockTransport}.
 * Throw a `JSONRPCErrorException` to answer with an error envelope.
 */
type MockHandler = (args: RequestArguments) => unknown;

/**
 * The MockTransport is a transport class for testing purposes.
 *
 * @class MockTransport
 * @typedef {MockTransport}
 * @implements {ITransport}
 */
class MockTransport implements ITransport {
  readonly endpoint: string;

  /**
   * The requests received so far, in order.
   */
  readonly requests: JSONRPCRequest[] = [];

  /**
   * The handler to be used in the transport.
   */
  private handler: MockHandler;

  /**
   * Creates an instance of MockTransport.
   *
   * @constructor
   * @param {MockHandler} handler The testing handler.
   * @param {string} endpoint The endpoint reported by the transport.
   */
  constructor(handler: MockHandler, endpoint = "mock://factom") {
    this.handler = handler;
    this.endpoint = endpoint;
  }

  /**
   * The last request received.
   */
  get lastRequest(): JSONRPCRequest | undefined {
    return this.requests.at(-1);
  }

  /**
   * Answers a request with the handler result.
   *
   * @public
   * @async
   * @param {string} body The encoded request.
   * @returns {Promise<string>} The encoded response.
   */
  public async request(body: string): Promise<string> {
    const payload: unknown = JSON.parse(body);
    if (!isJSONRPCRequest(payload)) {
      throw new TransportError("MockTransport received a malformed request", this.endpoint);
    }
    this.requests.push(payload);

    const id = payload.id ?? null;
    let response: JSONRPCResponse;
    try {
      /**
       * We want to test method and params only.
       */
      const result = await this.handler({
        method: payload.method,
        params: payload.params ?? {},
      });
      response = createJSONRPCSuccessResponse(id, result ?? null);
    } catch (error) {
      if (!(error instanceof JSONRPCErrorException)) {
        throw new TransportError(
          error instanceof Error ? error.message : String(error),
          this.endpoint,
          { cause: error },
        );
      }
      response = createJSONRPCErrorResponse(id, error.code, error.message, error.data);
    }

    return JSON.stringify(response);
  }
}

export { MockTransport };
export type { MockHandler, RequestArguments };
