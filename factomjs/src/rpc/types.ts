import type { JSONRPCID } from "json-rpc-2.0";

/**
 * A value that can be sent as a named parameter.
 */
type ParamValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | readonly ParamValue[]
  | { readonly [key: string]: ParamValue };

/**
 * Named parameters of a request. Keys with `undefined` values are not sent.
 */
type RequestParams = Record<string, ParamValue>;

/**
 * The request envelope. The protocol version and the ID are fixed.
 */
interface JsonRpcRequest {
  jsonrpc: "2.0";
  readonly id: 0;
  readonly method: string;
  readonly params: RequestParams;
}

/**
 * The error payload of a response.
 */
interface ApiError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * The outcome of a completed call: the method result or the error returned by the daemon.
 */
type Outcome<T> =
  | {
      type: "result";
      result: T;
    }
  | {
      type: "error";
      error: ApiError;
    };

/**
 * The decoded response envelope before the result is typed for a method.
 */
interface ResponseEnvelope {
  jsonrpc: "2.0";
  id: JSONRPCID;
  // biome-ignore lint/suspicious/noExplicitAny: the result shape depends on the method
  outcome: Outcome<any>;
}

/**
 * The daemon a method is served by.
 */
type Daemon = "factomd" | "walletd";

export type {
  ParamValue,
  RequestParams,
  JsonRpcRequest,
  ApiError,
  Outcome,
  ResponseEnvelope,
  Daemon,
};
