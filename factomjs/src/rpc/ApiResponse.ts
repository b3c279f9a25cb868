import type { JSONRPCID } from "json-rpc-2.0";
import { ApplicationError } from "../errors/FactomError.js";
import type { ApiError, Outcome, ResponseEnvelope } from "./types.js";

/**
 * The error reported by a successful response.
 */
const NO_ERROR: Readonly<ApiError> = Object.freeze({ code: 0, message: "" });

/**
 * ApiResponse is the response of a completed call.
 * The call reached the daemon and got an answer, which is either the method result
 * or an error the daemon returned (e.g. "repeated commit").
 *
 * @class ApiResponse
 * @typedef {ApiResponse}
 * @template T The result type of the method.
 */
class ApiResponse<T> {
  readonly jsonrpc: "2.0";

  readonly id: JSONRPCID;

  /**
   * The tagged outcome of the call.
   */
  readonly outcome: Outcome<T>;

  /**
   * The remote method that produced the response.
   */
  readonly method: string;

  constructor(method: string, jsonrpc: "2.0", id: JSONRPCID, outcome: Outcome<T>) {
    this.method = method;
    this.jsonrpc = jsonrpc;
    this.id = id;
    this.outcome = outcome;
  }

  /**
   * Types the generic envelope for the method that was called.
   * @param method The remote method name.
   * @param envelope The decoded envelope.
   */
  static from<T>(method: string, envelope: ResponseEnvelope): ApiResponse<T> {
    const outcome: Outcome<T> =
      envelope.outcome.type === "result"
        ? { type: "result", result: envelope.outcome.result }
        : { type: "error", error: envelope.outcome.error };

    return new ApiResponse<T>(method, envelope.jsonrpc, envelope.id, outcome);
  }

  /**
   * The method result, or `undefined` if the daemon returned an error.
   */
  get result(): T | undefined {
    return this.outcome.type === "result" ? this.outcome.result : undefined;
  }

  /**
   * The error returned by the daemon. A successful response reports code `0`.
   */
  get error(): ApiError {
    return this.outcome.type === "error" ? this.outcome.error : NO_ERROR;
  }

  /**
   * Returns true if the daemon accepted the request.
   * Network errors never get here: they reject the call.
   */
  success(): boolean {
    return this.error.code === 0;
  }

  /**
   * Returns true if the daemon returned an error.
   */
  isErr(): boolean {
    return !this.success();
  }

  /**
   * Returns the result.
   * @throws {ApplicationError} If the daemon returned an error.
   * @example
   * const { entryhash } = (await commitEntry(client, message)).unwrap();
   */
  unwrap(): T {
    if (this.outcome.type === "error") {
      const { code, message, data } = this.outcome.error;
      throw new ApplicationError(this.method, code, message, data);
    }
    return this.outcome.result;
  }
}

export { ApiResponse, NO_ERROR };
