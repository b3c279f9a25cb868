import { JSONRPC } from "json-rpc-2.0";
import { DeserializationError, SerializationError } from "../errors/FactomError.js";
import type { ApiError, JsonRpcRequest, RequestParams, ResponseEnvelope } from "./types.js";

/**
 * Every request carries the same ID: calls are never pipelined on one connection.
 */
const REQUEST_ID = 0;

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && !Array.isArray(value);
};

/**
 * Drops the keys whose value is `undefined`, so that absent optional arguments are not sent.
 * @param params The named parameters.
 * @returns A new object without the undefined keys.
 * @example
 * compactParams({ hash: "aa", fulltransaction: undefined }); // { hash: "aa" }
 */
const compactParams = (params: RequestParams): RequestParams => {
  const compacted: RequestParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
};

/**
 * Builds the request envelope for a method.
 * @param method The remote method name, e.g. `commit-entry`.
 * @param params The named parameters.
 */
const createRequest = (method: string, params: RequestParams = {}): JsonRpcRequest => {
  return {
    jsonrpc: JSONRPC,
    id: REQUEST_ID,
    method,
    params: compactParams(params),
  };
};

/**
 * Serializes the request envelope for a method.
 *
 * `bigint` values within the safe integer range are written as JSON numbers.
 *
 * @param method The remote method name.
 * @param params The named parameters.
 * @returns The request body.
 * @throws {SerializationError} If the method name is empty or a value has no JSON representation.
 */
const encodeRequest = (method: string, params: RequestParams = {}): string => {
  if (method.length === 0) {
    throw new SerializationError("Method name must not be empty", method);
  }

  const replacer = (key: string, value: unknown): unknown => {
    switch (typeof value) {
      case "bigint":
        if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
          throw new SerializationError(`Parameter "${key}" is outside the safe integer range`, method);
        }
        return Number(value);
      case "number":
        if (!Number.isFinite(value)) {
          throw new SerializationError(`Parameter "${key}" is not a finite number`, method);
        }
        return value;
      case "function":
      case "symbol":
        throw new SerializationError(`Parameter "${key}" has no JSON representation`, method);
      default:
        return value;
    }
  };

  try {
    return JSON.stringify(createRequest(method, params), replacer);
  } catch (error) {
    if (error instanceof SerializationError) {
      throw error;
    }
    throw new SerializationError(`Failed to encode request: ${String(error)}`, method, {
      cause: error,
    });
  }
};

const parseError = (value: unknown, body: string): ApiError => {
  if (!isRecord(value) || typeof value.code !== "number" || typeof value.message !== "string") {
    throw new DeserializationError("Malformed error object in response", body);
  }

  const error: ApiError = { code: value.code, message: value.message };
  if (value.data !== undefined) {
    error.data = value.data;
  }
  return error;
};

/**
 * Parses a response body into the generic envelope.
 * The result is left untyped; {@link ApiResponse.from} types it for the calling method.
 *
 * An error object with code `0` means "no error" and is ignored.
 *
 * @param body The raw response body.
 * @throws {DeserializationError} If the body is not a well-formed JSON-RPC 2.0 response.
 */
const decodeResponse = (body: string): ResponseEnvelope => {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new DeserializationError("Response is not valid JSON", body, { cause: error });
  }

  if (!isRecord(payload)) {
    throw new DeserializationError("Response is not a JSON object", body);
  }

  if (payload.jsonrpc !== JSONRPC) {
    throw new DeserializationError(`Unsupported protocol version: ${String(payload.jsonrpc)}`, body);
  }

  const id = payload.id;
  if (!(typeof id === "number" || typeof id === "string" || id === null)) {
    throw new DeserializationError("Response has no valid id", body);
  }

  if (payload.error !== undefined && payload.error !== null) {
    const error = parseError(payload.error, body);
    if (error.code !== 0) {
      return { jsonrpc: JSONRPC, id, outcome: { type: "error", error } };
    }
  }

  if (!("result" in payload)) {
    throw new DeserializationError("Response has neither a result nor an error", body);
  }

  return { jsonrpc: JSONRPC, id, outcome: { type: "result", result: payload.result } };
};

export { REQUEST_ID, compactParams, createRequest, encodeRequest, decodeResponse };
