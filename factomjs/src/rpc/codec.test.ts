import { DeserializationError, SerializationError } from "../errors/FactomError.js";
import { compactParams, decodeResponse, encodeRequest } from "./codec.js";
import type { ParamValue } from "./types.js";

describe("encodeRequest", () => {
  test("always sends params and the fixed id", () => {
    expect(encodeRequest("heights")).toBe('{"jsonrpc":"2.0","id":0,"method":"heights","params":{}}');
  });

  test("drops undefined params", () => {
    const body = encodeRequest("ack", { hash: "aa", chainid: "f", fulltransaction: undefined });

    expect(body).toBe('{"jsonrpc":"2.0","id":0,"method":"ack","params":{"hash":"aa","chainid":"f"}}');
  });

  test("writes safe bigints as numbers", () => {
    const body = encodeRequest("add-input", { "tx-name": "t", address: "FA", amount: 5n });

    expect(JSON.parse(body).params).toEqual({ "tx-name": "t", address: "FA", amount: 5 });
  });

  test("rejects a bigint outside the safe integer range", () => {
    expect(() => encodeRequest("add-input", { amount: 2n ** 53n })).toThrow(
      'Parameter "amount" is outside the safe integer range',
    );
  });

  test("rejects non-finite numbers", () => {
    expect(() => encodeRequest("dblock-by-height", { height: Number.NaN })).toThrow(SerializationError);
    expect(() => encodeRequest("dblock-by-height", { height: Number.POSITIVE_INFINITY })).toThrow(
      'Parameter "height" is not a finite number',
    );
  });

  test("rejects an empty method name", () => {
    expect(() => encodeRequest("")).toThrow("Method name must not be empty");
  });

  test("wraps a circular structure", () => {
    const node: { [key: string]: ParamValue } = {};
    node.self = node;

    let caught: unknown;
    try {
      encodeRequest("compose-entry", { entry: node });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SerializationError);
    expect(caught).toMatchObject({ kind: "serialization", method: "compose-entry" });
  });
});

test("compactParams keeps null and false", () => {
  expect(compactParams({ a: null, b: false, c: undefined, d: 0 })).toEqual({ a: null, b: false, d: 0 });
});

describe("decodeResponse", () => {
  test("a result", () => {
    expect(decodeResponse('{"jsonrpc":"2.0","id":0,"result":{"height":5}}')).toEqual({
      jsonrpc: "2.0",
      id: 0,
      outcome: { type: "result", result: { height: 5 } },
    });
  });

  test("a null result", () => {
    expect(decodeResponse('{"jsonrpc":"2.0","id":null,"result":null}')).toEqual({
      jsonrpc: "2.0",
      id: null,
      outcome: { type: "result", result: null },
    });
  });

  test("an error", () => {
    const envelope = decodeResponse(
      '{"jsonrpc":"2.0","id":0,"error":{"code":-32008,"message":"Entry not found","data":"x"}}',
    );

    expect(envelope.outcome).toEqual({
      type: "error",
      error: { code: -32008, message: "Entry not found", data: "x" },
    });
  });

  test("an error without data", () => {
    const envelope = decodeResponse('{"jsonrpc":"2.0","id":0,"error":{"code":-32602,"message":"Invalid params"}}');

    expect(envelope.outcome).toEqual({ type: "error", error: { code: -32602, message: "Invalid params" } });
  });

  test("an error with code 0 is ignored", () => {
    const envelope = decodeResponse('{"jsonrpc":"2.0","id":0,"error":{"code":0,"message":""},"result":7}');

    expect(envelope.outcome).toEqual({ type: "result", result: 7 });
  });

  test.each([
    ["not json", "Response is not valid JSON"],
    ["[]", "Response is not a JSON object"],
    ['{"jsonrpc":"1.0","id":0,"result":1}', "Unsupported protocol version: 1.0"],
    ['{"jsonrpc":"2.0","result":1}', "Response has no valid id"],
    ['{"jsonrpc":"2.0","id":0,"error":{"code":"x"}}', "Malformed error object in response"],
    ['{"jsonrpc":"2.0","id":0}', "Response has neither a result nor an error"],
    ['{"jsonrpc":"2.0","id":0,"error":{"code":0,"message":""}}', "Response has neither a result nor an error"],
  ])("rejects %s", (body, message) => {
    expect(() => decodeResponse(body)).toThrow(message);
  });

  test("keeps the raw body", () => {
    let caught: unknown;
    try {
      decodeResponse("<html>502</html>");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DeserializationError);
    expect(caught).toMatchObject({ kind: "deserialization", body: "<html>502</html>" });
  });
});
