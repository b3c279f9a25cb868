import { JSONRPCErrorException } from "json-rpc-2.0";
import { TransportError } from "../errors/FactomError.js";
import { MockTransport } from "./MockTransport.js";

test("answers with the handler result", async () => {
  const transport = new MockTransport(({ params }) => params);

  const raw = await transport.request('{"jsonrpc":"2.0","id":0,"method":"entry","params":{"hash":"aa"}}');

  expect(JSON.parse(raw)).toEqual({ jsonrpc: "2.0", id: 0, result: { hash: "aa" } });
  expect(transport.lastRequest?.method).toBe("entry");
});

test("an undefined handler result becomes null", async () => {
  const transport = new MockTransport(() => undefined);

  const raw = await transport.request('{"jsonrpc":"2.0","id":0,"method":"heights","params":{}}');

  expect(JSON.parse(raw)).toEqual({ jsonrpc: "2.0", id: 0, result: null });
});

test("a JSON-RPC exception becomes an error envelope", async () => {
  const transport = new MockTransport(() => {
    throw new JSONRPCErrorException("Invalid params", -32602);
  });

  const raw = await transport.request('{"jsonrpc":"2.0","id":0,"method":"entry","params":{}}');

  expect(JSON.parse(raw)).toEqual({ jsonrpc: "2.0", id: 0, error: { code: -32602, message: "Invalid params" } });
});

test("any other exception is a transport error", async () => {
  const transport = new MockTransport(() => {
    throw new Error("connection reset");
  }, "mock://walletd");

  const request = transport.request('{"jsonrpc":"2.0","id":0,"method":"heights","params":{}}');

  await expect(request).rejects.toBeInstanceOf(TransportError);
  await expect(request).rejects.toMatchObject({ message: "connection reset", endpoint: "mock://walletd" });
});

test("rejects a body that is not a request", async () => {
  const transport = new MockTransport(() => null);

  await expect(transport.request('{"id":0}')).rejects.toBeInstanceOf(TransportError);
  expect(transport.requests).toHaveLength(0);
});
