import { pino } from "pino";
import { heights } from "../api/node.js";
import { walletHeight } from "../api/wallet/utils.js";
import { TransportError } from "../errors/FactomError.js";
import { HttpTransport } from "../transport/HttpTransport.js";
import { MockTransport } from "../transport/MockTransport.js";
import { FactomClient } from "./FactomClient.js";

test("defaults to the local daemons", () => {
  const client = new FactomClient();

  expect(client.nodeEndpoint).toBe("http://localhost:8089/v2");
  expect(client.walletEndpoint).toBe("http://localhost:8088/v2");
  expect(client.nodeTransport).toBeInstanceOf(HttpTransport);
});

test("fromHost uses the default ports of both daemons", () => {
  const client = FactomClient.fromHost("node.example.com", { https: true });

  expect(client.nodeEndpoint).toBe("https://node.example.com:8089/v2");
  expect(client.walletEndpoint).toBe("https://node.example.com:8088/v2");
});

test("fromHost passes the HTTP options to both transports", () => {
  const client = FactomClient.fromHost("10.0.0.5", { timeout: 5_000, headers: { Authorization: "Basic dGVzdA==" } });

  for (const transport of [client.nodeTransport, client.walletTransport]) {
    expect(transport).toBeInstanceOf(HttpTransport);
    if (transport instanceof HttpTransport) {
      expect(transport.timeout).toBe(5_000);
      expect(transport.headers.Authorization).toBe("Basic dGVzdA==");
    }
  }
  expect(client.nodeEndpoint).toBe("http://10.0.0.5:8089/v2");
});

test("the logger is given to the client, not the transports", () => {
  const logger = pino({ level: "silent" });

  expect(FactomClient.fromHost("10.0.0.5", { logger }).logger).toBe(logger);
  expect(new FactomClient({ logger }).logger).toBe(logger);
});

test("a transport takes precedence over the endpoint", () => {
  const nodeTransport = new MockTransport(() => null, "mock://factomd");
  const client = new FactomClient({ nodeTransport, nodeEndpoint: "http://ignored:8089/v2" });

  expect(client.nodeTransport).toBe(nodeTransport);
  expect(client.nodeEndpoint).toBe("mock://factomd");
  expect(client.walletEndpoint).toBe("http://localhost:8088/v2");
});

test("the client is frozen", () => {
  const client = new FactomClient();

  expect(Object.isFrozen(client)).toBe(true);
});

test("a client serves concurrent calls", async () => {
  const nodeTransport = new MockTransport(() => ({ directoryblockheight: 10 }));
  const walletTransport = new MockTransport(() => ({ height: 9 }));
  const client = new FactomClient({ nodeTransport, walletTransport });

  const [node, wallet] = await Promise.all([heights(client), walletHeight(client)]);

  expect(node.unwrap().directoryblockheight).toBe(10);
  expect(wallet.unwrap().height).toBe(9);
});

test("a refused connection to either daemon is a transport error", async () => {
  const fetcher = vi.fn(async (_input: string, _init: RequestInit): Promise<Response> => {
    throw new TypeError("fetch failed");
  });
  const client = FactomClient.fromHost("127.0.0.1", { fetcher });

  const node = heights(client);
  await expect(node).rejects.toBeInstanceOf(TransportError);
  await expect(node).rejects.toMatchObject({
    kind: "transport",
    endpoint: "http://127.0.0.1:8089/v2",
    message: "Request to http://127.0.0.1:8089/v2 failed: fetch failed",
  });

  const wallet = walletHeight(client);
  await expect(wallet).rejects.toBeInstanceOf(TransportError);
  await expect(wallet).rejects.toMatchObject({
    kind: "transport",
    endpoint: "http://127.0.0.1:8088/v2",
    message: "Request to http://127.0.0.1:8088/v2 failed: fetch failed",
  });

  expect(fetcher.mock.calls.map(([input]) => input)).toEqual([
    "http://127.0.0.1:8089/v2",
    "http://127.0.0.1:8088/v2",
  ]);
});
