import { FactomClient } from "../src/clients/FactomClient.js";
import { type MockHandler, MockTransport } from "../src/transport/MockTransport.js";

/**
 * Answers every request with its own method and params.
 */
const echo: MockHandler = ({ method, params }) => ({ method, params });

/**
 * Creates a client whose daemons are answered in process by the handler.
 * @param handler The handler answering both daemons.
 */
const newMockClient = (handler: MockHandler = echo) => {
  const nodeTransport = new MockTransport(handler, "mock://factomd");
  const walletTransport = new MockTransport(handler, "mock://walletd");
  const client = new FactomClient({ nodeTransport, walletTransport });

  return { client, nodeTransport, walletTransport };
};

export { echo, newMockClient };
