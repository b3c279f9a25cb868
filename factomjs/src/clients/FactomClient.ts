import { HttpTransport } from "../transport/HttpTransport.js";
import type { ITransport } from "../transport/types/ITransport.js";
import {
  DEFAULT_FACTOMD_ENDPOINT,
  DEFAULT_WALLETD_ENDPOINT,
  FACTOMD_PORT,
  WALLETD_PORT,
  buildEndpoint,
} from "../utils/endpoint.js";
import { RPCClient } from "./RPCClient.js";
import type { IFactomClientConfig, IHostConfig, IHttpOptions } from "./types/Configs.js";

const httpTransport = (endpoint: string, { headers, fetcher, timeout, signal }: IHttpOptions): ITransport => {
  return new HttpTransport({ endpoint, headers, fetcher, timeout, signal });
};

/**
 * FactomClient is the handle passed to every API function.
 * It is frozen once built and can be shared freely.
 *
 * @class FactomClient
 * @typedef {FactomClient}
 * @example
 * const client = new FactomClient();
 * const { height } = (await walletHeight(client)).unwrap();
 * @example
 * const client = FactomClient.fromHost("node.example.com", { https: true });
 */
class FactomClient extends RPCClient {
  /**
   * Creates an instance of FactomClient.
   * Without a config, both daemons are expected on localhost at their default ports.
   * @constructor
   * @param {IFactomClientConfig} config The endpoints or transports of the daemons. See {@link IFactomClientConfig}.
   */
  constructor(config: IFactomClientConfig = {}) {
    super({
      nodeTransport:
        config.nodeTransport ?? httpTransport(config.nodeEndpoint ?? DEFAULT_FACTOMD_ENDPOINT, config),
      walletTransport:
        config.walletTransport ?? httpTransport(config.walletEndpoint ?? DEFAULT_WALLETD_ENDPOINT, config),
      logger: config.logger,
    });
    Object.freeze(this);
  }

  /**
   * Creates a client for daemons running on one host at their default ports.
   * @param host The host name.
   * @param config Use `https`, and the HTTP options of both transports.
   * @example
   * FactomClient.fromHost("192.168.1.20");
   */
  static fromHost(host: string, config: IHostConfig = {}): FactomClient {
    const { https = false, ...options } = config;
    return new FactomClient({
      ...options,
      nodeEndpoint: buildEndpoint(host, FACTOMD_PORT, https),
      walletEndpoint: buildEndpoint(host, WALLETD_PORT, https),
    });
  }

  /**
   * The node daemon endpoint.
   */
  get nodeEndpoint(): string {
    return this.nodeTransport.endpoint;
  }

  /**
   * The wallet daemon endpoint.
   */
  get walletEndpoint(): string {
    return this.walletTransport.endpoint;
  }
}

export { FactomClient };
