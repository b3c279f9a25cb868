import type { Logger } from "pino";
import type { Fetcher } from "../../transport/types/IHttpTransportConfig.js";
import type { ITransport } from "../../transport/types/ITransport.js";

/**
 * The config of the RPC client.
 */
type IRPCClientConfig = {
  /**
   * The transport to the node daemon (factomd).
   */
  nodeTransport: ITransport;
  /**
   * The transport to the wallet daemon (factom-walletd).
   */
  walletTransport: ITransport;
  /**
   * The logger for request tracing. Silent by default.
   */
  logger?: Logger;
};

/**
 * The options shared by the HTTP transports a {@link FactomClient} creates.
 */
type IHttpOptions = {
  /**
   * The headers to be sent with every request.
   */
  headers?: Record<string, string>;
  /**
   * The fetch function to be used for making requests.
   */
  fetcher?: Fetcher;
  /**
   * The request timeout in milliseconds. No timeout by default.
   */
  timeout?: number;
  /**
   * A signal that aborts every request.
   */
  signal?: AbortSignal;
};

/**
 * The config of the Factom client.
 * A transport takes precedence over the endpoint of the same daemon.
 */
type IFactomClientConfig = IHttpOptions & {
  /**
   * The node daemon endpoint.
   * @default 'http://localhost:8089/v2'
   */
  nodeEndpoint?: string;
  /**
   * The wallet daemon endpoint.
   * @default 'http://localhost:8088/v2'
   */
  walletEndpoint?: string;
  nodeTransport?: ITransport;
  walletTransport?: ITransport;
  /**
   * The logger for request tracing. Silent by default.
   */
  logger?: Logger;
};

/**
 * The config used to build a client from a host name.
 */
type IHostConfig = IHttpOptions & {
  /**
   * Use `https` for both daemons.
   * @default false
   */
  https?: boolean;
  /**
   * The logger for request tracing. Silent by default.
   */
  logger?: Logger;
};

export type { IRPCClientConfig, IHttpOptions, IFactomClientConfig, IHostConfig };
