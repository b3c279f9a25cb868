import { FactomError, TransportError } from "../errors/FactomError.js";
import { type Logger, defaultLogger } from "../logger.js";
import { ApiResponse } from "../rpc/ApiResponse.js";
import { decodeResponse, encodeRequest } from "../rpc/codec.js";
import type { Daemon } from "../rpc/types.js";
import type { ITransport } from "../transport/types/ITransport.js";
import type { IRPCClientConfig } from "./types/Configs.js";
import type { DaemonRequestArguments, JSONRPCRequestArguments } from "./types/RPC.js";

/**
 * RPCClient is used for creating RPC requests to the node and wallet daemons.
 * It holds no mutable state, so one instance can serve concurrent calls.
 * @class RPCClient
 */
class RPCClient {
  /**
   * The transport to the node daemon (factomd). See {@link ITransport}.
   *
   * @readonly
   * @type {ITransport}
   */
  readonly nodeTransport: ITransport;

  /**
   * The transport to the wallet daemon (factom-walletd). See {@link ITransport}.
   *
   * @readonly
   * @type {ITransport}
   */
  readonly walletTransport: ITransport;

  readonly logger: Logger;

  /**
   * Creates an instance of RPCClient.
   * @constructor
   * @param {IRPCClientConfig} config The config to be used in the client. It contains the transports of both daemons.
   */
  constructor(config: IRPCClientConfig) {
    this.nodeTransport = config.nodeTransport;
    this.walletTransport = config.walletTransport;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Returns the transport serving a daemon.
   * @param daemon The daemon.
   */
  public transportFor(daemon: Daemon): ITransport {
    return daemon === "walletd" ? this.walletTransport : this.nodeTransport;
  }

  /**
   * Sends a request to a daemon.
   *
   * An error returned by the daemon resolves as an {@link ApiResponse} whose `isErr()` is true.
   *
   * @param requestObject The request object. It contains the daemon, the method and the parameters.
   * @returns The response.
   * @throws {TransportError | SerializationError | DeserializationError} If the call could not complete.
   */
  public async request<T>({ daemon, method, params }: DaemonRequestArguments): Promise<ApiResponse<T>> {
    const transport = this.transportFor(daemon);
    const body = encodeRequest(method, params);
    const log = this.logger.child({ method, daemon, endpoint: transport.endpoint });

    log.debug("sending request");

    let raw: string;
    try {
      raw = await transport.request(body);
    } catch (error) {
      log.warn({ err: error }, "transport failed");
      if (error instanceof FactomError) {
        throw error;
      }
      throw new TransportError(
        error instanceof Error ? error.message : String(error),
        transport.endpoint,
        { cause: error },
      );
    }

    let response: ApiResponse<T>;
    try {
      response = ApiResponse.from<T>(method, decodeResponse(raw));
    } catch (error) {
      log.warn({ err: error }, "malformed response");
      throw error;
    }

    if (response.isErr()) {
      log.debug({ code: response.error.code }, response.error.message);
    } else {
      log.debug("request completed");
    }

    return response;
  }

  /**
   * Sends a request to the node daemon (factomd).
   * @param requestObject The method and the parameters.
   */
  public async factomdRequest<T>({ method, params }: JSONRPCRequestArguments): Promise<ApiResponse<T>> {
    return await this.request<T>({ daemon: "factomd", method, params });
  }

  /**
   * Sends a request to the wallet daemon (factom-walletd).
   * @param requestObject The method and the parameters.
   */
  public async walletdRequest<T>({ method, params }: JSONRPCRequestArguments): Promise<ApiResponse<T>> {
    return await this.request<T>({ daemon: "walletd", method, params });
  }
}

export { RPCClient };
