import type { Daemon, RequestParams } from "../../rpc/types.js";

/**
 * Represents a JSON-RPC request arguments.
 */
type JSONRPCRequestArguments = {
  method: string;
  params?: RequestParams;
};

/**
 * A request routed to one of the daemons.
 */
type DaemonRequestArguments = JSONRPCRequestArguments & {
  daemon: Daemon;
};

export type { JSONRPCRequestArguments, DaemonRequestArguments };
