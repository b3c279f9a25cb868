import type { RPCClient } from "../clients/RPCClient.js";
import type { ApiResponse } from "../rpc/ApiResponse.js";
import type { CurrentMinute, Diagnostics, Heights, NodeProperties, SendRawMessage } from "../types/INode.js";

/**
 * Returns the heights the node has reached and the height of the network leader.
 * @param client The client.
 */
const heights = async (client: RPCClient): Promise<ApiResponse<Heights>> => {
  return await client.factomdRequest<Heights>({
    method: "heights",
  });
};

/**
 * Returns the versions of factomd and of its API.
 * @param client The client.
 */
const properties = async (client: RPCClient): Promise<ApiResponse<NodeProperties>> => {
  return await client.factomdRequest<NodeProperties>({
    method: "properties",
  });
};

const currentMinute = async (client: RPCClient): Promise<ApiResponse<CurrentMinute>> => {
  return await client.factomdRequest<CurrentMinute>({
    method: "current-minute",
  });
};

/**
 * Returns the node identity, its role in the authority set, and the sync and election status.
 * @param client The client.
 */
const diagnostics = async (client: RPCClient): Promise<ApiResponse<Diagnostics>> => {
  return await client.factomdRequest<Diagnostics>({
    method: "diagnostics",
  });
};

/**
 * Broadcasts a raw, hex encoded message to the network.
 * @param client The client.
 * @param message The hex encoded message.
 */
const sendRawMessage = async (client: RPCClient, message: string): Promise<ApiResponse<SendRawMessage>> => {
  return await client.factomdRequest<SendRawMessage>({
    method: "send-raw-message",
    params: { message },
  });
};

export { heights, properties, currentMinute, diagnostics, sendRawMessage };
