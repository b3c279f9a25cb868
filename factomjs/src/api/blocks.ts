import type { RPCClient } from "../clients/RPCClient.js";
import type { ApiResponse } from "../rpc/ApiResponse.js";
import type {
  AdminBlock,
  DirectoryBlock,
  DirectoryBlockByHeight,
  DirectoryBlockHead,
  EntryBlock,
  EntryCreditBlock,
  FactoidBlock,
} from "../types/IBlocks.js";
import type { Anchors } from "../types/INode.js";

/**
 * Gets a directory block by its key Merkle root.
 * @param client The client.
 * @param keymr The key Merkle root.
 */
const directoryBlock = async (client: RPCClient, keymr: string): Promise<ApiResponse<DirectoryBlock>> => {
  return await client.factomdRequest<DirectoryBlock>({
    method: "directory-block",
    params: { keymr },
  });
};

/**
 * Gets the key Merkle root of the latest directory block.
 * @param client The client.
 */
const directoryBlockHead = async (client: RPCClient): Promise<ApiResponse<DirectoryBlockHead>> => {
  return await client.factomdRequest<DirectoryBlockHead>({
    method: "directory-block-head",
  });
};

const dblockByHeight = async (
  client: RPCClient,
  height: number,
): Promise<ApiResponse<DirectoryBlockByHeight>> => {
  return await client.factomdRequest<DirectoryBlockByHeight>({
    method: "dblock-by-height",
    params: { height },
  });
};

/**
 * Gets an entry block by its key Merkle root.
 * @param client The client.
 * @param keymr The key Merkle root.
 */
const entryBlock = async (client: RPCClient, keymr: string): Promise<ApiResponse<EntryBlock>> => {
  return await client.factomdRequest<EntryBlock>({
    method: "entry-block",
    params: { keymr },
  });
};

/**
 * Gets an admin block by its key Merkle root.
 * @param client The client.
 * @param keymr The key Merkle root.
 */
const adminBlock = async (client: RPCClient, keymr: string): Promise<ApiResponse<AdminBlock>> => {
  return await client.factomdRequest<AdminBlock>({
    method: "admin-block",
    params: { keymr },
  });
};

const ablockByHeight = async (client: RPCClient, height: number): Promise<ApiResponse<AdminBlock>> => {
  return await client.factomdRequest<AdminBlock>({
    method: "ablock-by-height",
    params: { height },
  });
};

/**
 * Gets an entry credit block by its key Merkle root.
 * @param client The client.
 * @param keymr The key Merkle root.
 */
const entryCreditBlock = async (
  client: RPCClient,
  keymr: string,
): Promise<ApiResponse<EntryCreditBlock>> => {
  return await client.factomdRequest<EntryCreditBlock>({
    method: "entrycredit-block",
    params: { keymr },
  });
};

const ecblockByHeight = async (
  client: RPCClient,
  height: number,
): Promise<ApiResponse<EntryCreditBlock>> => {
  return await client.factomdRequest<EntryCreditBlock>({
    method: "ecblock-by-height",
    params: { height },
  });
};

/**
 * Gets a factoid block by its key Merkle root.
 * @param client The client.
 * @param keymr The key Merkle root.
 */
const factoidBlock = async (client: RPCClient, keymr: string): Promise<ApiResponse<FactoidBlock>> => {
  return await client.factomdRequest<FactoidBlock>({
    method: "factoid-block",
    params: { keymr },
  });
};

const fblockByHeight = async (client: RPCClient, height: number): Promise<ApiResponse<FactoidBlock>> => {
  return await client.factomdRequest<FactoidBlock>({
    method: "fblock-by-height",
    params: { height },
  });
};

/**
 * The anchored directory block: by height, or by the hash of an object inside it.
 */
type AnchorsQuery = { height: number; hash?: never } | { hash: string; height?: never };

/**
 * Returns the Bitcoin and Ethereum anchors of a directory block.
 * @param client The client.
 * @param query The directory block height, or an entry, block or transaction hash.
 * @example
 * await anchors(client, { height: 200000 });
 */
const anchors = async (client: RPCClient, query: AnchorsQuery): Promise<ApiResponse<Anchors>> => {
  const params = query.height !== undefined ? { height: query.height } : { hash: query.hash };
  return await client.factomdRequest<Anchors>({
    method: "anchors",
    params,
  });
};

export {
  directoryBlock,
  directoryBlockHead,
  dblockByHeight,
  entryBlock,
  adminBlock,
  ablockByHeight,
  entryCreditBlock,
  ecblockByHeight,
  factoidBlock,
  fblockByHeight,
  anchors,
};
export type { AnchorsQuery };
