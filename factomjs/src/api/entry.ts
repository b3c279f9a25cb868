import type { RPCClient } from "../clients/RPCClient.js";
import type { ApiResponse } from "../rpc/ApiResponse.js";
import type {
  ChainHead,
  CommitChain,
  CommitEntry,
  Entry,
  PendingEntry,
  RawData,
  RevealChain,
  RevealEntry,
} from "../types/IEntry.js";
import type { ReceiptResult } from "../types/IReceipt.js";

/**
 * Sends an entry commit message to create a new entry.
 *
 * The message is the hex encoded, signed commit. The wallet daemon builds it with
 * {@link composeEntry}. The entry is created once {@link revealEntry} is called
 * with the matching entry.
 *
 * Committing the same message twice returns the error `repeated commit`;
 * in that case skip straight to the reveal.
 *
 * @param client The client.
 * @param message The hex encoded commit.
 * @example
 * const response = await commitEntry(client, message);
 * if (response.isErr()) console.log(response.error.message);
 */
const commitEntry = async (client: RPCClient, message: string): Promise<ApiResponse<CommitEntry>> => {
  return await client.factomdRequest<CommitEntry>({
    method: "commit-entry",
    params: { message },
  });
};

/**
 * Reveals an entry after its commit, completing its creation.
 * @param client The client.
 * @param entry The hex encoded entry.
 */
const revealEntry = async (client: RPCClient, entry: string): Promise<ApiResponse<RevealEntry>> => {
  return await client.factomdRequest<RevealEntry>({
    method: "reveal-entry",
    params: { entry },
  });
};

/**
 * Sends a chain commit message. The first entry of the chain is then revealed
 * with {@link revealChain}.
 * @param client The client.
 * @param message The hex encoded commit, as built by {@link composeChain}.
 */
const commitChain = async (client: RPCClient, message: string): Promise<ApiResponse<CommitChain>> => {
  return await client.factomdRequest<CommitChain>({
    method: "commit-chain",
    params: { message },
  });
};

/**
 * Reveals the first entry of a chain after its commit.
 * @param client The client.
 * @param entry The hex encoded first entry.
 */
const revealChain = async (client: RPCClient, entry: string): Promise<ApiResponse<RevealChain>> => {
  return await client.factomdRequest<RevealChain>({
    method: "reveal-chain",
    params: { entry },
  });
};

/**
 * Gets an entry by its hash.
 * @param client The client.
 * @param hash The entry hash.
 */
const entry = async (client: RPCClient, hash: string): Promise<ApiResponse<Entry>> => {
  return await client.factomdRequest<Entry>({
    method: "entry",
    params: { hash },
  });
};

/**
 * Returns the entries that have been submitted but are not recorded in the blockchain yet.
 * @param client The client.
 */
const pendingEntries = async (client: RPCClient): Promise<ApiResponse<PendingEntry[]>> => {
  return await client.factomdRequest<PendingEntry[]>({
    method: "pending-entries",
  });
};

/**
 * Retrieves an entry, a transaction or a block in raw format.
 * @param client The client.
 * @param hash The hash of the entry, transaction or block.
 */
const rawData = async (client: RPCClient, hash: string): Promise<ApiResponse<RawData>> => {
  return await client.factomdRequest<RawData>({
    method: "raw-data",
    params: { hash },
  });
};

/**
 * Returns the key Merkle root of the latest entry block of a chain.
 * @param client The client.
 * @param chainid The chain ID.
 */
const chainHead = async (client: RPCClient, chainid: string): Promise<ApiResponse<ChainHead>> => {
  return await client.factomdRequest<ChainHead>({
    method: "chain-head",
    params: { chainid },
  });
};

/**
 * Returns the receipt of an entry: the Merkle proof linking it to its directory block.
 * @param client The client.
 * @param hash The entry hash.
 * @param includeRawEntry Include the raw entry in the receipt.
 */
const receipt = async (
  client: RPCClient,
  hash: string,
  includeRawEntry?: boolean,
): Promise<ApiResponse<ReceiptResult>> => {
  return await client.factomdRequest<ReceiptResult>({
    method: "receipt",
    params: { hash, includerawentry: includeRawEntry },
  });
};

export {
  commitEntry,
  revealEntry,
  commitChain,
  revealChain,
  entry,
  pendingEntries,
  rawData,
  chainHead,
  receipt,
};
