import type { RPCClient } from "../clients/RPCClient.js";
import type { ApiResponse } from "../rpc/ApiResponse.js";
import type { Ack, FactoidSubmit, PendingTransaction, Transaction } from "../types/ITransaction.js";

/**
 * Finds the status of a factoid transaction, a commit or a reveal.
 *
 * The chain ID selects what the hash refers to:
 * - `f` for a factoid transaction (the hash is the txid)
 * - `c` for an entry credit transaction (a commit)
 * - the chain ID of the entry for a reveal
 *
 * `c` and `f` are short for the chain IDs of the entry credit and factoid blocks.
 *
 * @param client The client.
 * @param hash The transaction ID, commit txid or entry hash.
 * @param chainid `f`, `c` or a chain ID.
 * @param fullTransaction The marshalled transaction, hashed by the daemon instead of `hash`.
 * @example
 * const response = await ack(client, txid, "f");
 */
const ack = async (
  client: RPCClient,
  hash: string,
  chainid: string,
  fullTransaction?: string,
): Promise<ApiResponse<Ack>> => {
  return await client.factomdRequest<Ack>({
    method: "ack",
    params: { hash, chainid, fulltransaction: fullTransaction },
  });
};

/**
 * Submits a signed factoid transaction.
 * The wallet daemon builds it with {@link composeTransaction}.
 * @param client The client.
 * @param transaction The hex encoded transaction.
 */
const factoidSubmit = async (client: RPCClient, transaction: string): Promise<ApiResponse<FactoidSubmit>> => {
  return await client.factomdRequest<FactoidSubmit>({
    method: "factoid-submit",
    params: { transaction },
  });
};

/**
 * Retrieves a factoid transaction by its hash, with the blocks it was included in.
 *
 * `factoidtransaction.blockheight` is always 0 here; use `includedindirectoryblockheight`.
 * An unknown hash reports empty block references and a height of -1.
 *
 * @param client The client.
 * @param hash The transaction hash or ID. An entry hash is also accepted.
 */
const transaction = async (client: RPCClient, hash: string): Promise<ApiResponse<Transaction>> => {
  return await client.factomdRequest<Transaction>({
    method: "transaction",
    params: { hash },
  });
};

/**
 * Returns the factoid transactions known to the network but not recorded yet.
 * @param client The client.
 * @param address Only return the transactions involving this address.
 */
const pendingTransactions = async (
  client: RPCClient,
  address?: string,
): Promise<ApiResponse<PendingTransaction[]>> => {
  return await client.factomdRequest<PendingTransaction[]>({
    method: "pending-transactions",
    params: { address },
  });
};

export { ack, factoidSubmit, transaction, pendingTransactions };
