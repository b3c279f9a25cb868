import type { RPCClient } from "../../clients/RPCClient.js";
import type { ApiResponse } from "../../rpc/ApiResponse.js";
import type {
  ComposedTransaction,
  DeletedTransaction,
  NewTransaction,
  TmpTransactions,
  TransactionSearch,
  Transactions,
  WalletTransaction,
} from "../../types/IWallet.js";

/**
 * An amount of factoshis. 1 factoid is 100,000,000 factoshis.
 * A `bigint` must stay within the safe integer range.
 */
type Amount = number | bigint;

/**
 * Creates a new transaction in the wallet.
 * The txid changes with every step until the transaction is signed.
 * @param client The client.
 * @param txName The name of the working transaction.
 */
const newTransaction = async (client: RPCClient, txName: string): Promise<ApiResponse<NewTransaction>> => {
  return await client.walletdRequest<NewTransaction>({
    method: "new-transaction",
    params: { "tx-name": txName },
  });
};

/**
 * Deletes a working transaction. The transaction is returned as it was before deletion.
 * @param client The client.
 * @param txName The name of the working transaction.
 */
const deleteTransaction = async (
  client: RPCClient,
  txName: string,
): Promise<ApiResponse<DeletedTransaction>> => {
  return await client.walletdRequest<DeletedTransaction>({
    method: "delete-transaction",
    params: { "tx-name": txName },
  });
};

/**
 * Adds an input from an address of the wallet.
 * Adding an input for an address that already has one overwrites it.
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param address The public factoid address.
 * @param amount The amount in factoshis.
 */
const addInput = async (
  client: RPCClient,
  txName: string,
  address: string,
  amount: Amount,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "add-input",
    params: { "tx-name": txName, address, amount },
  });
};

/**
 * Adds a factoid output.
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param address The public factoid address.
 * @param amount The amount in factoshis.
 */
const addOutput = async (
  client: RPCClient,
  txName: string,
  address: string,
  amount: Amount,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "add-output",
    params: { "tx-name": txName, address, amount },
  });
};

/**
 * Adds an entry credit output.
 *
 * The amount is in factoshis, not entry credits: multiply the entry credits
 * by the rate returned by {@link entryCreditRate}.
 *
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param address The public entry credit address.
 * @param amount The amount in factoshis.
 */
const addEcOutput = async (
  client: RPCClient,
  txName: string,
  address: string,
  amount: Amount,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "add-ec-output",
    params: { "tx-name": txName, address, amount },
  });
};

/**
 * Adds the fee to the input of an address.
 * The daemon refuses when the inputs and outputs do not add up.
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param address The input address paying the fee.
 */
const addFee = async (
  client: RPCClient,
  txName: string,
  address: string,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "add-fee",
    params: { "tx-name": txName, address },
  });
};

/**
 * Deducts the fee from the output of an address, so that the receiver pays it.
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param address The output address paying the fee.
 */
const subFee = async (
  client: RPCClient,
  txName: string,
  address: string,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "sub-fee",
    params: { "tx-name": txName, address },
  });
};

/**
 * Signs a working transaction.
 * @param client The client.
 * @param txName The name of the working transaction.
 * @param force Sign even if the fee is not balanced.
 */
const signTransaction = async (
  client: RPCClient,
  txName: string,
  force?: boolean,
): Promise<ApiResponse<WalletTransaction>> => {
  return await client.walletdRequest<WalletTransaction>({
    method: "sign-transaction",
    params: { "tx-name": txName, force },
  });
};

/**
 * Builds the factoid-submit request of a signed working transaction.
 * @param client The client.
 * @param txName The name of the working transaction.
 */
const composeTransaction = async (
  client: RPCClient,
  txName: string,
): Promise<ApiResponse<ComposedTransaction>> => {
  return await client.walletdRequest<ComposedTransaction>({
    method: "compose-transaction",
    params: { "tx-name": txName },
  });
};

/**
 * Lists the working transactions of the wallet.
 * @param client The client.
 */
const tmpTransactions = async (client: RPCClient): Promise<ApiResponse<TmpTransactions>> => {
  return await client.walletdRequest<TmpTransactions>({
    method: "tmp-transactions",
  });
};

const searchParams = (search: TransactionSearch) => {
  if (search.txid !== undefined) {
    return { txid: search.txid };
  }
  if (search.address !== undefined) {
    return { address: search.address };
  }
  return { range: { start: search.range.start, end: search.range.end } };
};

/**
 * Searches the transactions known to the wallet.
 *
 * - `{ range }`: the transactions within a block height range
 * - `{ txid }`: one transaction; the fastest search, but its `blockheight` is 0
 * - `{ address }`: the transactions involving an address
 *
 * @param client The client.
 * @param search Exactly one search criterion.
 * @example
 * await transactions(client, { range: { start: 1, end: 2 } });
 */
const transactions = async (
  client: RPCClient,
  search: TransactionSearch,
): Promise<ApiResponse<Transactions>> => {
  return await client.walletdRequest<Transactions>({
    method: "transactions",
    params: searchParams(search),
  });
};

export {
  newTransaction,
  deleteTransaction,
  addInput,
  addOutput,
  addEcOutput,
  addFee,
  subFee,
  signTransaction,
  composeTransaction,
  tmpTransactions,
  transactions,
};
export type { Amount };
