/**
 * The status of a transaction or an entry as reported by ack:
 * - `Unknown`: not found anywhere
 * - `NotConfirmed`: found on the local node, but not in the network
 * - `TransactionACK`: found in the network, not written to the blockchain yet
 * - `DBlockConfirmed`: found in the blockchain
 */
type TransactionStatus = "Unknown" | "NotConfirmed" | "TransactionACK" | "DBlockConfirmed";

/**
 * An input or output of a factoid transaction, in factoshis.
 */
type TransactionIO = {
  amount: number;
  address: string;
  useraddress: string;
};

/**
 * A factoid transaction as stored in a factoid block.
 */
type FactoidTransaction = {
  txid?: string;
  millitimestamp: number;
  inputs: TransactionIO[];
  outputs: TransactionIO[];
  outecs: TransactionIO[];
  rcds: string[];
  sigblocks: { signatures: string[] }[];
  blockheight: number;
};

/**
 * The transaction result.
 * `includedindirectoryblockheight` is -1 if the hash is unknown.
 */
type Transaction = {
  factoidtransaction: FactoidTransaction;
  includedintransactionblock: string;
  includedindirectoryblock: string;
  includedindirectoryblockheight: number;
};

/**
 * A factoid transaction known to the network but not recorded in the blockchain yet.
 */
type PendingTransaction = {
  transactionid: string;
  status: string;
  inputs: TransactionIO[];
  outputs: TransactionIO[];
  ecoutputs: TransactionIO[];
  fees: number;
};

type AckStatus = {
  status: TransactionStatus;
  transactiondate?: number;
  transactiondatestring?: string;
  blockdate?: number;
  blockdatestring?: string;
};

/**
 * The ack result for a commit or an entry.
 * Only `commitdata` is guaranteed when querying a commit with chain ID `c`.
 */
type EntryAck = {
  committxid: string;
  entryhash: string;
  commitdata: AckStatus;
  entrydata: AckStatus;
};

/**
 * The ack result for a factoid transaction (chain ID `f`).
 */
type FactoidAck = AckStatus & {
  txid: string;
};

type Ack = EntryAck | FactoidAck;

/**
 * The factoid-submit result.
 */
type FactoidSubmit = {
  message: string;
  txid: string;
};

export type {
  TransactionStatus,
  TransactionIO,
  FactoidTransaction,
  Transaction,
  PendingTransaction,
  AckStatus,
  EntryAck,
  FactoidAck,
  Ack,
  FactoidSubmit,
};
