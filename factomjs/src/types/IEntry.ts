/**
 * An entry. Every field is hex encoded.
 */
type Entry = {
  chainid: string;
  content: string;
  extids: string[];
};

/**
 * The entry of a new chain: it has no chain ID yet.
 */
type FirstEntry = Omit<Entry, "chainid">;

/**
 * The commit-entry result.
 */
type CommitEntry = {
  message: string;
  txid: string;
  entryhash: string;
};

/**
 * The commit-chain result.
 */
type CommitChain = {
  message: string;
  txid: string;
  entryhash: string;
  chainidhash: string;
};

/**
 * The reveal-entry result.
 */
type RevealEntry = {
  message: string;
  entryhash: string;
  chainid: string;
};

/**
 * The reveal-chain result.
 */
type RevealChain = RevealEntry;

/**
 * An entry that was submitted but is not recorded in the blockchain yet.
 */
type PendingEntry = {
  entryhash: string;
  chainid: string | null;
  status: string;
};

type RawData = {
  /**
   * The hex encoded entry or transaction.
   */
  data: string;
};

type ChainHead = {
  /**
   * The key Merkle root of the latest entry block of the chain.
   */
  chainhead: string;
  /**
   * True if the chain has entries in the current process list.
   */
  chaininprocesslist: boolean;
};

export type {
  Entry,
  FirstEntry,
  CommitEntry,
  CommitChain,
  RevealEntry,
  RevealChain,
  PendingEntry,
  RawData,
  ChainHead,
};
