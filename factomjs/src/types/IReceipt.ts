/**
 * A node of the Merkle branch proving an entry.
 */
type MerkleNode = {
  left: string;
  right: string;
  top: string;
};

/**
 * The receipt interface.
 * Proves that an entry is in an entry block that is anchored in a directory block.
 */
type Receipt = {
  entry: {
    entryhash: string;
    /**
     * The raw entry, present when it was requested.
     */
    raw?: string;
  };
  merklebranch: MerkleNode[];
  entryblockkeymr: string;
  directoryblockkeymr: string;
  bitcointransactionhash?: string;
  bitcoinblockhash?: string;
};

type ReceiptResult = {
  receipt: Receipt;
};

export type { MerkleNode, Receipt, ReceiptResult };
