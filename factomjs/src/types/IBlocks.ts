import type { FactoidTransaction } from "./ITransaction.js";

/**
 * A directory block entry: the latest entry block of a chain.
 */
type DirectoryBlockEntry = {
  chainid: string;
  keymr: string;
};

type DirectoryBlock = {
  header: {
    prevblockkeymr: string;
    sequencenumber: number;
    timestamp: number;
  };
  entryblocklist: DirectoryBlockEntry[];
};

type DirectoryBlockHead = {
  keymr: string;
};

/**
 * The dblock-by-height result.
 */
type DirectoryBlockByHeight = {
  dblock: {
    header: {
      version: number;
      networkid: number;
      bodymr: string;
      prevkeymr: string;
      prevfullhash: string;
      timestamp: number;
      dbheight: number;
      blockcount: number;
      chainid: string;
    };
    dbentries: DirectoryBlockEntry[];
    dbhash: string;
    keymr: string;
  };
  rawdata: string;
};

type EntryBlock = {
  header: {
    blocksequencenumber: number;
    chainid: string;
    prevkeymr: string;
    timestamp: number;
    dbheight: number;
  };
  entrylist: {
    entryhash: string;
    timestamp: number;
  }[];
};

/**
 * The admin-block and ablock-by-height results.
 */
type AdminBlock = {
  ablock: {
    header: {
      prevbackrefhash: string;
      dbheight: number;
      headerexpansionsize: number;
      headerexpansionarea: string;
      messagecount: number;
      bodysize: number;
      adminchainid: string;
      chainid: string;
    };
    /**
     * The admin entries. Their shape depends on the entry type.
     */
    abentries: Record<string, unknown>[];
    backreferencehash: string;
    lookuphash: string;
  };
  rawdata?: string;
};

/**
 * The entrycredit-block and ecblock-by-height results.
 */
type EntryCreditBlock = {
  ecblock: {
    header: {
      bodyhash: string;
      prevheaderhash: string;
      prevfullhash: string;
      dbheight: number;
      headerexpansionarea: string;
      objectcount: number;
      bodysize: number;
      chainid: string;
      ecchainid: string;
    };
    body: {
      /**
       * Commits, balance increases and minute markers.
       */
      entries: Record<string, unknown>[];
    };
  };
  rawdata: string;
};

/**
 * The factoid-block and fblock-by-height results.
 */
type FactoidBlock = {
  fblock: {
    bodymr: string;
    prevkeymr: string;
    prevledgerkeymr: string;
    exchrate: number;
    dbheight: number;
    transactions: FactoidTransaction[];
    chainid: string;
    keymr: string;
    ledgerkeymr: string;
  };
  rawdata: string;
};

export type {
  DirectoryBlockEntry,
  DirectoryBlock,
  DirectoryBlockHead,
  DirectoryBlockByHeight,
  EntryBlock,
  AdminBlock,
  EntryCreditBlock,
  FactoidBlock,
};
