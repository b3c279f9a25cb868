type Heights = {
  directoryblockheight: number;
  leaderheight: number;
  entryblockheight: number;
  entryheight: number;
};

/**
 * The factomd properties result.
 */
type NodeProperties = {
  factomdversion: string;
  factomdapiversion: string;
};

/**
 * The current-minute result. Times are in nanoseconds.
 */
type CurrentMinute = {
  leaderheight: number;
  directoryblockheight: number;
  minute: number;
  currentblockstarttime: number;
  currentminutestarttime: number;
  currenttime: number;
  directoryblockinseconds: number;
  stalldetected: boolean;
  faulttimeout: number;
  roundtimeout: number;
};

type Diagnostics = {
  name: string;
  id: string;
  publickey: string;
  role: "Follower" | "Federated" | "Audit";
  leaderheight: number;
  currentminute: number;
  currentminuteduration: number;
  previousminuteduration: number;
  balancehash: string;
  tempbalancehash: string;
  lastblockfromdbstate: boolean;
  syncing: {
    status: "Processing" | "Syncing DBSigs" | "Syncing EOMs";
    received?: number;
    expected?: number;
    missing?: string[];
  };
  authset: {
    leaders: { id: string; vm: number; listheight: number; listlength: number; nextnil: number }[];
    audits: { id: string; online: boolean }[];
  };
  elections: {
    inprogress: boolean;
    vmindex?: number;
    fedindex?: number;
    fedid?: string;
    round?: number;
  };
};

type BitcoinAnchor = {
  transactionhash: string;
  blockhash: string;
};

type EthereumAnchor = {
  recordheight: number;
  dbheightmax: number;
  dbheightmin: number;
  windowmr: string;
  merklebranch: { left: string; right: string; top: string }[];
  contractaddress: string;
  txid: string;
  blockhash: string;
  txindex: number;
};

/**
 * The anchors result. A chain the block is not anchored on yet is `false`.
 */
type Anchors = {
  directoryblockheight: number;
  directoryblockkeymr: string;
  bitcoin: BitcoinAnchor | false;
  ethereum: EthereumAnchor | false;
};

type SendRawMessage = {
  message: string;
};

export type {
  Heights,
  NodeProperties,
  CurrentMinute,
  Diagnostics,
  BitcoinAnchor,
  EthereumAnchor,
  Anchors,
  SendRawMessage,
};
