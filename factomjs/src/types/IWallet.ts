/**
 * A human readable key pair (FA/Fs, EC/Es or idpub/idsec).
 */
type KeyPair = {
  public: string;
  secret: string;
};

/**
 * An input or output of a transaction under construction, in factoshis.
 */
type WalletTransactionIO = {
  address: string;
  amount: number;
};

/**
 * A transaction under construction in the wallet, as returned by new-transaction
 * and add-ec-output. The txid is not final until the transaction is signed.
 */
type NewTransaction = {
  feesrequired: number;
  signed: boolean;
  name: string;
  timestamp: number;
  totalecoutputs: number;
  totalinputs: number;
  totaloutputs: number;
  inputs: WalletTransactionIO[] | null;
  outputs: WalletTransactionIO[] | null;
  ecoutputs: WalletTransactionIO[] | null;
  txid: string;
};

/**
 * The result of add-input, add-output, add-fee, sub-fee and sign-transaction.
 */
type WalletTransaction = NewTransaction & {
  feespaid: number;
};

/**
 * The delete-transaction result: the transaction as it was before deletion.
 */
type DeletedTransaction = Omit<NewTransaction, "feesrequired" | "txid">;

type TmpTransaction = {
  "tx-name": string;
  txid: string;
  totalinputs: number;
  totaloutputs: number;
  totalecoutputs: number;
};

type TmpTransactions = {
  transactions: TmpTransaction[] | null;
};

/**
 * A transaction found by the transactions search.
 * `blockheight` is 0 when searching by txid.
 */
type WalletHistoryTransaction = {
  blockheight: number;
  feespaid: number;
  signed: boolean;
  timestamp: number;
  totalecoutputs: number;
  totalinputs: number;
  totaloutputs: number;
  inputs: WalletTransactionIO[] | null;
  outputs: WalletTransactionIO[] | null;
  ecoutputs: WalletTransactionIO[] | null;
  txid: string;
};

type Transactions = {
  transactions: WalletHistoryTransaction[] | null;
};

/**
 * The search filter of the transactions method. Exactly one criterion is sent.
 */
type TransactionSearch =
  | { txid: string; address?: never; range?: never }
  | { address: string; txid?: never; range?: never }
  | { range: { start: number; end: number }; txid?: never; address?: never };

type AccountBalances = {
  ack: number;
  saved: number;
};

type WalletBalances = {
  fctaccountbalances: AccountBalances;
  ecaccountbalances: AccountBalances;
};

type WalletBackup = {
  "wallet-seed": string;
  addresses: KeyPair[];
  identityKeys?: KeyPair[];
};

type UnlockWallet = {
  success: boolean;
  /**
   * Unix time in seconds.
   */
  unlockeduntil: number;
};

/**
 * The factom-walletd properties result.
 */
type WalletProperties = {
  walletversion: string;
  walletapiversion: string;
};

type WalletHeight = {
  height: number;
};

/**
 * The sign-data result. Both values are base64 encoded.
 */
type SignedData = {
  pubkey: string;
  signature: string;
};

/**
 * A success flag reported as a string by the wallet.
 */
type SuccessResult = {
  success: string;
};

/**
 * A ready to send request, as built by the compose methods.
 */
type ComposedRequest<P> = {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: P;
};

/**
 * The commit and reveal requests built by the compose methods, to be sent to factomd
 * in that order.
 */
type ComposedCommitReveal = {
  commit: ComposedRequest<{ message: string }>;
  reveal: ComposedRequest<{ entry: string }>;
};

/**
 * The factoid-submit request built by compose-transaction.
 */
type ComposedTransaction = ComposedRequest<{ transaction: string }>;

export type {
  KeyPair,
  WalletTransactionIO,
  NewTransaction,
  WalletTransaction,
  DeletedTransaction,
  TmpTransaction,
  TmpTransactions,
  WalletHistoryTransaction,
  Transactions,
  TransactionSearch,
  AccountBalances,
  WalletBalances,
  WalletBackup,
  UnlockWallet,
  WalletProperties,
  WalletHeight,
  SignedData,
  SuccessResult,
  ComposedRequest,
  ComposedCommitReveal,
  ComposedTransaction,
};
