/**
 * The factoid-balance and entry-credit-balance results.
 * Factoid balances are in factoshis.
 */
type Balance = {
  balance: number;
};

type EntryCreditRate = {
  /**
   * The number of factoshis per entry credit.
   */
  rate: number;
};

/**
 * The multiple-fct-balances and multiple-ec-balances results.
 * `ack` includes the current block, `saved` only the last saved one.
 */
type MultipleBalances = {
  currentheight: number;
  lastsavedheight: number;
  balances: {
    ack: number;
    saved: number;
    err: string;
  }[];
};

export type { Balance, EntryCreditRate, MultipleBalances };
