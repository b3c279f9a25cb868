import { Flags } from "@oclif/core";
import { type TransactionSearch, type Transactions, transactions } from "factomjs";
import { BaseCommand } from "../../base.js";
import { rangeFlag } from "../../types.js";

export default class WalletTransactions extends BaseCommand {
  static override description = "Search the transactions known to the wallet";

  static override examples = [
    "$ factom wallet transactions --range 100:200",
    "$ factom wallet transactions --txid <txid>",
    "$ factom wallet transactions --address FA...",
  ];

  static flags = {
    txid: Flags.string({
      description: "The transaction ID",
      exactlyOne: ["txid", "address", "range"],
    }),
    address: Flags.string({
      char: "a",
      description: "A factoid or entry credit address",
      exactlyOne: ["txid", "address", "range"],
    }),
    range: rangeFlag({
      char: "r",
      description: "A block height range, as <start>:<end>",
      exactlyOne: ["txid", "address", "range"],
    }),
  };

  public async run(): Promise<Transactions> {
    const { flags } = await this.parse(WalletTransactions);

    const search = this.search(flags);
    const result = await this.unwrap(transactions(this.factom, search));
    this.printResult(result);
    return result;
  }

  private search(flags: {
    txid?: string;
    address?: string;
    range?: { start: number; end: number };
  }): TransactionSearch {
    if (flags.txid !== undefined) {
      return { txid: flags.txid };
    }
    if (flags.address !== undefined) {
      return { address: flags.address };
    }
    if (flags.range !== undefined) {
      return { range: flags.range };
    }
    return this.error("One of --txid, --address or --range is required");
  }
}
