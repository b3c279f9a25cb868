import { Flags } from "@oclif/core";
import { type PendingTransaction, pendingTransactions } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodePendingTransactions extends BaseCommand {
  static override description = "List the factoid transactions not written to the blockchain yet";

  static override examples = ["$ factom node pending-transactions", "$ factom node pending-transactions --address FA..."];

  static flags = {
    address: Flags.string({
      char: "a",
      description: "Only list the transactions involving this factoid address",
      required: false,
    }),
  };

  public async run(): Promise<PendingTransaction[]> {
    const { flags } = await this.parse(NodePendingTransactions);

    const result = await this.unwrap(pendingTransactions(this.factom, flags.address));
    this.printResult(result);
    return result;
  }
}
