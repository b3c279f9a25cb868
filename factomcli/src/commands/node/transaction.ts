import { Args } from "@oclif/core";
import { type Transaction, transaction } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodeTransaction extends BaseCommand {
  static override description = "Get a factoid transaction and the blocks it was included in";

  static override examples = ["$ factom node transaction <txid>"];

  static args = {
    hash: Args.string({
      name: "hash",
      required: true,
      description: "The transaction hash or ID",
    }),
  };

  public async run(): Promise<Transaction> {
    const { args } = await this.parse(NodeTransaction);

    const result = await this.unwrap(transaction(this.factom, args.hash));
    this.printResult(result);
    return result;
  }
}
