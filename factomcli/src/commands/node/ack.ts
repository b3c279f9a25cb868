import { Args, Flags } from "@oclif/core";
import { type Ack, ack } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodeAck extends BaseCommand {
  static override description = "Get the status of a factoid transaction, a commit or an entry";

  static override examples = ["$ factom node ack <txid> f", "$ factom node ack <entryhash> <chainid>"];

  static args = {
    hash: Args.string({
      name: "hash",
      required: true,
      description: "The transaction ID, commit txid or entry hash",
    }),
    chainid: Args.string({
      name: "chainid",
      required: true,
      description: "`f` for factoid transactions, `c` for commits, or the chain ID of the entry",
    }),
  };

  static flags = {
    fullTransaction: Flags.string({
      char: "t",
      description: "The marshalled transaction, hashed instead of the hash argument",
      required: false,
    }),
  };

  public async run(): Promise<Ack> {
    const { args, flags } = await this.parse(NodeAck);

    const result = await this.unwrap(ack(this.factom, args.hash, args.chainid, flags.fullTransaction));
    this.printResult(result);
    return result;
  }
}
