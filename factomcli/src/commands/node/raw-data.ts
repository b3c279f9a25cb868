import { Args } from "@oclif/core";
import { type RawData, rawData } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodeRawData extends BaseCommand {
  static override description = "Get the raw data of an entry, a block or a transaction";

  static override examples = ["$ factom node raw-data <hash>"];

  static args = {
    hash: Args.string({
      name: "hash",
      required: true,
      description: "The hash of the object",
    }),
  };

  public async run(): Promise<RawData> {
    const { args } = await this.parse(NodeRawData);

    const result = await this.unwrap(rawData(this.factom, args.hash));
    this.printResult(result);
    return result;
  }
}
