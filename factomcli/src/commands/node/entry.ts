import { Args } from "@oclif/core";
import { type Entry, entry } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodeEntry extends BaseCommand {
  static override description = "Get an entry by its hash";

  static override examples = ["$ factom node entry <entryhash>"];

  static args = {
    hash: Args.string({
      name: "hash",
      required: true,
      description: "The entry hash",
    }),
  };

  public async run(): Promise<Entry> {
    const { args } = await this.parse(NodeEntry);

    const result = await this.unwrap(entry(this.factom, args.hash));
    this.printResult(result);
    return result;
  }
}
