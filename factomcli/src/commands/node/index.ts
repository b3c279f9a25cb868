import { Command, Help } from "@oclif/core";

export default class Node extends Command {
  static override description = "Query the node daemon (factomd)";

  async run(): Promise<void> {
    await new Help(this.config).showHelp(["node"]);
  }
}
