import { Command, Help } from "@oclif/core";

export default class Config extends Command {
  static override description = "Manage the factom CLI config";

  async run(): Promise<void> {
    await new Help(this.config).showHelp(["config"]);
  }
}
