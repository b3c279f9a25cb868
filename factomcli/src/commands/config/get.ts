import { Args } from "@oclif/core";
import { BaseCommand } from "../../base.js";
import { ConfigKeys } from "../../common/config.js";

export default class ConfigGet extends BaseCommand {
  static override description = "Get the value of a key from the config file";

  static override examples = ["$ factom config get node_endpoint"];

  static args = {
    name: Args.string({
      name: "name",
      required: true,
      description: "The key to read",
    }),
  };

  public async run(): Promise<string | null> {
    const { args } = await this.parse(ConfigGet);

    const configManager = this.configManager ?? this.error("Config is not initialized");
    const value = configManager.getConfigValue(ConfigKeys.FactomSection, args.name);
    if (!value) {
      return null;
    }
    this.log(value);
    return value;
  }
}
