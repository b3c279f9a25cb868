import { Args } from "@oclif/core";
import { BaseCommand } from "../../base.js";
import { ConfigKeys, isSupportedKey } from "../../common/config.js";

export default class ConfigSet extends BaseCommand {
  static override description = "Set the value of a key in the config file";

  static override examples = ["$ factom config set node_endpoint http://localhost:8089/v2"];

  static args = {
    key: Args.string({
      name: "key",
      required: true,
    }),
    value: Args.string({
      name: "value",
      required: true,
    }),
  };

  public async run(): Promise<string> {
    const { args } = await this.parse(ConfigSet);

    if (!isSupportedKey(args.key)) {
      this.error(`Key ${args.key} not supported`);
    }

    const configManager = this.configManager ?? this.error("Config is not initialized");
    configManager.updateConfig(ConfigKeys.FactomSection, args.key, args.value);

    const message = `Set ${args.key} to ${args.value}`;
    this.log(message);
    return message;
  }
}
