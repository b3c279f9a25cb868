import { BaseCommand } from "../../base.js";
import { ConfigKeys } from "../../common/config.js";

export default class ConfigInit extends BaseCommand {
  static override description = "Initialize the config file with the default endpoints";

  static override examples = ["$ factom config init"];

  public async run(): Promise<string[]> {
    const configManager = this.configManager ?? this.error("Config is not initialized");

    const written = configManager.initConfig();
    for (const key of written) {
      this.info(`Set ${key} to ${configManager.getConfigValue(ConfigKeys.FactomSection, key)}`);
    }
    this.info(`Config file initialized: ${configManager.path}`);

    return written;
  }
}
