import { BaseCommand } from "../../base.js";
import { ConfigKeys } from "../../common/config.js";

export default class ConfigShow extends BaseCommand {
  static override description = "Show the contents of the config file";

  static override examples = ["$ factom config show"];

  public async run(): Promise<string> {
    const configManager = this.configManager ?? this.error("Config is not initialized");
    const section = configManager.loadConfig()[ConfigKeys.FactomSection] ?? {};

    let formattedOutput = "";
    for (const [key, value] of Object.entries(section)) {
      formattedOutput += `${key.padEnd(18)}: ${value}\n`;
    }

    this.log(formattedOutput.trimEnd());
    return formattedOutput;
  }
}
