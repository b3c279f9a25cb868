import { type WalletProperties, walletProperties } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class WalletPropertiesCommand extends BaseCommand {
  static override description = "Get the versions of factom-walletd and of its API";

  static override examples = ["$ factom wallet properties"];

  public async run(): Promise<WalletProperties> {
    const result = await this.unwrap(walletProperties(this.factom));
    this.printResult(result);
    return result;
  }
}
