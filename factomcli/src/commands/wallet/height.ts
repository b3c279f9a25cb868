import { type WalletHeight, walletHeight } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class WalletHeightCommand extends BaseCommand {
  static override description = "Get the block height the wallet has synced to";

  static override examples = ["$ factom wallet height"];

  public async run(): Promise<WalletHeight> {
    const result = await this.unwrap(walletHeight(this.factom));
    this.printResult(result);
    return result;
  }
}
