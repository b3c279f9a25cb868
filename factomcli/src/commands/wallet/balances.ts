import { type WalletBalances, walletBalances } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class WalletBalancesCommand extends BaseCommand {
  static override description = "Get the total factoid and entry credit balances of the wallet addresses";

  static override examples = ["$ factom wallet balances"];

  public async run(): Promise<WalletBalances> {
    const result = await this.unwrap(walletBalances(this.factom));
    this.printResult(result);
    return result;
  }
}
