import { type TmpTransactions, tmpTransactions } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class WalletTmpTransactions extends BaseCommand {
  static override description = "List the working transactions of the wallet";

  static override examples = ["$ factom wallet tmp-transactions"];

  public async run(): Promise<TmpTransactions> {
    const result = await this.unwrap(tmpTransactions(this.factom));
    this.printResult(result);
    return result;
  }
}
