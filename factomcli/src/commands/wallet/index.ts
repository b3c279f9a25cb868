import { Command, Help } from "@oclif/core";

export default class Wallet extends Command {
  static override description = "Query the wallet daemon (factom-walletd)";

  async run(): Promise<void> {
    await new Help(this.config).showHelp(["wallet"]);
  }
}
