import { type PendingEntry, pendingEntries } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodePendingEntries extends BaseCommand {
  static override description = "List the entries not written to the blockchain yet";

  static override examples = ["$ factom node pending-entries"];

  public async run(): Promise<PendingEntry[]> {
    const result = await this.unwrap(pendingEntries(this.factom));
    this.printResult(result);
    return result;
  }
}
