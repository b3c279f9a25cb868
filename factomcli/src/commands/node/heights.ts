import { type Heights, heights } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodeHeights extends BaseCommand {
  static override description = "Get the directory block, entry block and entry heights of the node";

  static override examples = ["$ factom node heights"];

  public async run(): Promise<Heights> {
    const result = await this.unwrap(heights(this.factom));
    this.printResult(result);
    return result;
  }
}
