import { type NodeProperties, properties } from "factomjs";
import { BaseCommand } from "../../base.js";

export default class NodePropertiesCommand extends BaseCommand {
  static override description = "Get the versions of factomd and of its API";

  static override examples = ["$ factom node properties"];

  public async run(): Promise<NodeProperties> {
    const result = await this.unwrap(properties(this.factom));
    this.printResult(result);
    return result;
  }
}
