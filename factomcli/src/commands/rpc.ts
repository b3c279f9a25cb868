import { Args, Flags } from "@oclif/core";
import { BaseCommand } from "../base.js";
import { paramsFlag } from "../types.js";

export default class Rpc extends BaseCommand {
  static override description = "Call any method of the node daemon, or of the wallet daemon with --wallet";

  static override examples = [
    "$ factom rpc heights",
    `$ factom rpc entry --params '{"hash":"<entryhash>"}'`,
    "$ factom rpc get-height --wallet",
  ];

  static args = {
    method: Args.string({
      name: "method",
      required: true,
      description: "The method name, e.g. directory-block-head",
    }),
  };

  static flags = {
    params: paramsFlag({
      char: "p",
      description: "The named parameters as a JSON object",
      required: false,
    }),
    wallet: Flags.boolean({
      char: "w",
      description: "Send the call to the wallet daemon",
      default: false,
    }),
  };

  public async run(): Promise<unknown> {
    const { args, flags } = await this.parse(Rpc);

    const result = await this.unwrap(
      this.factom.request<unknown>({
        daemon: flags.wallet ? "walletd" : "factomd",
        method: args.method,
        params: flags.params,
      }),
    );
    this.printResult(result);
    return result;
  }
}
