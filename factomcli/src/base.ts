import { Command, Flags } from "@oclif/core";

import * as os from "node:os";
import * as path from "node:path";
import { type ApiResponse, FactomClient } from "factomjs";
import ConfigManager, { ConfigKeys, type ConfigSection } from "./common/config.js";
import logger from "./logger.js";

abstract class BaseCommand extends Command {
  static baseFlags = {
    config: Flags.string({
      char: "c",
      description: "Path to the configuration ini file, default: ~/.config/factom/config.ini",
      required: false,
      parse: async (input: string) => {
        if (path.extname(input) !== ".ini") {
          throw new Error(
            `The configuration file must be an ".ini" file, not "${path.extname(input)}"`,
          );
        }
        return input;
      },
    }),
    logLevel: Flags.string({
      char: "l",
      description: "Log level in verbose mode",
      options: ["fatal", "error", "warn", "info", "debug", "trace"],
      required: false,
      default: "info",
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Verbose mode",
      required: false,
      default: false,
    }),
    quiet: Flags.boolean({
      char: "q",
      description: "Quiet mode (print only the result and exit)",
      required: false,
      default: false,
    }),
  };

  protected configManager?: ConfigManager;
  protected cfg: ConfigSection = {};
  protected client?: FactomClient;
  protected quiet = false;

  public async init(): Promise<void> {
    await super.init();
    const { flags } = await this.parse({
      flags: this.ctor.flags,
      baseFlags: (super.ctor as typeof BaseCommand).baseFlags,
      enableJsonFlag: this.ctor.enableJsonFlag,
      args: this.ctor.args,
      strict: this.ctor.strict,
    });

    this.quiet = flags.quiet;

    if (flags.verbose) {
      logger.level = flags.logLevel;
      logger.trace(`Log level set to: ${flags.logLevel}`);
    }

    const cfgPath = flags.config ?? path.join(os.homedir(), ".config", "factom", "config.ini");

    logger.info(`Using configuration file: ${cfgPath}`);

    this.configManager = new ConfigManager(cfgPath);
    this.cfg = this.configManager.loadConfig()[ConfigKeys.FactomSection] ?? {};

    logger.trace({ config: this.cfg }, "Loaded configuration");

    this.client = new FactomClient({
      nodeEndpoint: this.cfg[ConfigKeys.NodeEndpoint] || undefined,
      walletEndpoint: this.cfg[ConfigKeys.WalletEndpoint] || undefined,
      logger,
    });
  }

  protected get factom(): FactomClient {
    return this.client ?? this.error("Factom client is not initialized");
  }

  /**
   * Waits for a call and returns its result.
   * A failed call or an error returned by the daemon ends the command.
   */
  protected async unwrap<T>(pending: Promise<ApiResponse<T>>): Promise<T> {
    const response = await pending.catch((error: unknown) =>
      this.error(error instanceof Error ? error.message : String(error)),
    );

    if (response.isErr()) {
      return this.error(`${response.error.code}: ${response.error.message}`);
    }

    return response.unwrap();
  }

  /**
   * Prints a result as indented JSON.
   */
  protected printResult(result: unknown): void {
    this.log(JSON.stringify(result, null, this.quiet ? undefined : 2));
  }

  protected info(message?: string, ...args: unknown[]): void {
    if (!this.quiet) {
      this.log(message, ...args);
    }
  }
}

export { BaseCommand };
