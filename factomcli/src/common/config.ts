import fs from "node:fs";
import path from "node:path";
import ini from "ini";
import { DEFAULT_FACTOMD_ENDPOINT, DEFAULT_WALLETD_ENDPOINT } from "factomjs";

enum ConfigKeys {
  FactomSection = "factom",
  NodeEndpoint = "node_endpoint",
  WalletEndpoint = "wallet_endpoint",
}

type ConfigSection = Record<string, string>;

type Config = Record<string, ConfigSection>;

const SUPPORTED_KEYS: readonly string[] = [ConfigKeys.NodeEndpoint, ConfigKeys.WalletEndpoint];

const DEFAULT_VALUES: ConfigSection = {
  [ConfigKeys.NodeEndpoint]: DEFAULT_FACTOMD_ENDPOINT,
  [ConfigKeys.WalletEndpoint]: DEFAULT_WALLETD_ENDPOINT,
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && !Array.isArray(value);
};

const toSection = (values: Record<string, unknown>): ConfigSection => {
  const section: ConfigSection = {};
  for (const [key, value] of Object.entries(values)) {
    if (typeof value === "string") {
      section[key] = value;
    }
  }
  return section;
};

/**
 * ConfigManager reads and writes the ini configuration file of the CLI.
 */
class ConfigManager {
  private readonly configFilePath: string;

  constructor(configFilePath: string) {
    this.configFilePath = configFilePath;
  }

  get path(): string {
    return this.configFilePath;
  }

  /**
   * Loads every section of the file. A missing file is an empty config.
   */
  public loadConfig(): Config {
    if (!fs.existsSync(this.configFilePath)) {
      return {};
    }

    const parsed: unknown = ini.parse(fs.readFileSync(this.configFilePath, "utf8"));
    const config: Config = {};
    if (isRecord(parsed)) {
      for (const [name, values] of Object.entries(parsed)) {
        if (isRecord(values)) {
          config[name] = toSection(values);
        }
      }
    }
    return config;
  }

  public saveConfig(config: Config): void {
    fs.mkdirSync(path.dirname(this.configFilePath), { recursive: true });
    fs.writeFileSync(this.configFilePath, ini.stringify(config));
  }

  public getConfigValue(section: string, key: string): string | undefined {
    return this.loadConfig()[section]?.[key];
  }

  public updateConfig(section: string, key: string, value: string): void {
    const config = this.loadConfig();
    config[section] = { ...config[section], [key]: value };
    this.saveConfig(config);
  }

  /**
   * Writes the default value of every supported key that is not set yet.
   * @returns The keys that were written.
   */
  public initConfig(): string[] {
    const config = this.loadConfig();
    const section = config[ConfigKeys.FactomSection] ?? {};
    const written = SUPPORTED_KEYS.filter((key) => section[key] === undefined);

    for (const key of written) {
      section[key] = DEFAULT_VALUES[key];
    }
    config[ConfigKeys.FactomSection] = section;
    this.saveConfig(config);

    return written;
  }
}

const isSupportedKey = (key: string): boolean => SUPPORTED_KEYS.includes(key);

export default ConfigManager;
export { ConfigKeys, isSupportedKey };
export type { Config, ConfigSection };
