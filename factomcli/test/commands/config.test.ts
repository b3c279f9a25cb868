import fs from "node:fs";
import { describe, expect } from "vitest";
import ConfigGet from "../../src/commands/config/get.js";
import ConfigInit from "../../src/commands/config/init.js";
import ConfigSet from "../../src/commands/config/set.js";
import ConfigShow from "../../src/commands/config/show.js";
import { ConfigKeys } from "../../src/common/config.js";
import { CliTest } from "../setup.js";

describe("config commands", () => {
  CliTest("tests config:set command", async ({ runCommand, configManager }) => {
    const testKey = "node_endpoint";
    const testValue = "http://10.0.0.5:8089/v2";

    const { stdout, result } = await runCommand(ConfigSet, [testKey, testValue]);
    expect(stdout).toBe(`Set ${testKey} to ${testValue}\n`);
    expect(result).toBe(`Set ${testKey} to ${testValue}`);
    expect(configManager.getConfigValue(ConfigKeys.FactomSection, testKey)).toBe(testValue);
  });

  CliTest("tests config:set with an unsupported key", async ({ runCommand, configManager }) => {
    const { error } = await runCommand(ConfigSet, ["rpc_endpoint", "test_value"]);

    expect(error?.message).toBe("Key rpc_endpoint not supported");
    expect(configManager.getConfigValue(ConfigKeys.FactomSection, "rpc_endpoint")).toBeUndefined();
  });

  CliTest("tests config:get command", async ({ runCommand, configManager }) => {
    configManager.updateConfig(ConfigKeys.FactomSection, "wallet_endpoint", "http://wallet.example.com:8088/v2");

    const { stdout, result } = await runCommand(ConfigGet, ["wallet_endpoint"]);
    expect(stdout).toBe("http://wallet.example.com:8088/v2\n");
    expect(result).toBe("http://wallet.example.com:8088/v2");
  });

  CliTest("tests config:get with non-existent key", async ({ runCommand }) => {
    const { result, stdout } = await runCommand(ConfigGet, ["no_such_key"]);

    expect(result).toBeNull();
    expect(stdout).toBe("");
  });

  CliTest("tests config:show command", async ({ runCommand }) => {
    const { result } = await runCommand(ConfigShow);

    expect(result).toBe(
      "node_endpoint     : http://factomd.test:8089/v2\nwallet_endpoint   : http://walletd.test:8088/v2\n",
    );
  });

  CliTest("tests config:init command", async ({ runCommand, configManager, cfgPath }) => {
    fs.rmSync(cfgPath);

    const { result } = await runCommand(ConfigInit);
    expect(result).toEqual(["node_endpoint", "wallet_endpoint"]);
    expect(configManager.loadConfig()).toEqual({
      factom: {
        node_endpoint: "http://localhost:8089/v2",
        wallet_endpoint: "http://localhost:8088/v2",
      },
    });

    const second = await runCommand(ConfigInit);
    expect(second.result).toEqual([]);
  });

  CliTest("tests config:init keeps the values already set", async ({ runCommand, configManager }) => {
    const { result } = await runCommand(ConfigInit);

    expect(result).toEqual([]);
    expect(configManager.getConfigValue(ConfigKeys.FactomSection, ConfigKeys.NodeEndpoint)).toBe(
      "http://factomd.test:8089/v2",
    );
  });
});
