import { describe, expect, vi } from "vitest";
import WalletBalances from "../../src/commands/wallet/balances.js";
import WalletHeight from "../../src/commands/wallet/height.js";
import WalletProperties from "../../src/commands/wallet/properties.js";
import WalletTmpTransactions from "../../src/commands/wallet/tmp-transactions.js";
import WalletTransactions from "../../src/commands/wallet/transactions.js";
import { CliTest } from "../setup.js";

describe("wallet commands", () => {
  CliTest("wallet height", async ({ runCommand, walletServer }) => {
    walletServer.addMethod("get-height", () => ({ height: 42 }));

    const { result, stdout } = await runCommand(WalletHeight);

    expect(result).toEqual({ height: 42 });
    expect(stdout).toBe('{\n  "height": 42\n}\n');
  });

  CliTest("wallet properties reaches the wallet daemon", async ({ runCommand, nodeServer, walletServer }) => {
    const nodeProperties = vi.fn(() => ({ factomdversion: "6.0.0", factomdapiversion: "2.0" }));
    nodeServer.addMethod("properties", nodeProperties);
    walletServer.addMethod("properties", () => ({ walletversion: "2.2.0", walletapiversion: "2.0" }));

    const { result } = await runCommand(WalletProperties);

    expect(result).toEqual({ walletversion: "2.2.0", walletapiversion: "2.0" });
    expect(nodeProperties).not.toHaveBeenCalled();
  });

  CliTest("wallet balances", async ({ runCommand, walletServer }) => {
    const balances = {
      fctaccountbalances: { ack: 5, saved: 5 },
      ecaccountbalances: { ack: 0, saved: 0 },
    };
    walletServer.addMethod("wallet-balances", () => balances);

    const { result } = await runCommand(WalletBalances);

    expect(result).toEqual(balances);
  });

  CliTest("wallet tmp-transactions", async ({ runCommand, walletServer }) => {
    walletServer.addMethod("tmp-transactions", () => ({ transactions: null }));

    const { result } = await runCommand(WalletTmpTransactions);

    expect(result).toEqual({ transactions: null });
  });

  CliTest("wallet transactions by range", async ({ runCommand, walletServer }) => {
    const handler = vi.fn((_params: unknown) => ({ transactions: [] }));
    walletServer.addMethod("transactions", handler);

    const { result } = await runCommand(WalletTransactions, ["--range", "10:20"]);

    expect(result).toEqual({ transactions: [] });
    expect(handler.mock.calls[0]?.[0]).toEqual({ range: { start: 10, end: 20 } });
  });

  CliTest("wallet transactions by txid", async ({ runCommand, walletServer }) => {
    const handler = vi.fn((_params: unknown) => ({ transactions: [] }));
    walletServer.addMethod("transactions", handler);

    await runCommand(WalletTransactions, ["--txid", "t1"]);

    expect(handler.mock.calls[0]?.[0]).toEqual({ txid: "t1" });
  });

  CliTest("wallet transactions rejects a malformed range", async ({ runCommand, walletServer }) => {
    const handler = vi.fn((_params: unknown) => ({ transactions: [] }));
    walletServer.addMethod("transactions", handler);

    const { error } = await runCommand(WalletTransactions, ["--range", "ten:20"]);

    expect(error?.message).toContain('Invalid range "ten:20", expected <start>:<end>');
    expect(handler).not.toHaveBeenCalled();
  });

  CliTest("wallet transactions rejects heights beyond the safe integer range", async ({ runCommand, walletServer }) => {
    const handler = vi.fn((_params: unknown) => ({ transactions: [] }));
    walletServer.addMethod("transactions", handler);

    const { error } = await runCommand(WalletTransactions, ["--range", "1:9007199254740993"]);

    expect(error?.message).toContain('Invalid range "1:9007199254740993", heights must be safe integers');
    expect(handler).not.toHaveBeenCalled();
  });

  CliTest("wallet transactions needs a search criterion", async ({ runCommand, walletServer }) => {
    const handler = vi.fn((_params: unknown) => ({ transactions: [] }));
    walletServer.addMethod("transactions", handler);

    const { error } = await runCommand(WalletTransactions);

    expect(error).toBeDefined();
    expect(handler).not.toHaveBeenCalled();
  });
});
