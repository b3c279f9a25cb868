import { JSONRPCErrorException } from "json-rpc-2.0";
import { describe, expect, vi } from "vitest";
import NodeAck from "../../src/commands/node/ack.js";
import NodeEntry from "../../src/commands/node/entry.js";
import NodeHeights from "../../src/commands/node/heights.js";
import NodePendingEntries from "../../src/commands/node/pending-entries.js";
import NodePendingTransactions from "../../src/commands/node/pending-transactions.js";
import NodeTransaction from "../../src/commands/node/transaction.js";
import { CliTest } from "../setup.js";

const HEIGHTS = {
  directoryblockheight: 10,
  leaderheight: 11,
  entryblockheight: 10,
  entryheight: 10,
};

describe("node commands", () => {
  CliTest("node heights", async ({ runCommand, nodeServer, walletServer }) => {
    nodeServer.addMethod("heights", () => HEIGHTS);
    const walletHeights = vi.fn(() => HEIGHTS);
    walletServer.addMethod("heights", walletHeights);

    const { stdout, result, error } = await runCommand(NodeHeights);

    expect(error).toBeUndefined();
    expect(result).toEqual(HEIGHTS);
    expect(stdout).toBe(`${JSON.stringify(HEIGHTS, null, 2)}\n`);
    expect(walletHeights).not.toHaveBeenCalled();
  });

  CliTest("node heights in quiet mode", async ({ runCommand, nodeServer }) => {
    nodeServer.addMethod("heights", () => HEIGHTS);

    const { stdout } = await runCommand(NodeHeights, ["-q"]);

    expect(stdout).toBe(
      '{"directoryblockheight":10,"leaderheight":11,"entryblockheight":10,"entryheight":10}\n',
    );
  });

  CliTest("node ack sends the hash and the chain ID", async ({ runCommand, nodeServer }) => {
    const handler = vi.fn((_params: unknown) => ({ txid: "t1", status: "DBlockConfirmed" }));
    nodeServer.addMethod("ack", handler);

    const { result } = await runCommand(NodeAck, ["t1", "f"]);

    expect(result).toEqual({ txid: "t1", status: "DBlockConfirmed" });
    expect(handler).toHaveBeenCalledWith({ hash: "t1", chainid: "f" }, undefined);
  });

  CliTest("an error returned by the daemon ends the command", async ({ runCommand, nodeServer }) => {
    nodeServer.addMethod("entry", () => {
      throw new JSONRPCErrorException("Receipt creation error", -32010);
    });

    const { error, result } = await runCommand(NodeEntry, ["e1"]);

    expect(result).toBeUndefined();
    expect(error?.message).toBe("-32010: Receipt creation error");
  });

  CliTest("a refused connection ends the command", async ({ runCommand }) => {
    vi.stubGlobal("fetch", async () => {
      throw new TypeError("fetch failed");
    });

    const { error } = await runCommand(NodeTransaction, ["t1"]);

    expect(error?.message).toBe("Request to http://factomd.test:8089/v2 failed: fetch failed");
  });

  CliTest("node pending-entries", async ({ runCommand, nodeServer }) => {
    nodeServer.addMethod("pending-entries", () => [{ entryhash: "e1", chainid: "c1", status: "TransactionACK" }]);

    const { result } = await runCommand(NodePendingEntries);

    expect(result).toEqual([{ entryhash: "e1", chainid: "c1", status: "TransactionACK" }]);
  });

  CliTest("node pending-transactions filters by address", async ({ runCommand, nodeServer }) => {
    const handler = vi.fn((_params: unknown) => []);
    nodeServer.addMethod("pending-transactions", handler);

    await runCommand(NodePendingTransactions);
    await runCommand(NodePendingTransactions, ["--address", "FA_TEST"]);

    expect(handler.mock.calls.map(([params]) => params)).toEqual([{}, { address: "FA_TEST" }]);
  });
});
