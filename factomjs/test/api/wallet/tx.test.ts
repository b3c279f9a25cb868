import {
  addEcOutput,
  addFee,
  addInput,
  addOutput,
  composeTransaction,
  deleteTransaction,
  newTransaction,
  signTransaction,
  subFee,
  tmpTransactions,
  transactions,
} from "../../../src/api/wallet/tx.js";
import { SerializationError } from "../../../src/errors/FactomError.js";
import type { TransactionSearch } from "../../../src/types/IWallet.js";
import { newMockClient } from "../../helpers.js";

test("transaction building goes to the wallet daemon", async () => {
  const { client, nodeTransport, walletTransport } = newMockClient();

  await newTransaction(client, "tx1");
  await addInput(client, "tx1", "FA_FROM", 100_000_000);
  await addOutput(client, "tx1", "FA_TO", 100_000_000);
  await addEcOutput(client, "tx1", "EC_TO", 2_000_000);
  await addFee(client, "tx1", "FA_FROM");
  await subFee(client, "tx1", "FA_TO");
  await signTransaction(client, "tx1");
  await composeTransaction(client, "tx1");
  await deleteTransaction(client, "tx1");

  expect(nodeTransport.requests).toHaveLength(0);
  expect(walletTransport.requests.map((request) => request.method)).toEqual([
    "new-transaction",
    "add-input",
    "add-output",
    "add-ec-output",
    "add-fee",
    "sub-fee",
    "sign-transaction",
    "compose-transaction",
    "delete-transaction",
  ]);
  expect(walletTransport.requests[1]?.params).toEqual({
    "tx-name": "tx1",
    address: "FA_FROM",
    amount: 100_000_000,
  });
  expect(walletTransport.requests[6]?.params).toEqual({ "tx-name": "tx1" });
});

test("bigint amounts are sent as numbers", async () => {
  const { client, walletTransport } = newMockClient();

  await addInput(client, "tx1", "FA_FROM", 250_000_000n);

  expect(walletTransport.lastRequest?.params).toEqual({
    "tx-name": "tx1",
    address: "FA_FROM",
    amount: 250_000_000,
  });
});

test("an amount beyond the safe integer range is rejected before sending", async () => {
  const { client, walletTransport } = newMockClient();

  await expect(addOutput(client, "tx1", "FA_TO", 2n ** 60n)).rejects.toBeInstanceOf(SerializationError);
  expect(walletTransport.requests).toHaveLength(0);
});

test("signTransaction sends force only when it is given", async () => {
  const { client, walletTransport } = newMockClient();

  await signTransaction(client, "tx1", true);

  expect(walletTransport.lastRequest?.params).toEqual({ "tx-name": "tx1", force: true });
});

test("transactions sends the search criterion", async () => {
  const { client, walletTransport } = newMockClient();

  await transactions(client, { range: { start: 10, end: 20 } });
  expect(walletTransport.lastRequest?.params).toEqual({ range: { start: 10, end: 20 } });

  await transactions(client, { txid: "t1" });
  expect(walletTransport.lastRequest?.params).toEqual({ txid: "t1" });

  await transactions(client, { address: "FA_TEST" });
  expect(walletTransport.lastRequest?.params).toEqual({ address: "FA_TEST" });
});

test("a transactions search takes exactly one criterion", () => {
  expectTypeOf({ txid: "t1" }).toMatchTypeOf<TransactionSearch>();
  expectTypeOf({ range: { start: 1, end: 2 } }).toMatchTypeOf<TransactionSearch>();
  expectTypeOf({ txid: "t1", address: "FA_TEST" }).not.toMatchTypeOf<TransactionSearch>();
  expectTypeOf({ address: "FA_TEST", range: { start: 1, end: 2 } }).not.toMatchTypeOf<TransactionSearch>();
});

test("tmpTransactions", async () => {
  const result = {
    transactions: [{ "tx-name": "tx1", txid: "t1", totalinputs: 5, totaloutputs: 5, totalecoutputs: 0 }],
  };
  const { client, walletTransport } = newMockClient(() => result);

  const response = await tmpTransactions(client);

  expect(response.unwrap()).toEqual(result);
  expect(walletTransport.lastRequest?.params).toEqual({});
});
