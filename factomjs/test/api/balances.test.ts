import {
  entryCreditBalance,
  entryCreditRate,
  factoidBalance,
  multipleEcBalances,
  multipleFctBalances,
} from "../../src/api/balances.js";
import { newMockClient } from "../helpers.js";

test("factoidBalance returns the balance in factoshis", async () => {
  const { client, nodeTransport } = newMockClient(() => ({ balance: 2_500_000_000 }));

  const response = await factoidBalance(client, "FA_TEST");

  expect(response.unwrap()).toEqual({ balance: 2_500_000_000 });
  expect(nodeTransport.lastRequest?.method).toBe("factoid-balance");
  expect(nodeTransport.lastRequest?.params).toEqual({ address: "FA_TEST" });
});

test("balance methods use their wire names", async () => {
  const { client, nodeTransport } = newMockClient();

  await entryCreditBalance(client, "EC_TEST");
  expect(nodeTransport.lastRequest?.method).toBe("entry-credit-balance");

  await multipleFctBalances(client, ["FA_ONE", "FA_TWO"]);
  expect(nodeTransport.lastRequest?.method).toBe("multiple-fct-balances");
  expect(nodeTransport.lastRequest?.params).toEqual({ addresses: ["FA_ONE", "FA_TWO"] });

  await multipleEcBalances(client, ["EC_ONE"]);
  expect(nodeTransport.lastRequest?.method).toBe("multiple-ec-balances");

  await entryCreditRate(client);
  expect(nodeTransport.lastRequest?.method).toBe("entry-credit-rate");
  expect(nodeTransport.lastRequest?.params).toEqual({});
});
