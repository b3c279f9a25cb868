import type { RPCClient } from "../clients/RPCClient.js";
import type { ApiResponse } from "../rpc/ApiResponse.js";
import type { Balance, EntryCreditRate, MultipleBalances } from "../types/IBalances.js";

/**
 * Returns the factoid balance of an address, in factoshis.
 * @param client The client.
 * @param address The public factoid address (FA...).
 */
const factoidBalance = async (client: RPCClient, address: string): Promise<ApiResponse<Balance>> => {
  return await client.factomdRequest<Balance>({
    method: "factoid-balance",
    params: { address },
  });
};

/**
 * Returns the entry credit balance of an address.
 * @param client The client.
 * @param address The public entry credit address (EC...).
 */
const entryCreditBalance = async (client: RPCClient, address: string): Promise<ApiResponse<Balance>> => {
  return await client.factomdRequest<Balance>({
    method: "entry-credit-balance",
    params: { address },
  });
};

/**
 * Returns the factoid balances of several addresses.
 * An address that cannot be decoded reports its own `err` instead of failing the call.
 * @param client The client.
 * @param addresses The public factoid addresses.
 */
const multipleFctBalances = async (
  client: RPCClient,
  addresses: string[],
): Promise<ApiResponse<MultipleBalances>> => {
  return await client.factomdRequest<MultipleBalances>({
    method: "multiple-fct-balances",
    params: { addresses },
  });
};

const multipleEcBalances = async (
  client: RPCClient,
  addresses: string[],
): Promise<ApiResponse<MultipleBalances>> => {
  return await client.factomdRequest<MultipleBalances>({
    method: "multiple-ec-balances",
    params: { addresses },
  });
};

/**
 * Returns the number of factoshis needed to buy one entry credit.
 * @param client The client.
 */
const entryCreditRate = async (client: RPCClient): Promise<ApiResponse<EntryCreditRate>> => {
  return await client.factomdRequest<EntryCreditRate>({
    method: "entry-credit-rate",
  });
};

export { factoidBalance, entryCreditBalance, multipleFctBalances, multipleEcBalances, entryCreditRate };
