import type { RPCClient } from "../../clients/RPCClient.js";
import type { ApiResponse } from "../../rpc/ApiResponse.js";
import type { KeyPair, SuccessResult } from "../../types/IWallet.js";

/**
 * Returns the key pair of an address stored in the wallet.
 * @param client The client.
 * @param address The public factoid or entry credit address.
 */
const address = async (client: RPCClient, address: string): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "address",
    params: { address },
  });
};

/**
 * Returns every address stored in the wallet.
 * @param client The client.
 */
const allAddresses = async (client: RPCClient): Promise<ApiResponse<{ addresses: KeyPair[] }>> => {
  return await client.walletdRequest<{ addresses: KeyPair[] }>({
    method: "all-addresses",
  });
};

const generateEcAddress = async (client: RPCClient): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "generate-ec-address",
  });
};

const generateFactoidAddress = async (client: RPCClient): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "generate-factoid-address",
  });
};

/**
 * Imports addresses into the wallet from their secret keys.
 * @param client The client.
 * @param secrets The private keys (Fs... or Es...).
 */
const importAddresses = async (
  client: RPCClient,
  secrets: string[],
): Promise<ApiResponse<{ addresses: KeyPair[] }>> => {
  return await client.walletdRequest<{ addresses: KeyPair[] }>({
    method: "import-addresses",
    params: { addresses: secrets.map((secret) => ({ secret })) },
  });
};

/**
 * Imports a Koinify crowdsale address from its 12 words.
 * @param client The client.
 * @param words The words, separated by spaces.
 */
const importKoinify = async (client: RPCClient, words: string): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "import-koinify",
    params: { words },
  });
};

/**
 * Deletes an address from the wallet. Back the key up first: it cannot be recovered.
 * @param client The client.
 * @param address The public address.
 */
const removeAddress = async (client: RPCClient, address: string): Promise<ApiResponse<SuccessResult>> => {
  return await client.walletdRequest<SuccessResult>({
    method: "remove-address",
    params: { address },
  });
};

export {
  address,
  allAddresses,
  generateEcAddress,
  generateFactoidAddress,
  importAddresses,
  importKoinify,
  removeAddress,
};
