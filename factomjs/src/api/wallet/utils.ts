import type { RPCClient } from "../../clients/RPCClient.js";
import type { ApiResponse } from "../../rpc/ApiResponse.js";
import type {
  SignedData,
  UnlockWallet,
  WalletBackup,
  WalletBalances,
  WalletHeight,
  WalletProperties,
} from "../../types/IWallet.js";

/**
 * Returns the height of the blocks cached by the wallet while syncing.
 * @param client The client.
 */
const walletHeight = async (client: RPCClient): Promise<ApiResponse<WalletHeight>> => {
  return await client.walletdRequest<WalletHeight>({
    method: "get-height",
  });
};

/**
 * Returns the versions of factom-walletd and of its API.
 * @param client The client.
 */
const walletProperties = async (client: RPCClient): Promise<ApiResponse<WalletProperties>> => {
  return await client.walletdRequest<WalletProperties>({
    method: "properties",
  });
};

/**
 * Signs data with a key of the wallet, using ed25519.
 * For large payloads, sign a hash of the data instead.
 * @param client The client.
 * @param signer A factoid address, an entry credit address or an identity public key.
 * @param data The base64 encoded data.
 */
const signData = async (client: RPCClient, signer: string, data: string): Promise<ApiResponse<SignedData>> => {
  return await client.walletdRequest<SignedData>({
    method: "sign-data",
    params: { signer, data },
  });
};

/**
 * Unlocks an encrypted wallet.
 * @param client The client.
 * @param passphrase The wallet passphrase.
 * @param timeout How long the wallet stays unlocked, in seconds.
 */
const unlockWallet = async (
  client: RPCClient,
  passphrase: string,
  timeout: number,
): Promise<ApiResponse<UnlockWallet>> => {
  return await client.walletdRequest<UnlockWallet>({
    method: "unlock-wallet",
    params: { passphrase, timeout },
  });
};

/**
 * Returns the wallet seed and every key pair of the wallet.
 * @param client The client.
 */
const walletBackup = async (client: RPCClient): Promise<ApiResponse<WalletBackup>> => {
  return await client.walletdRequest<WalletBackup>({
    method: "wallet-backup",
  });
};

const walletBalances = async (client: RPCClient): Promise<ApiResponse<WalletBalances>> => {
  return await client.walletdRequest<WalletBalances>({
    method: "wallet-balances",
  });
};

export { walletHeight, walletProperties, signData, unlockWallet, walletBackup, walletBalances };
