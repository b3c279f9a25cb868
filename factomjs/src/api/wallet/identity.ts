import type { RPCClient } from "../../clients/RPCClient.js";
import type { ApiResponse } from "../../rpc/ApiResponse.js";
import type {
  ActiveIdentityKeys,
  IdentityAttributeArgs,
  IdentityAttributeEndorsementArgs,
  IdentityChainArgs,
  IdentityKeyReplacementArgs,
  IdentityKeys,
} from "../../types/IIdentity.js";
import type { ComposedCommitReveal, KeyPair, SuccessResult } from "../../types/IWallet.js";

/**
 * Returns every identity key pair stored in the wallet.
 * An encrypted wallet must be unlocked first.
 * @param client The client.
 */
const allIdentityKeys = async (client: RPCClient): Promise<ApiResponse<IdentityKeys>> => {
  return await client.walletdRequest<IdentityKeys>({
    method: "all-identity-keys",
  });
};

/**
 * Returns the public keys of an identity that were active at a directory block height,
 * in order of decreasing priority.
 *
 * This tells whether a signature was made with a key that was valid when the signed
 * entry was published, even if the key has been replaced since.
 *
 * @param client The client.
 * @param chainid The identity chain ID.
 * @param height The directory block height. The latest height when omitted.
 */
const activeIdentityKeys = async (
  client: RPCClient,
  chainid: string,
  height?: number,
): Promise<ApiResponse<ActiveIdentityKeys>> => {
  return await client.walletdRequest<ActiveIdentityKeys>({
    method: "active-identity-keys",
    params: { chainid, height },
  });
};

/**
 * Returns the key pair of an identity public key stored in the wallet.
 * @param client The client.
 * @param publicKey The identity public key (idpub...).
 */
const identityKey = async (client: RPCClient, publicKey: string): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "identity-key",
    params: { public: publicKey },
  });
};

/**
 * Deletes an identity key pair from the wallet.
 * The key can no longer sign attributes or endorsements from this wallet; back it up first.
 * @param client The client.
 * @param publicKey The identity public key (idpub...).
 */
const removeIdentityKey = async (
  client: RPCClient,
  publicKey: string,
): Promise<ApiResponse<SuccessResult>> => {
  return await client.walletdRequest<SuccessResult>({
    method: "remove-identity-key",
    params: { public: publicKey },
  });
};

const generateIdentityKey = async (client: RPCClient): Promise<ApiResponse<KeyPair>> => {
  return await client.walletdRequest<KeyPair>({
    method: "generate-identity-key",
  });
};

/**
 * Imports identity keys into the wallet from their secret keys.
 * @param client The client.
 * @param secrets The identity private keys (idsec...).
 */
const importIdentityKeys = async (
  client: RPCClient,
  secrets: string[],
): Promise<ApiResponse<IdentityKeys>> => {
  return await client.walletdRequest<IdentityKeys>({
    method: "import-identity-keys",
    params: { keys: secrets.map((secret) => ({ secret })) },
  });
};

/**
 * Builds the commit and reveal requests creating an identity chain.
 * @param client The client.
 * @param args The identity name, its public keys and the paying entry credit address.
 */
const composeIdentityChain = async (
  client: RPCClient,
  { name, pubkeys, ecpub, force }: IdentityChainArgs,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-identity-chain",
    params: { name, pubkeys, ecpub, force },
  });
};

/**
 * Builds the commit and reveal requests replacing a key of an identity.
 * The signer key must have a priority at least as high as the replaced key.
 * @param client The client.
 * @param args The keys, the identity chain ID and the paying entry credit address.
 */
const composeIdentityKeyReplacement = async (
  client: RPCClient,
  { chainid, oldkey, newkey, signerkey, ecpub, force }: IdentityKeyReplacementArgs,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-identity-key-replacement",
    params: { chainid, oldkey, newkey, signerkey, ecpub, force },
  });
};

/**
 * Builds the commit and reveal requests recording attributes about an identity.
 * @param client The client.
 * @param args The receiver, the destination chain, the attributes and the signer.
 */
const composeIdentityAttribute = async (
  client: RPCClient,
  args: IdentityAttributeArgs,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-identity-attribute",
    params: {
      "receiver-chainid": args.receiverChainId,
      "destination-chainid": args.destinationChainId,
      attributes: args.attributes,
      signerkey: args.signerKey,
      "signer-chainid": args.signerChainId,
      ecpub: args.ecpub,
      force: args.force,
    },
  });
};

/**
 * Builds the commit and reveal requests endorsing an attribute entry.
 * @param client The client.
 * @param args The destination chain, the endorsed entry hash and the signer.
 */
const composeIdentityAttributeEndorsement = async (
  client: RPCClient,
  args: IdentityAttributeEndorsementArgs,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-identity-attribute-endorsement",
    params: {
      "destination-chainid": args.destinationChainId,
      "entry-hash": args.entryHash,
      signerkey: args.signerKey,
      "signer-chainid": args.signerChainId,
      ecpub: args.ecpub,
      force: args.force,
    },
  });
};

export {
  allIdentityKeys,
  activeIdentityKeys,
  identityKey,
  removeIdentityKey,
  generateIdentityKey,
  importIdentityKeys,
  composeIdentityChain,
  composeIdentityKeyReplacement,
  composeIdentityAttribute,
  composeIdentityAttributeEndorsement,
};
