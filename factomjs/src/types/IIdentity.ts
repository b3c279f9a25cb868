import type { KeyPair } from "./IWallet.js";

type IdentityKeys = {
  keys: KeyPair[];
};

/**
 * The keys of an identity at a height, in order of decreasing priority.
 */
type ActiveIdentityKeys = {
  chainid: string;
  height: number;
  keys: string[];
};

type IdentityAttribute = {
  key: string;
  value: string;
};

/**
 * The arguments of compose-identity-chain.
 */
type IdentityChainArgs = {
  /**
   * The name of the identity, as a list of external IDs.
   */
  name: string[];
  pubkeys: string[];
  ecpub: string;
  force?: boolean;
};

/**
 * The arguments of compose-identity-key-replacement.
 */
type IdentityKeyReplacementArgs = {
  chainid: string;
  oldkey: string;
  newkey: string;
  signerkey: string;
  ecpub: string;
  force?: boolean;
};

/**
 * The arguments of compose-identity-attribute.
 */
type IdentityAttributeArgs = {
  receiverChainId: string;
  destinationChainId: string;
  attributes: IdentityAttribute[];
  signerKey: string;
  signerChainId: string;
  ecpub: string;
  force?: boolean;
};

/**
 * The arguments of compose-identity-attribute-endorsement.
 */
type IdentityAttributeEndorsementArgs = {
  destinationChainId: string;
  entryHash: string;
  signerKey: string;
  signerChainId: string;
  ecpub: string;
  force?: boolean;
};

export type {
  IdentityKeys,
  ActiveIdentityKeys,
  IdentityAttribute,
  IdentityChainArgs,
  IdentityKeyReplacementArgs,
  IdentityAttributeArgs,
  IdentityAttributeEndorsementArgs,
};
