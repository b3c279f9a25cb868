import type { RPCClient } from "../../clients/RPCClient.js";
import type { ApiResponse } from "../../rpc/ApiResponse.js";
import type { Entry, FirstEntry } from "../../types/IEntry.js";
import type { ComposedCommitReveal } from "../../types/IWallet.js";

/**
 * Builds the commit-chain and reveal-chain requests of a new chain, paid by an
 * entry credit address of the wallet.
 * @param client The client.
 * @param firstEntry The first entry of the chain; its external IDs define the chain ID.
 * @param ecpub The public entry credit address paying for the chain.
 * @param force Build the requests even if the balance is too low.
 */
const composeChain = async (
  client: RPCClient,
  firstEntry: FirstEntry,
  ecpub: string,
  force?: boolean,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-chain",
    params: {
      chain: { firstentry: { extids: firstEntry.extids, content: firstEntry.content } },
      ecpub,
      force,
    },
  });
};

/**
 * Builds the commit-entry and reveal-entry requests of an entry.
 * Send the commit first, then the reveal.
 * @param client The client.
 * @param entry The entry.
 * @param ecpub The public entry credit address paying for the entry.
 * @param force Build the requests even if the balance is too low.
 * @example
 * const { commit, reveal } = (await composeEntry(client, entry, ecpub)).unwrap();
 * await commitEntry(client, commit.params.message);
 * await revealEntry(client, reveal.params.entry);
 */
const composeEntry = async (
  client: RPCClient,
  entry: Entry,
  ecpub: string,
  force?: boolean,
): Promise<ApiResponse<ComposedCommitReveal>> => {
  return await client.walletdRequest<ComposedCommitReveal>({
    method: "compose-entry",
    params: {
      entry: { chainid: entry.chainid, extids: entry.extids, content: entry.content },
      ecpub,
      force,
    },
  });
};

export { composeChain, composeEntry };
