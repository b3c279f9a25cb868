import { FactomClient, commitEntry, composeEntry, entry, revealEntry } from "../src/index.js";

const client = new FactomClient({
  nodeEndpoint: "http://127.0.0.1:8089/v2",
  walletEndpoint: "http://127.0.0.1:8088/v2",
});

const ecpub = process.env.FACTOM_EC_ADDRESS ?? "EC_PUBLIC_ADDRESS";
const chainid = process.env.FACTOM_CHAIN_ID ?? "CHAIN_ID";

const hex = (text: string) => Buffer.from(text, "utf8").toString("hex");

const { commit, reveal } = (
  await composeEntry(client, { chainid, extids: [hex("example")], content: hex("hello factom") }, ecpub)
).unwrap();

const committed = await commitEntry(client, commit.params.message);
if (committed.isErr() && committed.error.message !== "repeated commit") {
  throw new Error(committed.error.message);
}

const { entryhash } = (await revealEntry(client, reveal.params.entry)).unwrap();

console.log("Entry hash:", entryhash);

const stored = await entry(client, entryhash);
if (stored.success()) {
  console.log("Entry content:", Buffer.from(stored.unwrap().content, "hex").toString("utf8"));
} else {
  console.log("Entry not processed yet:", stored.error.message);
}
