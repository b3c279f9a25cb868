import {
  FactomClient,
  ack,
  addFee,
  addInput,
  addOutput,
  composeTransaction,
  factoidSubmit,
  newTransaction,
  signTransaction,
} from "../src/index.js";

const client = FactomClient.fromHost("127.0.0.1");

const from = process.env.FACTOM_FROM_ADDRESS ?? "FA_SENDER_ADDRESS";
const to = process.env.FACTOM_TO_ADDRESS ?? "FA_RECEIVER_ADDRESS";
const amount = 100_000_000n;
const txName = "example";

(await newTransaction(client, txName)).unwrap();
(await addInput(client, txName, from, amount)).unwrap();
(await addOutput(client, txName, to, amount)).unwrap();
(await addFee(client, txName, from)).unwrap();
(await signTransaction(client, txName)).unwrap();

const composed = (await composeTransaction(client, txName)).unwrap();
const { txid } = (await factoidSubmit(client, composed.params.transaction)).unwrap();

console.log("Transaction:", txid);

const status = (await ack(client, txid, "f")).unwrap();
console.log("Status:", status);
