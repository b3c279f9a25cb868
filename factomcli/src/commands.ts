import type { Command } from "@oclif/core";

import Config from "./commands/config/index.js";
import ConfigGet from "./commands/config/get.js";
import ConfigInit from "./commands/config/init.js";
import ConfigSet from "./commands/config/set.js";
import ConfigShow from "./commands/config/show.js";
import Node from "./commands/node/index.js";
import NodeAck from "./commands/node/ack.js";
import NodeEntry from "./commands/node/entry.js";
import NodeHeights from "./commands/node/heights.js";
import NodePendingEntries from "./commands/node/pending-entries.js";
import NodePendingTransactions from "./commands/node/pending-transactions.js";
import NodeProperties from "./commands/node/properties.js";
import NodeRawData from "./commands/node/raw-data.js";
import NodeTransaction from "./commands/node/transaction.js";
import Rpc from "./commands/rpc.js";
import WalletBalances from "./commands/wallet/balances.js";
import WalletHeight from "./commands/wallet/height.js";
import Wallet from "./commands/wallet/index.js";
import WalletProperties from "./commands/wallet/properties.js";
import WalletTmpTransactions from "./commands/wallet/tmp-transactions.js";
import WalletTransactions from "./commands/wallet/transactions.js";

export const COMMANDS: Record<string, Command.Class> = {
  config: Config,
  "config:get": ConfigGet,
  "config:init": ConfigInit,
  "config:set": ConfigSet,
  "config:show": ConfigShow,

  node: Node,
  "node:ack": NodeAck,
  "node:entry": NodeEntry,
  "node:heights": NodeHeights,
  "node:pending-entries": NodePendingEntries,
  "node:pending-transactions": NodePendingTransactions,
  "node:properties": NodeProperties,
  "node:raw-data": NodeRawData,
  "node:transaction": NodeTransaction,

  rpc: Rpc,

  wallet: Wallet,
  "wallet:balances": WalletBalances,
  "wallet:height": WalletHeight,
  "wallet:properties": WalletProperties,
  "wallet:tmp-transactions": WalletTmpTransactions,
  "wallet:transactions": WalletTransactions,
};
