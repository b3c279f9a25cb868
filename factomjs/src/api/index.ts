export * from "./entry.js";
export * from "./blocks.js";
export * from "./balances.js";
export * from "./transaction.js";
export * from "./node.js";
export * from "./wallet/addresses.js";
export * from "./wallet/compose.js";
export * from "./wallet/identity.js";
export * from "./wallet/tx.js";
export * from "./wallet/utils.js";
