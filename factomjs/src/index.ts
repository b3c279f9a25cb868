export * from "./clients/RPCClient.js";
export * from "./clients/FactomClient.js";
export type * from "./clients/types/Configs.js";
export type * from "./clients/types/RPC.js";
export * from "./transport/HttpTransport.js";
export * from "./transport/MockTransport.js";
export * from "./transport/types/ITransport.js";
export type * from "./transport/types/IHttpTransportConfig.js";
export * from "./errors/FactomError.js";
export * from "./rpc/ApiResponse.js";
export * from "./rpc/codec.js";
export type * from "./rpc/types.js";
export type * from "./types/IBalances.js";
export type * from "./types/IBlocks.js";
export type * from "./types/IEntry.js";
export type * from "./types/IIdentity.js";
export type * from "./types/INode.js";
export type * from "./types/IReceipt.js";
export type * from "./types/ITransaction.js";
export type * from "./types/IWallet.js";
export * from "./api/index.js";
export * from "./utils/endpoint.js";
export * from "./utils/rpc.js";
export * from "./logger.js";
export * from "./version.js";
