export { Arena } from "./Arena";
export type { AllocatedBlock, AllocationResult, ArenaContext, ArenaLogger, ArenaStats, BlockView, DeallocationResult, FailedAllocation } from "./Arena";
export { Strategy } from "./constants";
export * from "./errors";
export { parseBlockId, parseSize, parseStrategy } from "./utils";
export { buildServer } from "./api/server";
export { resolveServerConfig } from "./config";
export type { ServerConfig, ServerOptions } from "./config";
