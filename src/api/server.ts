import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { Arena, type BlockView } from "../Arena";
import { resolveServerConfig, type ServerOptions } from "../config";
import { ArenaError, ArenaNotInitializedError, InvalidInputError, InvalidSizeError } from "../errors";
import { isNonEmptyList, parseBlockId, parseSize, parseStrategy } from "../utils";

interface InitBody {
    total_size?:unknown;
}
interface AllocateBody {
    size?:unknown;
    strategy?:unknown;
}
interface AllocateMultipleBody {
    sizes?:unknown;
    strategy?:unknown;
}
interface DeallocateBody {
    block_id?:unknown;
}
interface DeallocateMultipleBody {
    block_ids?:unknown;
}
type FailedSizeResponse = {
    size:unknown;
    error:string;
    code:string;
};
type BlockResponse = {
    id?:number;
    start_address:number;
    size:number;
    free:boolean;
    share:number;
};

function toResponse(block:BlockView, totalSize:number):BlockResponse {
    const response:BlockResponse = {
        start_address: block.start_address,
        size: block.size,
        free: block.free,
        share: block.size / totalSize
    };
    // Free blocks have no id to show
    return block.id == null ? response : { id: block.id, ...response };
}
function memoryView(arena:Arena) {
    return {
        total_size: arena.totalSize,
        blocks: arena.snapshot().map(block => toResponse(block, arena.totalSize)),
        stats: arena.stats()
    };
}

export async function buildServer(options:ServerOptions = {}):Promise<FastifyInstance> {
    const config = resolveServerConfig(options);
    const server = Fastify({
        logger: config.logger
    });
    await server.register(cors, { origin: true });

    // One arena for the whole process. Handlers run synchronously against it, so requests never see it half updated
    let arena:Arena|null = null;
    function getArena() {
        if (!arena) {
            throw new ArenaNotInitializedError();
        }
        return arena;
    }

    server.setErrorHandler((error, request, reply) => {
        if (error instanceof ArenaError) {
            request.log.info({ code: error.code }, error.message);
            return reply.code(error.statusCode).send({ error: error.message, code: error.code });
        }
        return reply.send(error);
    });

    server.get("/memory", async () => {
        return memoryView(getArena());
    });

    server.post<{ Body:InitBody|undefined }>("/init", async (request) => {
        const totalSize = parseSize(request.body?.total_size ?? config.defaultTotalSize, "total_size");
        let current = arena;
        if (current) {
            current.initialize(totalSize);
        } else {
            current = arena = new Arena(totalSize, { logger: server.log });
        }
        return memoryView(current);
    });

    server.post<{ Body:AllocateBody|undefined }>("/allocate", async (request) => {
        const current = getArena();
        const size = parseSize(request.body?.size ?? config.defaultAllocSize);
        const strategy = parseStrategy(request.body?.strategy ?? config.defaultStrategy);
        const allocated = current.allocate(size, strategy);
        return { ...memoryView(current), allocated };
    });

    server.post<{ Body:AllocateMultipleBody|undefined }>("/allocate_multiple", async (request) => {
        const current = getArena();
        const entries = request.body?.sizes;
        if (!isNonEmptyList(entries)) {
            throw new InvalidInputError("A list of sizes is required");
        }
        const strategy = parseStrategy(request.body?.strategy ?? config.defaultStrategy);
        // Failures are kept by request position, so the ones found while parsing and allocating stay in order
        const failed:(FailedSizeResponse|null)[] = [];
        const sizes:number[] = [];
        const positions:number[] = [];
        for (let i = 0; i < entries.length; i++) {
            try {
                sizes.push(parseSize(entries[i]));
                positions.push(i);
                failed.push(null);
            } catch (e) {
                if (!(e instanceof InvalidSizeError)) {
                    throw e;
                }
                failed.push({ size: entries[i], error: e.message, code: e.code });
            }
        }
        const result = current.allocateMultiple(sizes, strategy);
        for (const { index, size, error } of result.failed) {
            failed[positions[index]] = { size, error: error.message, code: error.code };
        }
        return {
            ...memoryView(current),
            allocated: result.allocated,
            failed: failed.filter((entry):entry is FailedSizeResponse => entry != null)
        };
    });

    server.post<{ Body:DeallocateBody|undefined }>("/deallocate", async (request) => {
        const current = getArena();
        const blockId = request.body?.block_id;
        if (blockId == null) {
            throw new InvalidInputError("Block ID is required");
        }
        current.deallocate(parseBlockId(blockId));
        return memoryView(current);
    });

    server.post<{ Body:DeallocateMultipleBody|undefined }>("/deallocate_multiple", async (request) => {
        const current = getArena();
        const blockIds = request.body?.block_ids;
        if (!isNonEmptyList(blockIds)) {
            throw new InvalidInputError("A list of block IDs is required");
        }
        const parsed:(number|null)[] = [];
        for (const blockId of blockIds) {
            try {
                parsed.push(parseBlockId(blockId));
            } catch (e) {
                if (!(e instanceof InvalidInputError)) {
                    throw e;
                }
                parsed.push(null);
            }
        }
        const result = current.deallocateMultiple(parsed.filter((blockId):blockId is number => blockId != null));
        // An id is freed at most once, on its first appearance. Any later appearance failed
        const failed = new Set<unknown>();
        const seen = new Set<number>();
        for (let i = 0; i < blockIds.length; i++) {
            const blockId = parsed[i];
            if (blockId == null) {
                failed.add(blockIds[i]);
            } else {
                if (seen.has(blockId) || !result.succeeded.has(blockId)) {
                    failed.add(blockId);
                }
                seen.add(blockId);
            }
        }
        return {
            ...memoryView(current),
            succeeded: Array.from(result.succeeded),
            failed: Array.from(failed)
        };
    });

    return server;
}
