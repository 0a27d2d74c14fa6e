import { MemoryBlocks, type Block } from "./MemoryBlocks";
import { FreeBlocks } from "./FreeBlocks";
import { DEFAULT_STRATEGY, Strategy } from "./constants";
import { BlockNotFoundError, InvalidSizeError, InvalidStrategyError, OutOfMemoryError } from "./errors";

export type ArenaLogger = {
    info(message:string):void;
    warn(message:string):void;
};
export type ArenaContext = {
    logger:ArenaLogger;
};
export type BlockView = {
    id:number|null;
    start_address:number;
    size:number;
    free:boolean;
};
export type AllocatedBlock = {
    id:number;
    start_address:number;
    size:number;
};
export type FailedAllocation = {
    index:number; // position in the requested sizes
    size:number;
    error:InvalidSizeError|OutOfMemoryError;
};
export type AllocationResult = {
    allocated:AllocatedBlock[];
    failed:FailedAllocation[];
};
export type DeallocationResult = {
    succeeded:Set<number>;
    failed:Set<number>;
};
export type ArenaStats = {
    total_size:number;
    allocated:number;
    free:number;
    largest_free:number;
    allocated_blocks:number;
    free_blocks:number;
    external_fragmentation:number;
};

const SILENT:ArenaLogger = {
    info() {},
    warn() {}
};

function isPositiveInteger(value:number) {
    return Number.isSafeInteger(value) && value > 0;
}
function describe(block:Block) {
    return `${block.start} -> ${block.end - 1}`;
}
export class Arena {
    private _totalSize = 0;
    private _nextId = 1;
    private _blocks = new MemoryBlocks();
    private _freeBlocks = new FreeBlocks();
    private _allocated = new Map<number, Block>();
    constructor(totalSize:number, private readonly _context:ArenaContext = { logger: SILENT }) {
        this.initialize(totalSize);
    }
    get totalSize() {
        return this._totalSize;
    }
    initialize(totalSize:number) {
        if (!isPositiveInteger(totalSize)) {
            throw new InvalidSizeError("total_size", totalSize);
        }
        this._totalSize = totalSize;
        this._nextId = 1;
        this._allocated.clear();
        this._freeBlocks.clear();
        this._freeBlocks.add(this._blocks.reset(totalSize));
        this._context.logger.info(`Initialized memory with a single block of ${totalSize} units`);
    }
    private _firstFit(size:number) {
        for (const block of this._blocks) {
            if (block.id == null && block.end - block.start >= size) {
                return block;
            }
        }
        return null;
    }
    private _findFreeBlock(size:number, strategy:Strategy) {
        switch (strategy) {
            case Strategy.FIRST_FIT:
                return this._firstFit(size);
            case Strategy.BEST_FIT:
                return this._freeBlocks.bestFit(size);
            case Strategy.WORST_FIT:
                return this._freeBlocks.worstFit(size);
            default:
                throw new InvalidStrategyError(strategy);
        }
    }
    allocate(size:number, strategy:Strategy = DEFAULT_STRATEGY):AllocatedBlock {
        if (!isPositiveInteger(size)) {
            throw new InvalidSizeError("size", size);
        }
        const block = this._findFreeBlock(size, strategy);
        if (!block) {
            this._context.logger.warn(`No suitable block found for size ${size} using ${strategy}-fit`);
            throw new OutOfMemoryError(size, strategy);
        }
        const end = block.end;
        this._freeBlocks.remove(block);
        const allocated = this._blocks.split(block, size);
        if (allocated.next && allocated.end < end) {
            // The remainder after the allocated part stays free
            this._freeBlocks.add(allocated.next);
        }
        allocated.id = this._nextId++;
        this._allocated.set(allocated.id, allocated);
        this._context.logger.info(`Allocated ${size} units in block ID ${allocated.id} at ${describe(allocated)} using ${strategy}-fit`);
        return {
            id: allocated.id,
            start_address: allocated.start,
            size: size
        };
    }
    allocateMultiple(sizes:Iterable<number>, strategy:Strategy = DEFAULT_STRATEGY):AllocationResult {
        const result:AllocationResult = {
            allocated: [],
            failed: []
        };
        let index = 0;
        for (const size of sizes) {
            try {
                result.allocated.push(this.allocate(size, strategy));
            } catch (e) {
                if (!(e instanceof InvalidSizeError || e instanceof OutOfMemoryError)) {
                    throw e;
                }
                if (e instanceof InvalidSizeError) {
                    // Out of memory is already logged by allocate
                    this._context.logger.warn(e.message);
                }
                result.failed.push({ index, size, error: e });
            }
            index++;
        }
        return result;
    }
    deallocate(blockId:number) {
        const block = this._allocated.get(blockId);
        if (!block) {
            throw new BlockNotFoundError(blockId);
        }
        this._allocated.delete(blockId);
        block.id = null;
        let merged = block;
        if (merged.next && merged.next.id == null) {
            this._context.logger.info(`Merging block ID ${blockId} with next free block at ${describe(merged.next)}`);
            this._freeBlocks.remove(merged.next);
            this._blocks.mergeNext(merged);
        }
        if (merged.prev && merged.prev.id == null) {
            this._context.logger.info(`Merging block ID ${blockId} with previous free block at ${describe(merged.prev)}`);
            const prev = merged.prev;
            this._freeBlocks.remove(prev);
            merged = this._blocks.mergeNext(prev);
        }
        this._freeBlocks.add(merged);
        this._context.logger.info(`Deallocated block ID ${blockId}, free block now at ${describe(merged)}`);
    }
    deallocateMultiple(blockIds:Iterable<number>):DeallocationResult {
        const result:DeallocationResult = {
            succeeded: new Set(),
            failed: new Set()
        };
        for (const blockId of blockIds) {
            try {
                this.deallocate(blockId);
                result.succeeded.add(blockId);
            } catch (e) {
                if (!(e instanceof BlockNotFoundError)) {
                    throw e;
                }
                this._context.logger.warn(e.message);
                result.failed.add(blockId);
            }
        }
        return result;
    }
    snapshot() {
        const blocks:BlockView[] = [];
        for (const block of this._blocks) {
            blocks.push({
                id: block.id,
                start_address: block.start,
                size: block.end - block.start,
                free: block.id == null
            });
        }
        return blocks;
    }
    stats():ArenaStats {
        const free = this._freeBlocks.total;
        const largest = this._freeBlocks.largest();
        const largestFree = largest ? largest.end - largest.start : 0;
        return {
            total_size: this._totalSize,
            allocated: this._totalSize - free,
            free: free,
            largest_free: largestFree,
            allocated_blocks: this._allocated.size,
            free_blocks: this._freeBlocks.count,
            external_fragmentation: free - largestFree
        };
    }
}
