import * as Assert from "assert";

import type { Arena, ArenaContext } from "./Arena";

// Force equal types
export function assertDeepEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.deepStrictEqual(a, b);
}
export function assertEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.strictEqual(a, b);
}

export function newArenaContext() {
    const calls:Record<keyof ArenaContext["logger"], string[]> = {
        info: [],
        warn: []
    };
    const context:ArenaContext = {
        logger: {
            info(message) {
                calls.info.push(message);
            },
            warn(message) {
                calls.warn.push(message);
            }
        }
    };
    return {
        context,
        splice(level:keyof typeof calls) {
            return calls[level].splice(0);
        }
    };
}

// Checks that the blocks cover the whole arena in order and that no two free blocks touch
export function assertPartition(arena:Pick<Arena, "snapshot"|"totalSize">) {
    let address = 0;
    let previousFree = false;
    for (const block of arena.snapshot()) {
        assertEqual(block.start_address, address);
        Assert.ok(block.size > 0, `Empty block at ${address}`);
        Assert.ok(!(previousFree && block.free), `Adjacent free blocks at ${address}`);
        assertEqual(block.free, block.id == null);
        previousFree = block.free;
        address += block.size;
    }
    assertEqual(address, arena.totalSize);
}
