export type Block = {
    start:number;
    end:number;
    id:number|null; // null while free
    prev:Block|null;
    next:Block|null;
};
export class MemoryBlocks {
    private _first:Block|null = null;
    reset(size:number) {
        this._first = {
            start: 0,
            end: size,
            id: null,
            prev: null,
            next: null
        };
        return this._first;
    }
    split(block:Block, size:number) {
        // Cuts the block in two, keeping "size" at the front. Returns the front block
        const end = block.start + size;
        if (end >= block.end) {
            return block;
        }
        const rest:Block = {
            start: end,
            end: block.end,
            id: block.id,
            prev: block,
            next: block.next
        };
        if (rest.next) {
            rest.next.prev = rest;
        }
        block.end = end;
        block.next = rest;
        return block;
    }
    mergeNext(block:Block) {
        // Absorbs the following block into this one. The following block is dropped from the list
        const next = block.next;
        if (!next) {
            throw new Error("No block to merge with");
        }
        block.end = next.end;
        block.next = next.next;
        if (block.next) {
            block.next.prev = block;
        }
        next.prev = null;
        next.next = null;
        return block;
    }
    *[Symbol.iterator]():Generator<Block, void, void> {
        let block = this._first;
        while (block) {
            yield block;
            block = block.next;
        }
    }
}
