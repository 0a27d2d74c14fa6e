import type { Block } from "./MemoryBlocks";

function blockSize(block:Block) {
    return block.end - block.start;
}
export class FreeBlocks {
    // Ordered by size and then by start, so the first of a size group is the lowest address
    private _blocks:Block[] = [];
    private _total = 0;
    get count() {
        return this._blocks.length;
    }
    get total() {
        return this._total;
    }
    private _lowerBound(size:number, start:number) {
        let low = 0;
        let high = this._blocks.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            const block = this._blocks[mid];
            const diff = (blockSize(block) - size) || (block.start - start);
            if (diff < 0) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }
    clear() {
        this._blocks = [];
        this._total = 0;
    }
    add(block:Block) {
        const index = this._lowerBound(blockSize(block), block.start);
        this._blocks.splice(index, 0, block);
        this._total += blockSize(block);
    }
    remove(block:Block) {
        // Must be called before the block changes its bounds, as the position is searched by them
        const index = this._lowerBound(blockSize(block), block.start);
        if (this._blocks[index] !== block) {
            throw new Error("Free block not indexed");
        }
        this._blocks.splice(index, 1);
        this._total -= blockSize(block);
    }
    bestFit(size:number) {
        const index = this._lowerBound(size, 0);
        return index < this._blocks.length ? this._blocks[index] : null;
    }
    worstFit(size:number) {
        const largest = this.largest();
        if (!largest || blockSize(largest) < size) {
            return null;
        }
        return this._blocks[this._lowerBound(blockSize(largest), 0)];
    }
    largest() {
        return this._blocks.length > 0 ? this._blocks[this._blocks.length - 1] : null;
    }
}
