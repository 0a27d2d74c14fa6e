import test, { monad } from "arrange-act-assert";

import { assertEqual } from "./testUtils";
import { FreeBlocks } from "./FreeBlocks";
import type { Block } from "./MemoryBlocks";

test.describe("FreeBlocks", test => {
    // helpers
    function newBlock(start:number, end:number):Block {
        return {
            start: start,
            end: end,
            id: null,
            prev: null,
            next: null
        };
    }
    function newFreeBlocks(...ranges:[start:number, end:number][]) {
        const freeBlocks = new FreeBlocks();
        const blocks = ranges.map(([start, end]) => newBlock(start, end));
        for (const block of blocks) {
            freeBlocks.add(block);
        }
        return { freeBlocks, blocks };
    }
    // end helpers
    test.describe("total", test => {
        test("should sum the sizes of the indexed blocks", {
            ARRANGE() {
                return newFreeBlocks([200, 320], [0, 50], [400, 430]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.total;
            },
            ASSERT(total) {
                assertEqual(total, 200);
            }
        });
        test("should be zero when empty", {
            ARRANGE() {
                return newFreeBlocks();
            },
            ACT({ freeBlocks }) {
                return freeBlocks.total;
            },
            ASSERT(total) {
                assertEqual(total, 0);
            }
        });
    });
    test.describe("bestFit", test => {
        test("should return the smallest block that fits", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [200, 320], [400, 430]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.bestFit(20);
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[2]);
            }
        });
        test("should return the lowest address between blocks of the same size", {
            ARRANGE() {
                return newFreeBlocks([300, 340], [100, 140], [0, 80]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.bestFit(40);
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[1]);
            }
        });
        test("should return an exact size match", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [60, 90], [100, 200]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.bestFit(50);
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[0]);
            }
        });
        test("should return null if no block fits", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [60, 90]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.bestFit(51);
            },
            ASSERT(block) {
                assertEqual(block, null);
            }
        });
    });
    test.describe("worstFit", test => {
        test("should return the largest block", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [200, 320], [400, 430]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.worstFit(20);
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[1]);
            }
        });
        test("should return the lowest address between the largest blocks", {
            ARRANGE() {
                return newFreeBlocks([500, 600], [0, 10], [150, 250]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.worstFit(100);
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[2]);
            }
        });
        test("should return null if the largest block is too small", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [200, 320]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.worstFit(121);
            },
            ASSERT(block) {
                assertEqual(block, null);
            }
        });
    });
    test.describe("remove", test => {
        test("should remove the block from the index", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [100, 150], [200, 320]);
            },
            ACT({ freeBlocks, blocks }) {
                freeBlocks.remove(blocks[0]);
            },
            ASSERTS: {
                "should not return the block"(_, { freeBlocks, blocks }) {
                    assertEqual(freeBlocks.bestFit(1), blocks[1]);
                },
                "should pick the next block of the same size"(_, { freeBlocks, blocks }) {
                    assertEqual(freeBlocks.bestFit(50), blocks[1]);
                },
                "should update the count"(_, { freeBlocks }) {
                    assertEqual(freeBlocks.count, 2);
                },
                "should subtract the block from the total"(_, { freeBlocks }) {
                    assertEqual(freeBlocks.total, 170);
                }
            }
        });
        test("should error if the block is not indexed", {
            ARRANGE() {
                const { freeBlocks } = newFreeBlocks([0, 50]);
                return { freeBlocks, other: newBlock(60, 110) };
            },
            ACT({ freeBlocks, other }) {
                return monad(() => freeBlocks.remove(other));
            },
            ASSERT(res) {
                res.should.error({
                    message: "Free block not indexed"
                });
            }
        });
    });
    test.describe("largest", test => {
        test("should return the largest block", {
            ARRANGE() {
                return newFreeBlocks([0, 50], [200, 320], [400, 430]);
            },
            ACT({ freeBlocks }) {
                return freeBlocks.largest();
            },
            ASSERT(block, { blocks }) {
                assertEqual(block, blocks[1]);
            }
        });
        test("should return null after clear", {
            ARRANGE() {
                return newFreeBlocks([0, 50]);
            },
            ACT({ freeBlocks }) {
                freeBlocks.clear();
                return freeBlocks.largest();
            },
            ASSERTS: {
                "should not return a block"(block) {
                    assertEqual(block, null);
                },
                "should count no blocks"(_, { freeBlocks }) {
                    assertEqual(freeBlocks.count, 0);
                },
                "should reset the total"(_, { freeBlocks }) {
                    assertEqual(freeBlocks.total, 0);
                }
            }
        });
    });
});
