export const enum Strategy {
    FIRST_FIT = "first",
    BEST_FIT = "best",
    WORST_FIT = "worst"
}
export const enum Defaults {
    TOTAL_SIZE = 1000,
    ALLOC_SIZE = 100,
    PORT = 5002
}
export const DEFAULT_STRATEGY = Strategy.BEST_FIT;
export const DEFAULT_HOST = "0.0.0.0";
