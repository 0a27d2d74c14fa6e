export class ArenaError extends Error {
    readonly code:string = "ArenaError";
    readonly statusCode:number = 500;
}
export class InvalidInputError extends ArenaError {
    readonly code:string = "InvalidInputError";
    readonly statusCode:number = 400;
}
export class InvalidSizeError extends InvalidInputError {
    readonly code = "InvalidSizeError";
    constructor(field:string, value:unknown) {
        super(`Invalid ${field}: ${String(value)}. It must be a positive integer`);
    }
}
export class InvalidStrategyError extends InvalidInputError {
    readonly code = "InvalidStrategyError";
    constructor(value:unknown) {
        super(`Invalid allocation strategy: ${String(value)}. Use first, best or worst`);
    }
}
export class InvalidBlockIdError extends InvalidInputError {
    readonly code = "InvalidBlockIdError";
    constructor(value:unknown) {
        super(`Invalid block ID format: ${String(value)}`);
    }
}
export class OutOfMemoryError extends ArenaError {
    readonly code = "OutOfMemoryError";
    readonly statusCode = 409;
    constructor(readonly size:number, readonly strategy:string) {
        super(`No suitable block found for size ${size} using ${strategy}-fit`);
    }
}
export class BlockNotFoundError extends ArenaError {
    readonly code = "BlockNotFoundError";
    readonly statusCode = 404;
    constructor(readonly blockId:number) {
        super(`Block ID ${blockId} not found`);
    }
}
export class ArenaNotInitializedError extends ArenaError {
    readonly code = "ArenaNotInitializedError";
    readonly statusCode = 400;
    constructor() {
        super("Memory not initialized");
    }
}
