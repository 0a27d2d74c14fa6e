import { Strategy } from "./constants";
import { InvalidBlockIdError, InvalidSizeError, InvalidStrategyError } from "./errors";

const INTEGER = /^\s*\d+\s*$/;

function toPositiveInteger(value:unknown) {
    let number:number;
    if (typeof value === "number") {
        number = value;
    } else if (typeof value === "string" && INTEGER.test(value)) {
        number = Number(value);
    } else {
        return null;
    }
    return Number.isSafeInteger(number) && number > 0 ? number : null;
}
export function parseSize(value:unknown, field = "size") {
    const size = toPositiveInteger(value);
    if (size == null) {
        throw new InvalidSizeError(field, value);
    }
    return size;
}
export function parseStrategy(value:unknown) {
    if (typeof value === "string") {
        switch (value.trim().toLowerCase().replace(/[-_ ]?fit$/, "")) {
            case "first":
                return Strategy.FIRST_FIT;
            case "best":
                return Strategy.BEST_FIT;
            case "worst":
                return Strategy.WORST_FIT;
        }
    }
    throw new InvalidStrategyError(value);
}
export function parseBlockId(value:unknown) {
    const id = toPositiveInteger(value);
    if (id == null) {
        throw new InvalidBlockIdError(value);
    }
    return id;
}
export function isNonEmptyList(value:unknown):value is unknown[] {
    return Array.isArray(value) && value.length > 0;
}
