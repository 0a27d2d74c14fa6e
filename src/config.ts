import { DEFAULT_HOST, DEFAULT_STRATEGY, Defaults, Strategy } from "./constants";
import { parseSize, parseStrategy } from "./utils";

export type ServerOptions = {
    host?:string;
    port?:number;
    logger?:boolean;
    defaultTotalSize?:number;
    defaultAllocSize?:number;
    defaultStrategy?:Strategy;
};
export type ServerConfig = Required<ServerOptions>;

function numEnv(env:NodeJS.ProcessEnv, name:string, fallback:number) {
    try {
        return parseSize(env[name], name);
    } catch {
        return fallback;
    }
}
function strategyEnv(env:NodeJS.ProcessEnv, name:string, fallback:Strategy) {
    try {
        return parseStrategy(env[name]);
    } catch {
        return fallback;
    }
}
function boolEnv(env:NodeJS.ProcessEnv, name:string, fallback:boolean) {
    const value = env[name]?.trim().toLowerCase();
    if (value === "true" || value === "1") {
        return true;
    } else if (value === "false" || value === "0") {
        return false;
    }
    return fallback;
}
export function resolveServerConfig(opts:ServerOptions = {}, env:NodeJS.ProcessEnv = process.env):ServerConfig {
    return {
        host: opts.host || env.ARENA_HOST || DEFAULT_HOST,
        port: opts.port ?? numEnv(env, "ARENA_PORT", Defaults.PORT),
        logger: opts.logger ?? boolEnv(env, "ARENA_LOGGER", true),
        defaultTotalSize: opts.defaultTotalSize ?? numEnv(env, "ARENA_DEFAULT_TOTAL_SIZE", Defaults.TOTAL_SIZE),
        defaultAllocSize: opts.defaultAllocSize ?? numEnv(env, "ARENA_DEFAULT_ALLOC_SIZE", Defaults.ALLOC_SIZE),
        defaultStrategy: opts.defaultStrategy ?? strategyEnv(env, "ARENA_DEFAULT_STRATEGY", DEFAULT_STRATEGY)
    };
}
