import { shuffle } from "./shuffle";
import { UserFacingError, ProtocolError, SimulationError, ReplayError } from "./errors";
import type { ProtocolErrorCode } from "./errors";
import { SeededRandom, deriveSeed, mix32, randomSeed } from "./rng";
import { addResource, supportedLocales } from "./i18n";
import { logger, scopedLogger } from "./logger";
import { config, loadConfig } from "./config";
import stringify from "json-stringify-deterministic";
import fnv from "fnv-plus";

export type { ProtocolErrorCode };
export { shuffle, UserFacingError, ProtocolError, SimulationError, ReplayError, SeededRandom, deriveSeed, mix32, randomSeed, addResource, supportedLocales, logger, scopedLogger, config, loadConfig };

/**
 * Recursively read-only view of a plain data structure.
 */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
    ? T
    : T extends object
        ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
        : T;

/**
 * Stable hash of any JSON-compatible value. Key order does not matter.
 */
export const x2uid = (x: unknown): string => {
    fnv.seed("gridfight");
    const hash = fnv.hash(stringify(x));
    return hash.hex();
}
