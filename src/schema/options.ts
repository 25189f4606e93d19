import type { Logger } from "./connection";

export type MemorySignalHostOptions = {
    /** Where refused wiring and throwing callbacks are reported. Defaults to console. */
    logger?: Logger;
};

export type DynamicConnectionOptions = {
    /** Initial connect flags (default ConnectFlags.NONE). */
    flags?: number;
    logger?: Logger;
};
