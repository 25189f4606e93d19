import type { Callable } from "../core/callable";
import type { SignalRef } from "../core/signal";

/**
 * Connection behaviour bits. Values match the host engine's connect flags so
 * they can be passed through unchanged.
 */
export const ConnectFlags = {
    NONE: 0,
    /** Calls are queued at emission and run when the host flushes. */
    DEFERRED: 1,
    /** Kept on the connection record only; nothing is serialized. */
    PERSIST: 2,
    /** The link is removed right before its first call. */
    ONE_SHOT: 4,
    /** Connecting an existing pair bumps a counter instead of failing. */
    REFERENCE_COUNTED: 8,
} as const;

export type ConnectFlag = (typeof ConnectFlags)[keyof typeof ConnectFlags];

export function hasFlag(flags: number, flag: ConnectFlag): boolean {
    return (flags & flag) === flag;
}

export type ConnectResult =
    | "ok"
    | "already_connected"
    | "invalid_source"
    | "invalid_target";

export type ConnectionInfo = {
    source: SignalRef;
    target: Callable;
    flags: number;
    /** 1 unless the link was made with REFERENCE_COUNTED and connected again. */
    refCount: number;
};

export type RemovalReason = "disconnect" | "one_shot" | "freed";

export type Logger = Pick<Console, "warn" | "error">;
