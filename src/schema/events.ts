import type { Callable } from "../core/callable";
import type { SignalRef } from "../core/signal";
import type { RemovalReason } from "./connection";

export type LinkPair = {
    source: SignalRef | null;
    target: Callable | null;
};

export type LinkEvents = {
    "link:change": { previous: LinkPair; next: LinkPair; wired: boolean };
    "link:warning": { message: string; code: string };
};

export type SignalHostEvents = {
    "connection:added": { source: SignalRef; target: Callable; flags: number };
    "connection:removed": {
        source: SignalRef;
        target: Callable;
        reason: RemovalReason;
    };
};
