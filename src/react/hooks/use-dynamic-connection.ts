import {useCallback, useEffect, useMemo, useState} from 'react';

import {ConnectFlags, type Logger} from "@/schema";
import {DynamicConnectionHandle, type Callable, type SignalHost, type SignalRef} from "@/core";

/* ───────────────────────── public API ───────────────────────── */

export type UseDynamicConnectionOptions = {
    logger?: Logger;
};

export type UseDynamicConnectionReturn = {
    handle: DynamicConnectionHandle;
    /** Stored pair passes validation. */
    valid: boolean;
    /** Host reports the pair as wired right now. */
    active: boolean;
};

type Status = { valid: boolean; active: boolean };

/* ───────────────────────── implementation ───────────────────────── */

/**
 * Keeps one link from `source` to `target` for the lifetime of the component.
 * The link is swapped whenever `source`, `target` or `flags` change identity,
 * so keep those references stable (useMemo) to avoid rewiring on every render.
 * Omitting `flags` wires with no flags, whatever was passed before.
 */
export function useDynamicConnection(
    host: SignalHost,
    source: SignalRef | null,
    target: Callable | null,
    flags: number = ConnectFlags.NONE,
    opts?: UseDynamicConnectionOptions,
): UseDynamicConnectionReturn {
    const logger = opts?.logger;
    const handle = useMemo(
        () => new DynamicConnectionHandle(host, {logger}),
        // a new host means a new handle; logger is read once
        // eslint-disable-next-line react-hooks/exhaustive-deps
        [host]
    );

    const [status, setStatus] = useState<Status>({valid: false, active: false});

    const refresh = useCallback(() => {
        const next: Status = {valid: handle.isValid(), active: handle.isLinkActive()};
        setStatus((prev) =>
            prev.valid === next.valid && prev.active === next.active ? prev : next
        );
    }, [handle]);

    // one-shot firings and frees happen outside the handle, so listen to the host too
    useEffect(() => {
        const offs = [handle.events.on('link:change', refresh)];
        if (host.events) {
            offs.push(
                host.events.on('connection:added', refresh),
                host.events.on('connection:removed', refresh),
            );
        }
        refresh();
        return () => {
            for (const off of offs) off();
        };
    }, [handle, host, refresh]);

    useEffect(() => {
        handle.setLinkOrNull(source, target, flags);
    }, [handle, source, target, flags]);

    useEffect(() => () => handle.removeLink(), [handle]);

    return {handle, valid: status.valid, active: status.active};
}
