import {
    ConnectFlags,
    hasFlag,
    type ConnectionInfo,
    type ConnectResult,
    type RemovalReason,
} from "../schema/connection";
import type { SignalHostEvents } from "../schema/events";
import type { MemorySignalHostOptions } from "../schema/options";
import type { Callable } from "./callable";
import { EventBus } from "./events";
import type { HostObject } from "./host-object";
import type { SignalRef } from "./signal";

/**
 * The host event system as seen by a connection handle: primitive wiring plus
 * the liveness and invokability queries used to validate a pair.
 */
export interface SignalHost {
    connect(source: SignalRef, target: Callable, flags: number): ConnectResult;
    disconnect(source: SignalRef, target: Callable): boolean;
    isConnected(source: SignalRef, target: Callable): boolean;
    hasLiveOwner(source: SignalRef | null): boolean;
    isInvokable(target: Callable | null): boolean;
    /** Optional change feed; bindings re-read handle status when it fires. */
    readonly events?: EventBus<SignalHostEvents>;
}

type ConnectionRecord = {
    source: SignalRef;
    target: Callable;
    flags: number;
    refCount: number;
};

type DeferredCall = { source: SignalRef; target: Callable; args: unknown[] };

export class MemorySignalHost implements SignalHost {
    readonly events: EventBus<SignalHostEvents>;
    private readonly opts: Required<MemorySignalHostOptions>;
    private connections = new Map<HostObject, Map<string, ConnectionRecord[]>>();
    private deferred: DeferredCall[] = [];
    private watched = new WeakSet<HostObject>();

    constructor(opts: MemorySignalHostOptions = {}) {
        this.opts = { logger: opts.logger ?? console };
        this.events = new EventBus<SignalHostEvents>(this.opts.logger);
    }

    // ── Validation ───────────────────────────────────────────────────────────
    hasLiveOwner(source: SignalRef | null): boolean {
        return !!source && source.hasLiveOwner();
    }

    isInvokable(target: Callable | null): boolean {
        return !!target && target.isValid();
    }

    // ── Wiring ───────────────────────────────────────────────────────────────
    connect(
        source: SignalRef,
        target: Callable,
        flags: number = ConnectFlags.NONE,
    ): ConnectResult {
        const owner = source.owner;
        if (!owner || !this.hasLiveOwner(source)) return "invalid_source";
        if (!this.isInvokable(target)) return "invalid_target";

        const list = this.listFor(owner, source.name);
        const existing = list.find((r) => r.target.equals(target));
        if (existing) {
            if (!hasFlag(existing.flags, ConnectFlags.REFERENCE_COUNTED)) {
                return "already_connected";
            }
            existing.refCount++;
            return "ok";
        }

        list.push({ source, target, flags, refCount: 1 });
        this.watch(owner);
        if (target.object) this.watch(target.object);
        this.events.emit("connection:added", { source, target, flags });
        return "ok";
    }

    disconnect(source: SignalRef, target: Callable): boolean {
        const rec = this.find(source, target);
        if (!rec) return false;
        if (rec.refCount > 1) {
            rec.refCount--;
            return true;
        }
        this.removeRecord(rec, "disconnect");
        return true;
    }

    isConnected(source: SignalRef, target: Callable): boolean {
        return this.find(source, target) !== undefined;
    }

    getConnections(source: SignalRef): ConnectionInfo[] {
        if (!source.owner) return [];
        const list = this.connections.get(source.owner)?.get(source.name) ?? [];
        return list.map((r) => ({
            source: r.source,
            target: r.target,
            flags: r.flags,
            refCount: r.refCount,
        }));
    }

    // ── Emission ─────────────────────────────────────────────────────────────
    /**
     * Calls every target connected to `source` in connection order.
     * Returns how many calls were made or queued.
     */
    emit(source: SignalRef, ...args: unknown[]): number {
        const owner = source.owner;
        if (!owner || !this.hasLiveOwner(source)) return 0;
        const list = this.connections.get(owner)?.get(source.name);
        if (!list || list.length === 0) return 0;

        let count = 0;
        for (const rec of Array.from(list)) {
            // disconnected by an earlier callback in this emission
            if (!list.includes(rec)) continue;
            if (hasFlag(rec.flags, ConnectFlags.ONE_SHOT)) {
                this.removeRecord(rec, "one_shot");
            }
            if (!rec.target.isValid()) continue;

            if (hasFlag(rec.flags, ConnectFlags.DEFERRED)) {
                this.deferred.push({ source, target: rec.target, args });
            } else {
                this.invoke(source, rec.target, args);
            }
            count++;
        }
        return count;
    }

    /**
     * Runs the deferred calls queued so far. Calls queued while flushing wait
     * for the next flush.
     */
    flush(): number {
        const batch = this.deferred;
        this.deferred = [];
        let ran = 0;
        for (const call of batch) {
            if (!call.target.isValid()) continue;
            this.invoke(call.source, call.target, call.args);
            ran++;
        }
        return ran;
    }

    pendingCount(): number {
        return this.deferred.length;
    }

    // ── Internals ────────────────────────────────────────────────────────────
    private invoke(source: SignalRef, target: Callable, args: unknown[]): void {
        try {
            target.call(...args);
        } catch (err) {
            this.opts.logger.error(
                `[MemorySignalHost] ${target.toString()} threw while handling ${source.toString()}`,
                err,
            );
        }
    }

    private find(source: SignalRef, target: Callable): ConnectionRecord | undefined {
        if (!source.owner) return undefined;
        const list = this.connections.get(source.owner)?.get(source.name);
        return list?.find((r) => r.target.equals(target));
    }

    private listFor(owner: HostObject, name: string): ConnectionRecord[] {
        let byName = this.connections.get(owner);
        if (!byName) {
            byName = new Map();
            this.connections.set(owner, byName);
        }
        let list = byName.get(name);
        if (!list) {
            list = [];
            byName.set(name, list);
        }
        return list;
    }

    private removeRecord(rec: ConnectionRecord, reason: RemovalReason): void {
        const owner = rec.source.owner;
        if (!owner) return;
        const byName = this.connections.get(owner);
        const list = byName?.get(rec.source.name);
        if (!byName || !list) return;
        const i = list.indexOf(rec);
        if (i < 0) return;
        list.splice(i, 1);
        if (list.length === 0) byName.delete(rec.source.name);
        if (byName.size === 0) this.connections.delete(owner);
        this.events.emit("connection:removed", {
            source: rec.source,
            target: rec.target,
            reason,
        });
    }

    private watch(object: HostObject): void {
        if (this.watched.has(object)) return;
        this.watched.add(object);
        object.onFree((freed) => this.purge(freed));
    }

    // drop everything the freed object emits or receives
    private purge(object: HostObject): void {
        const doomed: ConnectionRecord[] = [];
        for (const byName of this.connections.values()) {
            for (const list of byName.values()) {
                for (const rec of list) {
                    if (rec.source.owner === object || rec.target.object === object) {
                        doomed.push(rec);
                    }
                }
            }
        }
        for (const rec of doomed) this.removeRecord(rec, "freed");
    }
}
