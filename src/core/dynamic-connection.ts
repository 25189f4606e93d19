import { ConnectFlags, type Logger } from "../schema/connection";
import type { LinkEvents, LinkPair } from "../schema/events";
import type { DynamicConnectionOptions } from "../schema/options";
import type { Callable } from "./callable";
import { InvalidArgumentError } from "./errors";
import { EventBus } from "./events";
import type { SignalHost } from "./host";
import type { SignalRef } from "./signal";

type WirablePair = { source: SignalRef; target: Callable };

/**
 * Holds one mutable link between a signal and a callable. Every change goes
 * through {@link setLinkOrNull}, which unwires the stored pair before wiring
 * the new one, so the handle never leaves more than one live link behind.
 *
 * The `*OrNull` setters never throw: an invalid pair is stored as "empty".
 * The strict setters throw {@link InvalidArgumentError} and leave the handle
 * untouched.
 */
export class DynamicConnectionHandle {
    readonly events: EventBus<LinkEvents>;
    private readonly logger: Logger;
    private source: SignalRef | null = null;
    private target: Callable | null = null;
    private flags: number;

    constructor(
        private readonly host: SignalHost,
        opts: DynamicConnectionOptions = {},
    ) {
        this.flags = opts.flags ?? ConnectFlags.NONE;
        this.logger = opts.logger ?? console;
        this.events = new EventBus<LinkEvents>(this.logger);
        this.removeLink();
    }

    static withLink(
        host: SignalHost,
        source: SignalRef | null,
        target: Callable | null,
        flags: number = ConnectFlags.NONE,
        opts: Omit<DynamicConnectionOptions, "flags"> = {},
    ): DynamicConnectionHandle {
        const handle = new DynamicConnectionHandle(host, { ...opts, flags });
        handle.setLink(source, target);
        return handle;
    }

    // ── Status ───────────────────────────────────────────────────────────────
    isPairValid(source: SignalRef | null, target: Callable | null): boolean {
        return this.wirable(source, target) !== null;
    }

    /**
     * The stored pair could be wired. Says nothing about whether it still is:
     * it may have been severed elsewhere or fired as a one-shot.
     */
    isValid(): boolean {
        return this.isPairValid(this.source, this.target);
    }

    isLinkActive(): boolean {
        const pair = this.wirable(this.source, this.target);
        return !!pair && this.host.isConnected(pair.source, pair.target);
    }

    getSource(): SignalRef | null {
        return this.source;
    }

    getTarget(): Callable | null {
        return this.target;
    }

    getFlags(): number {
        return this.flags;
    }

    // ── Mutators ─────────────────────────────────────────────────────────────
    setLinkOrNull(
        newSource: SignalRef | null,
        newTarget: Callable | null,
        flags?: number,
    ): void {
        if (flags !== undefined) this.flags = flags;
        const previous: LinkPair = { source: this.source, target: this.target };

        const old = this.wirable(this.source, this.target);
        if (old && this.host.isConnected(old.source, old.target)) {
            this.host.disconnect(old.source, old.target);
        }

        let wired = false;
        const next = this.wirable(newSource, newTarget);
        if (next) {
            const result = this.host.connect(next.source, next.target, this.flags);
            wired = result === "ok";
            if (!wired) {
                const message = `[DynamicConnectionHandle] could not connect ${next.source.toString()} to ${next.target.toString()}: ${result}`;
                this.logger.warn(message);
                this.events.emit("link:warning", { message, code: result });
            }
        }

        this.source = newSource;
        this.target = newTarget;
        this.events.emit("link:change", {
            previous,
            next: { source: newSource, target: newTarget },
            wired,
        });
    }

    setLink(
        newSource: SignalRef | null,
        newTarget: Callable | null,
        flags?: number,
    ): void {
        this.assertSource("setLink", newSource);
        this.assertTarget("setLink", newTarget);
        this.setLinkOrNull(newSource, newTarget, flags);
    }

    removeLink(): void {
        this.setLinkOrNull(null, null);
    }

    setSourceOrNull(source: SignalRef | null): void {
        this.setLinkOrNull(source, this.target);
    }

    setSource(source: SignalRef | null): void {
        this.assertSource("setSource", source);
        this.setLinkOrNull(source, this.target);
    }

    setTargetOrNull(target: Callable | null): void {
        this.setLinkOrNull(this.source, target);
    }

    setTarget(target: Callable | null): void {
        this.assertTarget("setTarget", target);
        this.setLinkOrNull(this.source, target);
    }

    // ── Internals ────────────────────────────────────────────────────────────
    private wirable(
        source: SignalRef | null,
        target: Callable | null,
    ): WirablePair | null {
        if (!source || !target) return null;
        if (!this.host.hasLiveOwner(source) || !this.host.isInvokable(target)) {
            return null;
        }
        return { source, target };
    }

    private assertSource(op: string, source: SignalRef | null): void {
        if (!this.host.hasLiveOwner(source)) {
            throw new InvalidArgumentError(
                "invalid_source",
                `${op}: signal ${String(source ?? "<null signal>")} has no live owner`,
            );
        }
    }

    private assertTarget(op: string, target: Callable | null): void {
        if (!this.host.isInvokable(target)) {
            throw new InvalidArgumentError(
                "invalid_target",
                `${op}: callable ${String(target ?? "<null callable>")} is not invokable`,
            );
        }
    }
}
