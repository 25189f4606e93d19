import { Callable } from "./callable";
import { InvalidArgumentError } from "./errors";
import { SignalRef } from "./signal";

type FreeListener = (object: HostObject) => void;

/**
 * An object living in the host engine. It declares the signals it can emit
 * and has an explicit lifetime: once freed it is no longer a valid signal
 * owner or callable target.
 *
 * Subclass it to give it methods that callables can point at.
 */
export class HostObject {
    private alive = true;
    private readonly signals = new Set<string>();
    private readonly freeListeners = new Set<FreeListener>();

    constructor(
        readonly name: string = "HostObject",
        signals: Iterable<string> = [],
    ) {
        for (const s of signals) this.addSignal(s);
    }

    addSignal(name: string): void {
        if (!name.trim()) {
            throw new InvalidArgumentError(
                "invalid_signal_name",
                "addSignal: signal name cannot be empty",
            );
        }
        this.signals.add(name);
    }

    hasSignal(name: string): boolean {
        return this.signals.has(name);
    }

    signalNames(): string[] {
        return Array.from(this.signals);
    }

    signal(name: string): SignalRef {
        return new SignalRef(this, name);
    }

    callable(method: string): Callable {
        return Callable.fromMethod(this, method);
    }

    isAlive(): boolean {
        return this.alive;
    }

    onFree(fn: FreeListener): () => void {
        this.freeListeners.add(fn);
        return () => {
            this.freeListeners.delete(fn);
        };
    }

    /** Ends the lifetime. Listeners run once; freeing again is a no-op. */
    free(): void {
        if (!this.alive) return;
        this.alive = false;
        const listeners = Array.from(this.freeListeners);
        this.freeListeners.clear();
        for (const fn of listeners) fn(this);
    }

    toString(): string {
        return this.alive ? this.name : `${this.name} (freed)`;
    }
}
