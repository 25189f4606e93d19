import type { Logger } from "../schema/connection";

// Lightweight, typed event bus
export type EventMap = Record<string, unknown>;

type Handler<P> = (payload: P) => void;

export class EventBus<E extends EventMap> {
    private listeners: { [K in keyof E]?: Set<Handler<E[K]>> } = {};

    constructor(private readonly logger: Logger = console) {}

    on<K extends keyof E>(event: K, handler: Handler<E[K]>): () => void {
        const set = this.listeners[event] ?? new Set<Handler<E[K]>>();
        set.add(handler);
        this.listeners[event] = set;
        return () => {
            set.delete(handler);
        };
    }

    once<K extends keyof E>(event: K, handler: Handler<E[K]>): () => void {
        const off = this.on(event, (p) => {
            off();
            handler(p);
        });
        return off;
    }

    emit<K extends keyof E>(event: K, payload: E[K]): void {
        const set = this.listeners[event];
        if (!set || set.size === 0) return;
        for (const h of Array.from(set)) {
            try {
                h(payload);
            } catch (err) {
                // one listener must not break the others
                this.logger.error(
                    `[EventBus] listener for "${String(event)}" threw`,
                    err,
                );
            }
        }
    }

    listenerCount(event: keyof E): number {
        return this.listeners[event]?.size ?? 0;
    }

    clear(): void {
        this.listeners = {};
    }
}
