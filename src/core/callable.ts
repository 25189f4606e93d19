import { isEqual } from "lodash-es";
import { InvalidArgumentError } from "./errors";
import type { HostObject } from "./host-object";

export type CallableFn = (...args: unknown[]) => unknown;

/**
 * An invokable unit: a method on a host object, or a plain function.
 * Bound arguments are appended after the call-site arguments.
 */
export class Callable {
    private constructor(
        readonly object: HostObject | null,
        readonly method: string,
        private readonly fn: CallableFn | null,
        readonly boundArgs: readonly unknown[],
    ) {}

    static fromMethod(object: HostObject, method: string): Callable {
        return new Callable(object, method, null, []);
    }

    static fromFunction(fn: CallableFn): Callable {
        return new Callable(null, "", fn, []);
    }

    static null(): Callable {
        return new Callable(null, "", null, []);
    }

    isCustom(): boolean {
        return this.fn !== null;
    }

    isNull(): boolean {
        return this.fn === null && this.object === null;
    }

    isValid(): boolean {
        return this.resolve() !== null;
    }

    bind(...args: unknown[]): Callable {
        return new Callable(this.object, this.method, this.fn, [
            ...this.boundArgs,
            ...args,
        ]);
    }

    /** Drops the last `count` bound arguments. */
    dropBound(count: number): Callable {
        const keep = Math.max(0, this.boundArgs.length - Math.max(0, count));
        return new Callable(
            this.object,
            this.method,
            this.fn,
            this.boundArgs.slice(0, keep),
        );
    }

    call(...args: unknown[]): unknown {
        const target = this.resolve();
        if (!target) {
            throw new InvalidArgumentError(
                "invalid_callable",
                `call: ${this.toString()} is not invokable`,
            );
        }
        return Reflect.apply(target, this.object, [...args, ...this.boundArgs]);
    }

    equals(other: Callable | null | undefined): boolean {
        if (!other) return false;
        return (
            this.object === other.object &&
            this.method === other.method &&
            this.fn === other.fn &&
            isEqual(this.boundArgs, other.boundArgs)
        );
    }

    toString(): string {
        if (this.fn) return `<custom ${this.fn.name || "anonymous"}>`;
        if (!this.object) return "<null callable>";
        return `${String(this.object)}::${this.method}`;
    }

    private resolve(): Function | null {
        if (this.fn) return this.fn;
        const object = this.object;
        if (!object || !object.isAlive()) return null;
        const member: unknown = Reflect.get(object, this.method);
        return typeof member === "function" ? member : null;
    }
}
