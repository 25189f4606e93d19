import type { HostObject } from "./host-object";

/** Reference to a named signal on a host object. May be null or dangling. */
export class SignalRef {
    constructor(
        readonly owner: HostObject | null,
        readonly name: string,
    ) {}

    static null(): SignalRef {
        return new SignalRef(null, "");
    }

    isNull(): boolean {
        return this.owner === null || this.name === "";
    }

    /** Owner is alive and still declares the signal. */
    hasLiveOwner(): boolean {
        const owner = this.owner;
        if (owner === null || this.name === "") return false;
        return owner.isAlive() && owner.hasSignal(this.name);
    }

    equals(other: SignalRef | null | undefined): boolean {
        if (!other) return false;
        return this.owner === other.owner && this.name === other.name;
    }

    toString(): string {
        return this.isNull() ? "<null signal>" : `${String(this.owner)}.${this.name}`;
    }
}
