export { Callable, type CallableFn } from "./callable";
export { DynamicConnectionHandle } from "./dynamic-connection";
export { InvalidArgumentError, type InvalidArgumentCode } from "./errors";
export { EventBus, type EventMap } from "./events";
export { MemorySignalHost, type SignalHost } from "./host";
export { HostObject } from "./host-object";
export { SignalRef } from "./signal";
