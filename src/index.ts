export { Managed } from "./core/managed";
export type { ManagedValue, UseUntilShutdownOptions } from "./core/managed";
export { Resource } from "./core/types/resource";
export { Exit, attempt } from "./core/types/exit";
export {
    closeableTeardown,
    defaultTeardownRegistry,
    isCloseable,
    TeardownRegistry,
} from "./core/types/teardown";
export type { Closeable, Constructor, Teardown } from "./core/types/teardown";
export {
    addSuppressed,
    getSuppressed,
    MissingTeardownError,
    ShutdownInProgressError,
    TeardownDoubleError,
    toError,
} from "./core/errors";

export { ProcessShutdownHooks, processShutdownHooks } from "./core/runtime/shutdown";
export type { ProcessShutdownHooksOptions, ShutdownHooks, ShutdownTarget } from "./core/runtime/shutdown";

// observabilidad (opt-in)
export { noopHooks } from "./core/runtime/events";
export type {
    LifecycleEmitContext,
    LifecycleEvent,
    LifecycleEventRecord,
    LifecycleHooks,
    LifecycleStatus,
} from "./core/runtime/events";
export { EventBus } from "./core/runtime/eventBus";
export type { EventHandler } from "./core/runtime/eventBus";
export { consoleJsonLoggerSink } from "./core/runtime/loggerSink";
export type { LineWriter, LogLevel } from "./core/runtime/loggerSink";
export { LifecycleRegistry } from "./core/runtime/registry";
export type { ResourceInfo, ResourceState } from "./core/runtime/registry";
export { dumpResources } from "./core/runtime/dump";
export { observe } from "./core/runtime/observe";
