import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { Managed } from "../core/managed";
import { ShutdownInProgressError } from "../core/errors";
import { processShutdownHooks, ProcessShutdownHooks } from "../core/runtime/shutdown";
import type { LifecycleEmitContext, LifecycleEvent, LifecycleHooks } from "../core/runtime/events";

class FakeProcess extends EventEmitter {
    readonly pid = 4242;
    kill = vi.fn();
}

class RecordingHooks implements LifecycleHooks {
    readonly events: Array<LifecycleEvent & LifecycleEmitContext> = [];

    emit(ev: LifecycleEvent, ctx: LifecycleEmitContext): void {
        this.events.push({ ...ev, ...ctx });
    }
}

function thrownBy(f: () => unknown): unknown {
    try {
        f();
    } catch (e) {
        return e;
    }
    throw new Error("expected function to throw");
}

describe("ProcessShutdownHooks", () => {
    it("installs its listeners on the first registration only", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target });

        expect(target.listenerCount("SIGTERM")).toBe(0);

        hooks.register(() => {});
        hooks.register(() => {});

        expect(hooks.size).toBe(2);
        expect(target.listenerCount("SIGINT")).toBe(1);
        expect(target.listenerCount("SIGTERM")).toBe(1);
        expect(target.listenerCount("exit")).toBe(1);
    });

    it("runs hooks in registration order on a signal and re-sends it", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target });
        const order: string[] = [];

        hooks.register(() => order.push("first"));
        hooks.register(() => order.push("second"));

        target.emit("SIGTERM", "SIGTERM");

        expect(order).toEqual(["first", "second"]);
        expect(target.kill).toHaveBeenCalledWith(4242, "SIGTERM");
        expect(target.listenerCount("SIGTERM")).toBe(0);
        expect(target.listenerCount("SIGINT")).toBe(0);
        expect(target.listenerCount("exit")).toBe(0);
    });

    it("does not re-send the signal when told not to", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target, reraiseSignal: false });
        const hook = vi.fn();

        hooks.register(hook);
        target.emit("SIGINT", "SIGINT");

        expect(hook).toHaveBeenCalledTimes(1);
        expect(target.kill).not.toHaveBeenCalled();
    });

    it("listens only to the configured signals", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target, signals: ["SIGHUP"] });

        hooks.register(() => {});

        expect(target.listenerCount("SIGHUP")).toBe(1);
        expect(target.listenerCount("SIGTERM")).toBe(0);
    });

    it("runs hooks on process exit", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target });
        const hook = vi.fn();

        hooks.register(hook);
        target.emit("exit", 0);

        expect(hook).toHaveBeenCalledTimes(1);
        expect(target.kill).not.toHaveBeenCalled();
    });

    it("runs each hook once", () => {
        const hooks = new ProcessShutdownHooks({ target: new FakeProcess() });
        const hook = vi.fn();

        hooks.register(hook);
        hooks.runAll("test");
        hooks.runAll("test");

        expect(hook).toHaveBeenCalledTimes(1);
    });

    it("rejects registrations after shutdown ran", () => {
        const hooks = new ProcessShutdownHooks({ target: new FakeProcess() });
        hooks.runAll("test");

        expect(() => hooks.register(() => {})).toThrow(ShutdownInProgressError);
    });

    it("releases a stack built after shutdown ran", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target });
        hooks.register(() => {});
        target.emit("exit", 0);

        let tornDown = 0;
        const thrown = thrownBy(() =>
            Managed.make(() => 1, () => {
                tornDown++;
            }).useUntilShutdown({ shutdownHooks: hooks })
        );

        expect(thrown).toBeInstanceOf(ShutdownInProgressError);
        expect(tornDown).toBe(1);
    });

    it("runs every hook and rethrows a single failure", () => {
        const target = new FakeProcess();
        const hooks = new ProcessShutdownHooks({ target });
        const boom = new Error("flush failed");
        const after = vi.fn();

        hooks.register(() => {
            throw boom;
        });
        hooks.register(after);

        expect(thrownBy(() => target.emit("SIGTERM", "SIGTERM"))).toBe(boom);
        expect(after).toHaveBeenCalledTimes(1);
    });

    it("aggregates several failures", () => {
        const hooks = new ProcessShutdownHooks({ target: new FakeProcess() });
        const e1 = new Error("one");
        const e2 = new Error("two");

        hooks.register(() => {
            throw e1;
        });
        hooks.register(() => {
            throw e2;
        });

        const thrown = thrownBy(() => hooks.runAll("test"));
        expect(thrown).toBeInstanceOf(AggregateError);
        if (!(thrown instanceof AggregateError)) return;
        expect(thrown.message).toBe("Shutdown hooks failed");
        expect(thrown.errors).toEqual([e1, e2]);
    });

    it("reports progress through lifecycle hooks", () => {
        const recorder = new RecordingHooks();
        const hooks = new ProcessShutdownHooks({ target: new FakeProcess(), hooks: recorder, reraiseSignal: false });
        const boom = new Error("flush failed");

        hooks.register(() => {});
        hooks.register(() => {
            throw boom;
        });

        expect(thrownBy(() => hooks.runAll("SIGTERM"))).toBe(boom);
        expect(recorder.events).toEqual([
            { type: "shutdown.start", reason: "SIGTERM", hooks: 2 },
            { type: "shutdown.hook", status: "success", hookId: 1 },
            { type: "shutdown.hook", status: "failure", error: boom, hookId: 2 },
        ]);
    });

    it("tears down independent stacks in registration order", () => {
        const target = new FakeProcess();
        const shutdownHooks = new ProcessShutdownHooks({ target });
        const events: string[] = [];
        const link = (name: string) =>
            Managed.make(
                () => events.push(`setup ${name}`),
                () => {
                    events.push(`teardown ${name}`);
                }
            );

        link("a1").flatMap(() => link("a2")).useUntilShutdown({ shutdownHooks });
        link("b1").flatMap(() => link("b2")).useUntilShutdown({ shutdownHooks });

        target.emit("SIGINT", "SIGINT");

        expect(events).toEqual([
            "setup a1", "setup a2", "setup b1", "setup b2",
            "teardown a2", "teardown a1", "teardown b2", "teardown b1",
        ]);
    });
});

describe("processShutdownHooks", () => {
    it("shares one registry per process", () => {
        expect(processShutdownHooks()).toBe(processShutdownHooks());
    });
});
