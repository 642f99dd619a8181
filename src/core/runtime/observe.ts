import { Managed } from "../managed";
import { attempt } from "../types/exit";
import type { LifecycleHooks } from "./events";

let nextResourceId = 1;

/**
 * Instrumenta un Managed: cada build emite `resource.setup` y cada teardown
 * `resource.teardown`, con un `resourceId` nuevo por build.
 * No cambia la semántica: los errores salen tal cual.
 */
export function observe<T>(managed: Managed<T>, label: string, hooks: LifecycleHooks): Managed<T> {
    return new Managed(() => {
        const resourceId = nextResourceId++;

        const built = attempt(() => managed.build());
        if (built._tag === "Failure") {
            hooks.emit({ type: "resource.setup", label, status: "failure", error: built.error }, { resourceId });
            throw built.error;
        }
        hooks.emit({ type: "resource.setup", label, status: "success" }, { resourceId });

        const resource = built.value;
        return {
            get: () => resource.get(),
            teardown: () => {
                const released = attempt(() => resource.teardown());
                if (released._tag === "Failure") {
                    hooks.emit(
                        { type: "resource.teardown", label, status: "failure", error: released.error },
                        { resourceId }
                    );
                    throw released.error;
                }
                hooks.emit({ type: "resource.teardown", label, status: "success" }, { resourceId });
            },
        };
    });
}
