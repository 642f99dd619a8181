import type { LifecycleEventRecord } from "./events";

export type ResourceState = "live" | "released" | "failed";

export type ResourceInfo = {
    resourceId: number;
    label: string;
    state: ResourceState;
    builtAt: number;
    releasedAt?: number;
    error?: string;
};

const describeError = (e: unknown): string => (e instanceof Error ? `${e.name}: ${e.message}` : String(e));

/**
 * Subscriber del EventBus que lleva la cuenta de los resources observados.
 * Útil para contestar "¿qué quedó abierto?" en un dump.
 */
export class LifecycleRegistry {
    resources = new Map<number, ResourceInfo>();

    private recent: LifecycleEventRecord[] = [];
    private recentCap = 2000;

    onEvent = (ev: LifecycleEventRecord) => {
        // ring de eventos recientes (para dumps explicables)
        this.recent.push(ev);
        if (this.recent.length > this.recentCap) this.recent.shift();

        switch (ev.type) {
            case "resource.setup": {
                if (ev.resourceId === undefined) break;
                this.resources.set(ev.resourceId, {
                    resourceId: ev.resourceId,
                    label: ev.label,
                    state: ev.status === "success" ? "live" : "failed",
                    builtAt: ev.wallTs,
                    error: ev.status === "failure" ? describeError(ev.error) : undefined,
                });
                break;
            }
            case "resource.teardown": {
                if (ev.resourceId === undefined) break;
                const r = this.resources.get(ev.resourceId);
                if (r) {
                    r.releasedAt = ev.wallTs;
                    if (ev.status === "success") {
                        r.state = "released";
                    } else {
                        r.state = "failed";
                        r.error = describeError(ev.error);
                    }
                }
                break;
            }
        }
    };

    live(): ResourceInfo[] {
        return Array.from(this.resources.values()).filter((r) => r.state === "live");
    }

    getRecentEvents() {
        return this.recent.slice();
    }
}
