// src/core/runtime/shutdown.ts
import { attempt } from "../types/exit";
import { ShutdownInProgressError } from "../errors";
import { LifecycleHooks, noopHooks } from "./events";

/** "Corré este callback una vez, cuando le pidan al proceso que termine." */
export interface ShutdownHooks {
    register(hook: () => void): void;
}

type Listener = (...args: unknown[]) => void;

/** La parte de `process` que usamos (en tests se pasa un EventEmitter). */
export interface ShutdownTarget {
    readonly pid: number;
    on(event: string, listener: Listener): unknown;
    removeListener(event: string, listener: Listener): unknown;
    kill(pid: number, signal?: string | number): unknown;
}

export type ProcessShutdownHooksOptions = {
    target?: ShutdownTarget;
    signals?: readonly NodeJS.Signals[];
    /** Después de correr los hooks, reenviar la señal para que el proceso termine. Default: true */
    reraiseSignal?: boolean;
    hooks?: LifecycleHooks;
};

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Registry de hooks de terminación atado a un proceso.
 *
 * Los listeners se instalan recién en el primer `register`. Ante la primera señal
 * (o el evento `exit`) se corren todos los hooks una sola vez, en orden de registro.
 */
export class ProcessShutdownHooks implements ShutdownHooks {
    private readonly target: ShutdownTarget;
    private readonly signals: readonly NodeJS.Signals[];
    private readonly reraiseSignal: boolean;
    private readonly hooks: LifecycleHooks;

    private readonly registered: Array<() => void> = [];
    private attached = false;
    private ran = false;

    constructor(options: ProcessShutdownHooksOptions = {}) {
        this.target = options.target ?? process;
        this.signals = options.signals ?? DEFAULT_SIGNALS;
        this.reraiseSignal = options.reraiseSignal ?? true;
        this.hooks = options.hooks ?? noopHooks;
    }

    register(hook: () => void): void {
        if (this.ran) throw new ShutdownInProgressError();
        this.registered.push(hook);
        this.attach();
    }

    get size(): number {
        return this.registered.length;
    }

    /** Corre los hooks pendientes. Idempotente: la segunda llamada no hace nada. */
    runAll(reason: string): void {
        if (this.ran) return;
        this.ran = true;
        this.detach();

        this.hooks.emit({ type: "shutdown.start", reason, hooks: this.registered.length }, {});

        const failures: unknown[] = [];
        this.registered.forEach((hook, i) => {
            const exit = attempt(hook);
            const hookId = i + 1;
            if (exit._tag === "Success") {
                this.hooks.emit({ type: "shutdown.hook", status: "success" }, { hookId });
            } else {
                this.hooks.emit({ type: "shutdown.hook", status: "failure", error: exit.error }, { hookId });
                failures.push(exit.error);
            }
        });

        if (failures.length === 1) throw failures[0];
        if (failures.length > 1) throw new AggregateError(failures, "Shutdown hooks failed");
    }

    private readonly onSignal: Listener = (signal) => {
        const name = typeof signal === "string" ? signal : "signal";
        this.runAll(name);
        if (this.reraiseSignal && typeof signal === "string") {
            this.target.kill(this.target.pid, signal);
        }
    };

    private readonly onExit: Listener = () => {
        this.runAll("exit");
    };

    private attach(): void {
        if (this.attached) return;
        this.attached = true;
        for (const s of this.signals) this.target.on(s, this.onSignal);
        this.target.on("exit", this.onExit);
    }

    private detach(): void {
        if (!this.attached) return;
        this.attached = false;
        for (const s of this.signals) this.target.removeListener(s, this.onSignal);
        this.target.removeListener("exit", this.onExit);
    }
}

let shared: ProcessShutdownHooks | undefined;

/** Registry compartido por todo el proceso (se crea lazy). */
export function processShutdownHooks(): ShutdownHooks {
    if (!shared) shared = new ProcessShutdownHooks();
    return shared;
}
